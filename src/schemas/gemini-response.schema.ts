import { z } from "zod";

/**
 * The part of a Gemini `generateContent` response the extractor relies on:
 * `candidates[0].content.parts[0].text`. Other fields are ignored.
 */
export const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).min(1),
        }),
        finishReason: z.string().optional(),
      }),
    )
    .min(1),
});
