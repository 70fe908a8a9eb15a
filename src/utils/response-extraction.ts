import type { z } from "zod";
import { generateContentResponseSchema } from "../schemas/gemini-response.schema";
import { MalformedResponseError } from "./errors";

const FENCE = "```";

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "unknown validation error";
  }
  const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${at}: ${issue.message}`;
}

/**
 * Pulls the generated text out of a Gemini response envelope
 * (`candidates[0].content.parts[0].text`).
 *
 * @throws MalformedResponseError if the envelope does not have that shape or the text is blank.
 */
export function extractText(raw: unknown): string {
  const parsed = generateContentResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Response envelope invalid at ${describeIssue(parsed.error)}`,
    );
  }

  const [candidate] = parsed.data.candidates;
  const text = candidate?.content.parts[0]?.text?.trim();
  if (!text) {
    throw new MalformedResponseError(
      `Response contains no text (finishReason: ${candidate?.finishReason ?? "none"})`,
    );
  }
  return text;
}

/**
 * Removes a markdown code fence around the payload, with or without a
 * language tag (```json ... ```). Text without a fence is returned trimmed,
 * and so is bare JSON, whose string values may themselves contain fences.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return trimmed;
  }

  const open = trimmed.indexOf(FENCE);
  const close = trimmed.lastIndexOf(FENCE);
  if (open === -1 || close <= open) {
    return trimmed;
  }

  return trimmed
    .slice(open + FENCE.length, close)
    .replace(/^[A-Za-z]*\s*(?=[{[])/, "")
    .trim();
}

/**
 * Parses model text as JSON (after fence stripping) and validates it.
 *
 * @throws MalformedResponseError naming the failing stage; the payload itself is never included.
 */
export function parseJsonText<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw new MalformedResponseError(
      `Model output is not valid JSON (${text.length} chars)`,
      { cause: error },
    );
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError(
      `Model output failed validation at ${describeIssue(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Full extraction: envelope -> text -> fence strip -> JSON -> schema.
 */
export function extractJson<S extends z.ZodTypeAny>(
  raw: unknown,
  schema: S,
): z.output<S> {
  return parseJsonText(extractText(raw), schema);
}
