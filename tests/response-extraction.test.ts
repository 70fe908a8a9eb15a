import { describe, expect, it } from "vitest";
import { z } from "zod";
import { careerAnalysisSchema, riasecAnalysisSchema } from "../src/schemas/analysis-schemas";
import { MalformedResponseError } from "../src/utils/errors";
import {
  extractJson,
  extractText,
  parseJsonText,
  stripCodeFence,
} from "../src/utils/response-extraction";
import { envelope, jsonEnvelope, sampleCareerPayload, sampleRiasecPayload } from "./helpers";

const pointSchema = z.object({ x: z.number(), y: z.number() });

describe("extractText", () => {
  it("returns the trimmed text of the first part", () => {
    expect(extractText(envelope("  hello  "))).toBe("hello");
  });

  it.each([
    ["a non-object", "plain string"],
    ["no candidates", { candidates: [] }],
    ["a candidate without parts", { candidates: [{ content: { parts: [] } }] }],
    ["null", null],
  ])("rejects %s", (_label, raw) => {
    expect(() => extractText(raw)).toThrow(MalformedResponseError);
  });

  it("rejects blank text and reports the finish reason", () => {
    const raw = {
      candidates: [{ content: { parts: [{ text: "  " }] }, finishReason: "SAFETY" }],
    };
    expect(() => extractText(raw)).toThrow(
      "Response contains no text (finishReason: SAFETY)",
    );
  });
});

describe("stripCodeFence", () => {
  it("strips a json-tagged fence", () => {
    expect(stripCodeFence('```json\n{"x": 1}\n```')).toBe('{"x": 1}');
  });

  it("strips an untagged fence", () => {
    expect(stripCodeFence('```\n[1, 2]\n```')).toBe("[1, 2]");
  });

  it("ignores prose around the fence", () => {
    expect(stripCodeFence('Here you go:\n```json\n{"x": 1}\n```\nGood luck!')).toBe(
      '{"x": 1}',
    );
  });

  it("returns unfenced text trimmed", () => {
    expect(stripCodeFence('  {"x": 1}\n')).toBe('{"x": 1}');
  });

  it("leaves bare JSON with fences inside its strings intact", () => {
    const bare = JSON.stringify({ analysis: "Try ```python``` and ```sql``` snippets" });
    expect(stripCodeFence(bare)).toBe(bare);
  });

  it("leaves a lone fence marker alone", () => {
    expect(stripCodeFence("``` not closed")).toBe("``` not closed");
  });
});

describe("parseJsonText", () => {
  it("parses fenced and unfenced JSON to the same value", () => {
    const bare = parseJsonText('{"x": 1, "y": 2}', pointSchema);
    const fenced = parseJsonText('```json\n{"x": 1, "y": 2}\n```', pointSchema);
    expect(fenced).toEqual(bare);
    expect(bare).toEqual({ x: 1, y: 2 });
  });

  it("parses bare JSON whose strings contain fence markers", () => {
    const schema = z.object({ analysis: z.string() });
    const text = JSON.stringify({ analysis: "Try ```python``` and ```sql``` snippets" });
    expect(parseJsonText(text, schema)).toEqual({
      analysis: "Try ```python``` and ```sql``` snippets",
    });
  });

  it("names the parse stage without echoing the payload", () => {
    expect(() => parseJsonText("not json at all", pointSchema)).toThrow(
      "Model output is not valid JSON (15 chars)",
    );
  });

  it("names the first failing path", () => {
    expect(() => parseJsonText('{"x": 1, "y": "two"}', pointSchema)).toThrow(
      "Model output failed validation at y: Expected number, received string",
    );
  });
});

describe("extractJson", () => {
  it("validates a RIASEC analysis", () => {
    const payload = extractJson(jsonEnvelope(sampleRiasecPayload), riasecAnalysisSchema);
    expect(payload.investigative).toBe(90);
    expect(payload.dominantTypes).toBe("IAS");
  });

  it("rounds scores and rejects out-of-range ones", () => {
    const rounded = extractJson(
      jsonEnvelope({ ...sampleRiasecPayload, social: 59.6 }),
      riasecAnalysisSchema,
    );
    expect(rounded.social).toBe(60);

    expect(() =>
      extractJson(jsonEnvelope({ ...sampleRiasecPayload, social: 140 }), riasecAnalysisSchema),
    ).toThrow(MalformedResponseError);
  });

  it("reads percentage match scores as fractions", () => {
    const payload = extractJson(jsonEnvelope(sampleCareerPayload), careerAnalysisSchema);
    expect(payload.recommendations.map((r) => r.matchScore)).toEqual([0.88, 0.7]);
  });

  it("rejects match scores between the fraction and percentage scales", () => {
    const recommendations = [{ title: "Data Scientist", matchScore: 1.5 }];
    expect(() =>
      extractJson(
        jsonEnvelope({ ...sampleCareerPayload, recommendations }),
        careerAnalysisSchema,
      ),
    ).toThrow(
      "Model output failed validation at recommendations.0.matchScore: matchScore must be a fraction or a percentage",
    );

    const edges = [
      { title: "A", matchScore: 1 },
      { title: "B", matchScore: 2 },
    ];
    const payload = extractJson(
      jsonEnvelope({ ...sampleCareerPayload, recommendations: edges }),
      careerAnalysisSchema,
    );
    expect(payload.recommendations.map((r) => r.matchScore)).toEqual([1, 0.02]);
  });

  it("requires at least one recommendation", () => {
    expect(() =>
      extractJson(
        jsonEnvelope({ ...sampleCareerPayload, recommendations: [] }),
        careerAnalysisSchema,
      ),
    ).toThrow("Model output failed validation at recommendations:");
  });
});
