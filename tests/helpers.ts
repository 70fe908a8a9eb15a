import type { GenerateContentParameters } from "@google/genai";
import type { GenerationClient } from "../src/services/llm.services";
import type { AIConfig, RetrySettings } from "../src/utils/config";

export function testAIConfig(
  retry: Partial<RetrySettings> = {},
  apiKey = "test-secret",
): AIConfig {
  return {
    apiKey,
    model: "gemini-test",
    generation: { temperature: 0.7, maxOutputTokens: 2048, topK: 40, topP: 0.95 },
    retry: {
      timeoutMs: 200,
      maxAttempts: 3,
      backoffBaseMs: 5,
      backoffMaxMs: 20,
      ...retry,
    },
  };
}

/* A Gemini response envelope carrying `text`. */
export function envelope(text: string) {
  return {
    candidates: [{ content: { parts: [{ text }] }, finishReason: "STOP" }],
  };
}

export function jsonEnvelope(payload: unknown) {
  return envelope(JSON.stringify(payload));
}

type Responder = (
  params: GenerateContentParameters,
  call: number,
) => unknown | Promise<unknown>;

export interface FakeClient extends GenerationClient {
  calls: GenerateContentParameters[];
}

/**
 * In-process stand-in for the Gemini SDK client. `respond` receives the
 * request and the 1-based call number; a thrown or rejected value surfaces
 * as an SDK error.
 */
export function fakeClient(respond: Responder): FakeClient {
  const calls: GenerateContentParameters[] = [];
  return {
    calls,
    models: {
      async generateContent(params: GenerateContentParameters) {
        calls.push(params);
        return respond(params, calls.length);
      },
    },
  };
}

/* The prompt text of a recorded request. */
export function promptOf(params: GenerateContentParameters): string {
  return JSON.stringify(params.contents);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const sampleRiasecPayload = {
  realistic: 40,
  investigative: 90,
  artistic: 75,
  social: 60,
  enterprising: 30,
  conventional: 20,
  dominantTypes: "IAS",
  analysis: "Curious and creative, enjoys working through problems.",
  careerSuggestions: ["UX Researcher", "Data Scientist", "Product Designer"],
};

export const sampleCareerPayload = {
  recommendations: [
    {
      title: "Data Scientist",
      description: "Builds models from data.",
      matchScore: 88,
      salaryRange: "8-20 LPA",
      growth: "Very High",
    },
    { title: "UX Researcher", matchScore: 0.7 },
  ],
  skillsToDevelop: ["Statistics", "Python"],
  industryInsights: "Analytics roles keep growing across Indian startups.",
  actionPlan: ["Finish a statistics course", "Publish two notebooks"],
};
