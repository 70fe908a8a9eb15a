import { ApiError } from "@google/genai";
import { describe, expect, it } from "vitest";
import {
  CHAT_REPLY_CATEGORIES,
  fallbackCareerAnalysis,
  fallbackChatReply,
  fallbackLearningPath,
  fallbackRiasecAnalysis,
} from "../src/data/fallback-catalog";
import { createCareerAnalysisService } from "../src/services/career-analysis.services";
import type { GenerationClient } from "../src/services/llm.services";
import type { StudentProfile } from "../src/types";
import {
  delay,
  envelope,
  fakeClient,
  jsonEnvelope,
  sampleCareerPayload,
  sampleRiasecPayload,
  testAIConfig,
} from "./helpers";

const RESPONSES = [
  "I enjoy solving puzzles",
  "I like sketching interfaces",
  "I help friends with maths",
];

const profile: StudentProfile = {
  id: "stu-1",
  educationLevel: "BACHELOR_SCIENCE",
  skills: ["Python", "Statistics"],
  riasecScores: { investigative: 90, artistic: 75, social: 60 },
};

function serviceWith(client?: GenerationClient, apiKey = "test-secret") {
  return createCareerAnalysisService(
    {
      ai: testAIConfig({ timeoutMs: 100, backoffBaseMs: 1, backoffMaxMs: 2 }, apiKey),
      cache: { ttlMs: 60_000, maxEntries: 100 },
    },
    client,
  );
}

describe("CareerAnalysisService", () => {
  it("makes one AI call for concurrent identical requests", async () => {
    const client = fakeClient(async () => {
      await delay(30);
      return jsonEnvelope(sampleRiasecPayload);
    });
    const service = serviceWith(client);

    const results = await Promise.all(
      Array.from({ length: 5 }, () => service.analyzeRiasec(RESPONSES)),
    );

    expect(client.calls).toHaveLength(1);
    for (const result of results) {
      expect(result).toEqual(results[0]);
    }
    expect(results[0]).toMatchObject({ kind: "riasec", source: "ai", investigative: 90 });
  });

  it("derives the personality code and its descriptions from the scores", async () => {
    const client = fakeClient(() =>
      jsonEnvelope({ ...sampleRiasecPayload, dominantTypes: "CER" }),
    );
    const result = await serviceWith(client).analyzeRiasec(RESPONSES);

    expect(result.dominantTypes).toBe("IAS");
    expect(result.personalityDescription).toBe(
      "Unique combination of interests and skills",
    );
    expect(result.recommendedFields).toEqual([
      "UX Research",
      "Creative Technology",
      "Design Thinking",
    ]);
  });

  it("serves repeated RIASEC submissions from the cache", async () => {
    const client = fakeClient(() => jsonEnvelope(sampleRiasecPayload));
    const service = serviceWith(client);

    await service.analyzeRiasec(RESPONSES);
    await service.analyzeRiasec(RESPONSES.map((response) => `  ${response} `));

    expect(client.calls).toHaveLength(1);
  });

  it("parses fenced career recommendations", async () => {
    const fenced = "```json\n" + JSON.stringify(sampleCareerPayload) + "\n```";
    const client = fakeClient(() => envelope(fenced));

    const result = await serviceWith(client).recommendCareers(profile);

    expect(result.source).toBe("ai");
    expect(result.failure).toBeUndefined();
    expect(result.recommendations[0]).toEqual({
      title: "Data Scientist",
      description: "Builds models from data.",
      matchScore: 0.88,
      salaryRange: "8-20 LPA",
      growth: "Very High",
    });
  });

  it("falls back without any call when no API key is configured", async () => {
    const client = fakeClient(() => jsonEnvelope(sampleCareerPayload));
    const service = serviceWith(client, "");

    const result = await service.recommendCareers(profile);

    expect(service.isAiAvailable()).toBe(false);
    expect(result).toEqual(fallbackCareerAnalysis("GatewayUnavailable"));
    expect(client.calls).toHaveLength(0);
  });

  it("falls back on a rejected request and does not cache the fallback", async () => {
    const client = fakeClient(() => {
      throw new ApiError({ message: "API key not valid", status: 400 });
    });
    const service = serviceWith(client);

    const first = await service.recommendCareers(profile);
    const second = await service.recommendCareers(profile);

    expect(first).toMatchObject({ source: "fallback", failure: "PermanentRequestError" });
    expect(second).toMatchObject({ source: "fallback", failure: "PermanentRequestError" });
    expect(client.calls).toHaveLength(2);
  });

  it("falls back on malformed model output", async () => {
    const client = fakeClient(() => envelope("Sorry, I cannot help with that."));

    const result = await serviceWith(client).analyzeRiasec(RESPONSES);

    expect(result).toMatchObject({
      source: "fallback",
      failure: "MalformedResponse",
      dominantTypes: "IRS",
    });
  });

  it("falls back after transient failures exhaust the attempts", async () => {
    const client = fakeClient(() => {
      throw new ApiError({ message: "overloaded", status: 503 });
    });

    const result = await serviceWith(client).generateLearningPath(profile, "Data Scientist");

    expect(result).toMatchObject({ source: "fallback", failure: "GatewayUnavailable" });
    expect(client.calls).toHaveLength(3);
  });

  it("never rejects, even when the client throws synchronously", async () => {
    const client: GenerationClient = {
      models: {
        generateContent: () => {
          throw new Error("bug in client");
        },
      },
    };

    await expect(serviceWith(client).chat("Any tips on a job?")).resolves.toMatchObject({
      source: "fallback",
      text: fallbackChatReply("Any tips on a job?"),
    });
  });

  it("resolves to fallbacks for input that breaks key building", async () => {
    const client = fakeClient(() => jsonEnvelope(sampleRiasecPayload));
    // Signatures as seen by an untyped caller
    const untyped: {
      analyzeRiasec(responses: readonly unknown[]): Promise<unknown>;
      recommendCareers(profile: unknown): Promise<unknown>;
      generateLearningPath(profile: unknown, targetCareer: unknown): Promise<unknown>;
    } = serviceWith(client);

    await expect(untyped.analyzeRiasec([null, "a", "b"])).resolves.toEqual(
      fallbackRiasecAnalysis("Unexpected"),
    );
    await expect(untyped.recommendCareers(null)).resolves.toEqual(
      fallbackCareerAnalysis("Unexpected"),
    );
    await expect(untyped.generateLearningPath(profile, null)).resolves.toEqual(
      fallbackLearningPath("Unexpected"),
    );
    expect(client.calls).toHaveLength(0);
  });

  it("hands out copies of cached results", async () => {
    const client = fakeClient(() => jsonEnvelope(sampleCareerPayload));
    const service = serviceWith(client);

    const first = await service.recommendCareers(profile);
    first.recommendations.length = 0;
    const second = await service.recommendCareers(profile);

    expect(client.calls).toHaveLength(1);
    expect(second.recommendations).toHaveLength(2);
  });

  it("returns the learning path text", async () => {
    const client = fakeClient(() => envelope("  Month 1: SQL basics  "));

    const result = await serviceWith(client).generateLearningPath(profile, "Data Analyst");

    expect(result).toEqual({ kind: "learning-path", source: "ai", text: "Month 1: SQL basics" });
  });

  it("keys learning paths by target career, ignoring case", async () => {
    const client = fakeClient(() => envelope("plan"));
    const service = serviceWith(client);

    await service.generateLearningPath(profile, "Data Analyst");
    await service.generateLearningPath(profile, "data analyst ");
    await service.generateLearningPath(profile, "Designer");

    expect(client.calls).toHaveLength(2);
  });

  it("recomputes a student's analyses after invalidation", async () => {
    const client = fakeClient(() => jsonEnvelope(sampleCareerPayload));
    const service = serviceWith(client);

    await service.recommendCareers(profile);
    await service.recommendCareers(profile);
    expect(client.calls).toHaveLength(1);

    service.invalidateStudent("stu-1");
    await service.recommendCareers(profile);
    expect(client.calls).toHaveLength(2);
  });

  it("keeps other students' analyses on invalidation", async () => {
    const client = fakeClient(() => jsonEnvelope(sampleCareerPayload));
    const service = serviceWith(client);
    const other: StudentProfile = { ...profile, id: "stu-2" };

    await service.recommendCareers(profile);
    await service.recommendCareers(other);
    service.invalidateStudent("stu-1");
    await service.recommendCareers(other);

    expect(client.calls).toHaveLength(2);
  });

  it("answers a skills question with the skill reply when the gateway is unavailable", async () => {
    const service = serviceWith(undefined, "");

    const result = await service.chat("What skills should I learn for a career in data?");

    expect(result).toEqual({
      kind: "chat",
      source: "fallback",
      failure: "GatewayUnavailable",
      text: CHAT_REPLY_CATEGORIES[0]?.reply,
    });
    expect(result.text).toContain("Continuous learning is the key to career growth!");
  });

  it("does not cache chat replies", async () => {
    const client = fakeClient(() => envelope("Keep going!"));
    const service = serviceWith(client);

    const first = await service.chat("Should I learn SQL?", profile);
    const second = await service.chat("Should I learn SQL?", profile);

    expect(first).toEqual({ kind: "chat", source: "ai", text: "Keep going!" });
    expect(second).toEqual(first);
    expect(client.calls).toHaveLength(2);
  });
});
