import {
  fallbackCareerAnalysis,
  fallbackChat,
  fallbackLearningPath,
  fallbackRiasecAnalysis,
} from "../data/fallback-catalog";
import {
  describePersonality,
  dominantCode,
  recommendedFields,
} from "../domain/riasec";
import { buildAnalysisPrompt, type PromptRequest } from "../prompts";
import {
  careerAnalysisSchema,
  riasecAnalysisSchema,
} from "../schemas/analysis-schemas";
import type {
  AnalysisFailureKind,
  AnalysisKind,
  AnalysisResult,
  CareerAnalysisResult,
  ChatResult,
  LearningPathResult,
  RiasecAnalysisResult,
  StudentProfile,
} from "../types";
import type { AppConfig } from "../utils/config";
import { errorMessage, toFailureKind } from "../utils/errors";
import { fingerprint } from "../utils/fingerprint";
import { componentLogger } from "../utils/logger";
import { extractJson, extractText } from "../utils/response-extraction";
import { RecommendationCache } from "./cache.services";
import { LLMGateway, type GenerationClient } from "./llm.services";

const log = componentLogger("career-analysis");

/* Cache owner for results that depend only on their input, not on a student. */
const SHARED_OWNER = "shared";
const ANONYMOUS_OWNER = "anonymous";

interface Generation<R extends AnalysisResult> {
  kind: R["kind"];
  key: string;
  prompt: PromptRequest;
  parse: (raw: unknown) => R;
  fallback: (failure: AnalysisFailureKind) => R;
}

function ownerOf(profile: StudentProfile): string {
  return profile.id?.trim() || ANONYMOUS_OWNER;
}

/* Profile attributes that shape an analysis; identity lives in the key's owner segment. */
function analysisInput(profile: StudentProfile): Omit<StudentProfile, "id"> {
  const { id: _id, ...attributes } = profile;
  return attributes;
}

function isKind<K extends AnalysisKind>(kind: K) {
  return (value: AnalysisResult): value is Extract<AnalysisResult, { kind: K }> =>
    value.kind === kind;
}

/**
 * Turns student data into career guidance through Gemini.
 *
 * Every public operation is total: it resolves to a result tagged
 * `source: "ai"` or, when anything on the AI path fails, to a fallback
 * tagged `source: "fallback"`. It never rejects. Only AI results are cached.
 */
export class CareerAnalysisService {
  constructor(
    private readonly gateway: LLMGateway,
    private readonly cache: RecommendationCache<AnalysisResult>,
  ) {}

  isAiAvailable(): boolean {
    return this.gateway.isAvailable();
  }

  /**
   * Scores free-text assessment answers on the RIASEC axes. Results depend
   * only on the answers, so identical submissions share a cache entry.
   */
  async analyzeRiasec(responses: readonly string[]): Promise<RiasecAnalysisResult> {
    try {
      const answers = responses.map((response) => response.trim());

      return await this.runCached<RiasecAnalysisResult>(
        SHARED_OWNER,
        {
          kind: "riasec",
          key: fingerprint("riasec", SHARED_OWNER, answers),
          prompt: { kind: "riasec", responses: answers },
          parse: (raw) => {
            const payload = extractJson(raw, riasecAnalysisSchema);
            const code = dominantCode(payload);
            return {
              kind: "riasec",
              source: "ai",
              realistic: payload.realistic,
              investigative: payload.investigative,
              artistic: payload.artistic,
              social: payload.social,
              enterprising: payload.enterprising,
              conventional: payload.conventional,
              dominantTypes: code,
              personalityDescription: describePersonality(code),
              recommendedFields: recommendedFields(code),
              analysis: payload.analysis,
              careerSuggestions: payload.careerSuggestions,
            };
          },
          fallback: fallbackRiasecAnalysis,
        },
        isKind("riasec"),
      );
    } catch (error) {
      return this.degrade("riasec", "riasec", error, fallbackRiasecAnalysis);
    }
  }

  async recommendCareers(profile: StudentProfile): Promise<CareerAnalysisResult> {
    try {
      const owner = ownerOf(profile);

      return await this.runCached<CareerAnalysisResult>(
        owner,
        {
          kind: "career-recommendation",
          key: fingerprint("career-recommendation", owner, analysisInput(profile)),
          prompt: { kind: "career-recommendation", profile },
          parse: (raw) => ({
            kind: "career-recommendation",
            source: "ai",
            ...extractJson(raw, careerAnalysisSchema),
          }),
          fallback: fallbackCareerAnalysis,
        },
        isKind("career-recommendation"),
      );
    } catch (error) {
      return this.degrade(
        "career-recommendation",
        "career-recommendation",
        error,
        fallbackCareerAnalysis,
      );
    }
  }

  async generateLearningPath(
    profile: StudentProfile,
    targetCareer: string,
  ): Promise<LearningPathResult> {
    try {
      const owner = ownerOf(profile);
      const target = targetCareer.trim();

      return await this.runCached<LearningPathResult>(
        owner,
        {
          kind: "learning-path",
          key: fingerprint("learning-path", owner, {
            profile: analysisInput(profile),
            targetCareer: target.toLowerCase(),
          }),
          prompt: { kind: "learning-path", profile, targetCareer: target },
          parse: (raw) => ({
            kind: "learning-path",
            source: "ai",
            text: extractText(raw),
          }),
          fallback: fallbackLearningPath,
        },
        isKind("learning-path"),
      );
    } catch (error) {
      return this.degrade("learning-path", "learning-path", error, fallbackLearningPath);
    }
  }

  /**
   * Counselling reply to a free-text message. Replies are never cached.
   */
  async chat(
    message: string,
    profile?: StudentProfile | null,
  ): Promise<ChatResult> {
    try {
      return await this.generate<ChatResult>({
        kind: "chat",
        key: "chat",
        prompt: { kind: "chat", message, profile },
        parse: (raw) => ({ kind: "chat", source: "ai", text: extractText(raw) }),
        fallback: (failure) => fallbackChat(message, failure),
      });
    } catch (error) {
      return this.degrade("chat", "chat", error, (failure) =>
        fallbackChat(message, failure),
      );
    }
  }

  /**
   * Drops every cached analysis of a student. Call after any profile change.
   */
  invalidateStudent(studentId: string): void {
    const removed = this.cache.invalidate(studentId);
    log.info("Student analyses invalidated", { studentId, removed });
  }

  private async runCached<R extends AnalysisResult>(
    owner: string,
    generation: Generation<R>,
    isResult: (value: AnalysisResult) => value is R,
  ): Promise<R> {
    const { kind, key, fallback } = generation;

    try {
      const value = await this.cache.getOrCompute(key, owner, () =>
        this.generate(generation),
      );
      if (isResult(value)) {
        return value;
      }
      log.error("Cached value has the wrong kind", { kind, got: value.kind });
      return fallback("Unexpected");
    } catch (error) {
      return this.degrade(kind, key, error, fallback);
    }
  }

  /**
   * Computing -> Success | Degraded. Resolves to the fallback on any failure.
   */
  private async generate<R extends AnalysisResult>(
    generation: Generation<R>,
  ): Promise<R> {
    const { kind, key, prompt, parse, fallback } = generation;

    try {
      const raw = await this.gateway.complete(buildAnalysisPrompt(prompt), {
        operation: kind,
      });
      const result = parse(raw);
      log.info("Analysis generated", { kind, key: key.slice(0, 40) });
      return result;
    } catch (error) {
      return this.degrade(kind, key, error, fallback);
    }
  }

  private degrade<R extends AnalysisResult>(
    kind: AnalysisKind,
    key: string,
    error: unknown,
    fallback: (failure: AnalysisFailureKind) => R,
  ): R {
    const failure = toFailureKind(error);
    const meta = {
      kind,
      key: key.slice(0, 40),
      failure,
      error: errorMessage(error),
    };

    switch (failure) {
      case "PermanentRequestError":
        log.error("AI request rejected, check Gemini configuration; serving fallback", meta);
        break;
      case "Unexpected":
        log.error("Unexpected error on AI path; serving fallback", meta);
        break;
      default:
        log.warn("AI path failed; serving fallback", meta);
    }

    return fallback(failure);
  }
}

/**
 * Wires gateway, cache and service from configuration.
 * Pass `client` to replace the Gemini SDK client.
 */
export function createCareerAnalysisService(
  config: Pick<AppConfig, "ai" | "cache">,
  client?: GenerationClient,
): CareerAnalysisService {
  const gateway = new LLMGateway(config.ai, client);
  const cache = new RecommendationCache<AnalysisResult>({
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
    isCacheable: (value) => value.source === "ai",
  });
  return new CareerAnalysisService(gateway, cache);
}
