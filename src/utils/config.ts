import { z } from "zod";
import {
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_GEMINI_MODEL_NAME,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_PORT,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TOP_K,
  DEFAULT_TOP_P,
} from "./constants";
import { componentLogger } from "./logger";

const log = componentLogger("config");

export interface GenerationSettings {
  temperature: number;
  maxOutputTokens: number;
  topK: number;
  topP: number;
}

export interface RetrySettings {
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface AIConfig {
  /* Empty when no key is configured: the gateway is then permanently unavailable. */
  apiKey: string;
  baseUrl?: string;
  model: string;
  generation: GenerationSettings;
  retry: RetrySettings;
}

export interface CacheConfig {
  ttlMs: number;
  maxEntries: number;
}

export interface AppConfig {
  port: number;
  ai: AIConfig;
  cache: CacheConfig;
}

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();

/**
 * Reads one numeric setting. Unset values take the default silently;
 * values that fail validation take the default with a warning.
 */
function readNumber(
  env: Env,
  name: string,
  schema: z.ZodType<number>,
  fallback: number,
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    log.warn("Invalid configuration value, using default", {
      name,
      value: raw,
      fallback,
    });
    return fallback;
  }
  return parsed.data;
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Builds the Gemini client configuration from environment variables.
 */
export function loadAIConfig(env: Env = process.env): AIConfig {
  const apiKey = readString(env, "GEMINI_API_KEY") ?? "";
  if (!apiKey) {
    log.warn("Gemini API key not configured - AI features will be disabled");
  }

  const backoffBaseMs = readNumber(
    env,
    "AI_BACKOFF_BASE_MS",
    z.coerce.number().int().min(0),
    DEFAULT_BACKOFF_BASE_MS,
  );

  return {
    apiKey,
    baseUrl: readString(env, "GEMINI_BASE_URL"),
    model: readString(env, "GEMINI_MODEL_NAME") ?? DEFAULT_GEMINI_MODEL_NAME,
    generation: {
      temperature: readNumber(
        env,
        "GEMINI_TEMPERATURE",
        z.coerce.number().min(0).max(1),
        DEFAULT_TEMPERATURE,
      ),
      maxOutputTokens: readNumber(
        env,
        "GEMINI_MAX_TOKENS",
        positiveInt,
        DEFAULT_MAX_OUTPUT_TOKENS,
      ),
      topK: readNumber(env, "GEMINI_TOP_K", positiveInt, DEFAULT_TOP_K),
      topP: readNumber(
        env,
        "GEMINI_TOP_P",
        z.coerce.number().gt(0).max(1),
        DEFAULT_TOP_P,
      ),
    },
    retry: {
      timeoutMs: readNumber(env, "AI_TIMEOUT_MS", positiveInt, DEFAULT_TIMEOUT_MS),
      maxAttempts: readNumber(
        env,
        "AI_MAX_ATTEMPTS",
        positiveInt,
        DEFAULT_MAX_ATTEMPTS,
      ),
      backoffBaseMs,
      backoffMaxMs: Math.max(
        backoffBaseMs,
        readNumber(
          env,
          "AI_BACKOFF_MAX_MS",
          z.coerce.number().int().min(0),
          DEFAULT_BACKOFF_MAX_MS,
        ),
      ),
    },
  };
}

export function loadCacheConfig(env: Env = process.env): CacheConfig {
  return {
    ttlMs: readNumber(env, "CACHE_TTL_MS", positiveInt, DEFAULT_CACHE_TTL_MS),
    maxEntries: readNumber(
      env,
      "CACHE_MAX_ENTRIES",
      positiveInt,
      DEFAULT_CACHE_MAX_ENTRIES,
    ),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readNumber(env, "PORT", positiveInt, DEFAULT_PORT),
    ai: loadAIConfig(env),
    cache: loadCacheConfig(env),
  };
}
