import { HarmBlockThreshold, HarmCategory, type SafetySetting } from "@google/genai";

// Google Gemini Configuration
export const DEFAULT_GEMINI_MODEL_NAME = "gemini-2.0-flash";
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
export const DEFAULT_TOP_K = 40;
export const DEFAULT_TOP_P = 0.95;

// Outbound call policy
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1_000;
export const DEFAULT_BACKOFF_MAX_MS = 8_000;

// Recommendation cache
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_CACHE_MAX_ENTRIES = 500;

// HTTP
export const DEFAULT_PORT = 3000;

/* Placeholder rendered in prompts for every absent value. */
export const NOT_SPECIFIED = "Not specified";

/* Safety thresholds sent with every generation request. */
export const SAFETY_SETTINGS: SafetySetting[] = [
  {
    category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
  },
  {
    category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
    threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
  },
  {
    category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
    threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
  },
  {
    category: HarmCategory.HARM_CATEGORY_HARASSMENT,
    threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
  },
];
