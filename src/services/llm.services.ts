import {
  ApiError,
  GoogleGenAI,
  type GenerateContentParameters,
} from "@google/genai";
import type { AIConfig } from "../utils/config";
import { SAFETY_SETTINGS } from "../utils/constants";
import {
  GatewayUnavailableError,
  PermanentRequestError,
  errorMessage,
} from "../utils/errors";
import { componentLogger } from "../utils/logger";

const log = componentLogger("llm-gateway");

/**
 * The slice of the Gemini SDK the gateway calls. `GoogleGenAI` satisfies it;
 * tests substitute an in-process fake.
 */
export interface GenerationClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<unknown>;
  };
}

export interface CompleteOptions {
  /* Aborts the call and any pending retry. */
  signal?: AbortSignal;
  /* Operation name carried into log records. */
  operation?: string;
}

class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Gemini call timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

function statusOf(error: unknown): number | undefined {
  return error instanceof ApiError ? error.status : undefined;
}

/* Timeouts, throttling and server errors may succeed on a later attempt. */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Outbound gateway to Gemini `generateContent`.
 *
 * Each attempt is bounded by the configured timeout. Transient failures
 * (network errors, timeouts, 408, 429, 5xx) are retried with exponential
 * backoff up to `maxAttempts` in total; any other HTTP error is final.
 * Without an API key the gateway never touches the network.
 */
export class LLMGateway {
  private readonly client: GenerationClient | null;

  constructor(
    private readonly config: AIConfig,
    client?: GenerationClient,
  ) {
    if (!config.apiKey) {
      this.client = null;
      return;
    }

    this.client =
      client ??
      new GoogleGenAI({
        apiKey: config.apiKey,
        httpOptions: config.baseUrl ? { baseUrl: config.baseUrl } : undefined,
      });
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  /* Delay before the attempt following `attempt` (1-based). */
  backoffDelay(attempt: number): number {
    const { backoffBaseMs, backoffMaxMs } = this.config.retry;
    return Math.min(backoffBaseMs * 2 ** (attempt - 1), backoffMaxMs);
  }

  /**
   * Upper bound on the time `complete` can take: every attempt timing out
   * plus every backoff delay between them.
   */
  get latencyCeilingMs(): number {
    const { maxAttempts, timeoutMs } = this.config.retry;
    let total = maxAttempts * timeoutMs;
    for (let attempt = 1; attempt < maxAttempts; attempt++) {
      total += this.backoffDelay(attempt);
    }
    return total;
  }

  /**
   * Sends the prompt and returns the raw response envelope.
   *
   * @throws GatewayUnavailableError when unconfigured, aborted, or every attempt failed transiently.
   * @throws PermanentRequestError when Gemini rejects the request itself.
   */
  async complete(prompt: string, options: CompleteOptions = {}): Promise<unknown> {
    const { client } = this;
    if (!client) {
      throw new GatewayUnavailableError("Gemini API key not configured", 0);
    }

    const { maxAttempts } = this.config.retry;
    const { signal, operation } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new GatewayUnavailableError("Gemini call aborted", attempt - 1, {
          cause: signal.reason,
        });
      }

      const started = Date.now();
      log.debug("Calling Gemini API", {
        operation,
        model: this.config.model,
        attempt,
        maxAttempts,
      });

      try {
        const response = await this.callOnce(client, prompt, signal);
        log.info("Gemini call succeeded", {
          operation,
          attempt,
          latencyMs: Date.now() - started,
        });
        return response;
      } catch (error) {
        const status = statusOf(error);

        if (status !== undefined && !isRetryableStatus(status)) {
          log.error("Gemini rejected the request", {
            operation,
            attempt,
            status,
            error: errorMessage(error),
          });
          throw new PermanentRequestError(
            `Gemini rejected the request with status ${status}`,
            status,
            { cause: error },
          );
        }

        if (signal?.aborted) {
          throw new GatewayUnavailableError("Gemini call aborted", attempt, {
            cause: error,
          });
        }

        lastError = error;
        log.warn("Gemini call failed", {
          operation,
          attempt,
          maxAttempts,
          status,
          latencyMs: Date.now() - started,
          error: errorMessage(error),
        });

        if (attempt < maxAttempts) {
          await sleep(this.backoffDelay(attempt), signal);
        }
      }
    }

    throw new GatewayUnavailableError(
      `Gemini unavailable after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
      maxAttempts,
      { cause: lastError },
    );
  }

  /**
   * One attempt, raced against the per-attempt timeout and the caller's signal.
   * Either one aborts the SDK request as well.
   */
  private async callOnce(
    client: GenerationClient,
    prompt: string,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const { timeoutMs } = this.config.retry;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const interrupted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(controller.signal.reason),
        { once: true },
      );
    });
    const timer = setTimeout(
      () => controller.abort(new AttemptTimeoutError(timeoutMs)),
      timeoutMs,
    );

    try {
      return await Promise.race([
        client.models.generateContent(
          this.buildRequest(prompt, controller.signal),
        ),
        interrupted,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private buildRequest(
    prompt: string,
    abortSignal: AbortSignal,
  ): GenerateContentParameters {
    const { temperature, maxOutputTokens, topK, topP } = this.config.generation;

    return {
      model: this.config.model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      config: {
        temperature,
        maxOutputTokens,
        topK,
        topP,
        safetySettings: SAFETY_SETTINGS,
        abortSignal,
      },
    };
  }
}
