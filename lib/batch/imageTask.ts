import { dispatch, ensureNotAborted, sleep as defaultSleep } from "./async";
import { createAbortError, GenerationError, ProviderError, toErrorMessage } from "./errors";
import type { RateLimitFlag } from "./rateLimitFlag";
import { DEFAULT_PROMPT_MAX_LENGTH, preparePromptForAttempt } from "./sanitize";
import type { ImageProvider, SleepFn } from "./types";

export type GenerateWithRetryInput = {
  provider: ImageProvider;
  rateLimitFlag: RateLimitFlag;
  maxAttempts?: number;
  genericBackoffMs?: number;
  rateLimitBackoffMs?: number;
  promptMaxLength?: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
  label?: string;
  onRetry?: (nextAttempt: number, error: unknown) => void;
};

export type GenerateWithRetryResult = {
  image: Buffer;
  attempts: number;
  prompt: string;
};

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.rateLimited || error.statusCode === 429;
  }
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return (
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("rate_limit") ||
    message.includes("too many requests")
  );
}

function retryAfterMsFromUnknown(error: unknown): number | null {
  if (error instanceof ProviderError && typeof error.retryAfterSeconds === "number" && error.retryAfterSeconds > 0) {
    return error.retryAfterSeconds * 1000;
  }
  return null;
}

/**
 * Delay before the attempt after `attempt`. Rate-limited failures wait an order of
 * magnitude longer than generic ones and never less than a provider Retry-After.
 */
export function generationBackoffMs(
  attempt: number,
  error: unknown,
  options: { genericBackoffMs: number; rateLimitBackoffMs: number },
): number {
  if (!isRateLimitError(error)) {
    return options.genericBackoffMs * attempt;
  }
  const scheduled = options.rateLimitBackoffMs * attempt;
  return Math.max(scheduled, retryAfterMsFromUnknown(error) ?? 0);
}

export async function generateWithRetry(prompt: string, input: GenerateWithRetryInput): Promise<GenerateWithRetryResult> {
  const maxAttempts = Math.max(1, input.maxAttempts ?? 3);
  const backoff = {
    genericBackoffMs: input.genericBackoffMs ?? 5_000,
    rateLimitBackoffMs: input.rateLimitBackoffMs ?? 30_000,
  };
  const promptMaxLength = input.promptMaxLength ?? DEFAULT_PROMPT_MAX_LENGTH;
  const sleep = input.sleep ?? defaultSleep;
  const { provider, rateLimitFlag, signal } = input;
  const label = input.label ?? "image";

  let lastError: unknown = null;
  let lastRateLimited = false;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    ensureNotAborted(signal);
    const attemptPrompt = preparePromptForAttempt(prompt, attempt, promptMaxLength);
    try {
      const image = await dispatch(() => provider.generateImage(attemptPrompt, { signal }));
      return { image, attempts: attempt, prompt: attemptPrompt };
    } catch (error) {
      if (signal?.aborted) {
        throw createAbortError();
      }
      lastError = error;
      lastRateLimited = isRateLimitError(error);
      if (lastRateLimited) {
        rateLimitFlag.trip();
      }
      console.warn(
        `[batch] ${label} generation attempt ${attempt}/${maxAttempts} failed` +
          ` (${lastRateLimited ? "rate limited" : "generic"}): ${toErrorMessage(error, "unknown error")}`,
      );
      if (attempt >= maxAttempts) break;
      input.onRetry?.(attempt + 1, error);
      await sleep(generationBackoffMs(attempt, error, backoff), signal);
    }
  }

  throw new GenerationError(
    `Image generation failed after ${maxAttempts} attempts: ${toErrorMessage(lastError, "unknown error")}`,
    { rateLimited: lastRateLimited, attempts: maxAttempts, cause: lastError },
  );
}
