import assert from "node:assert/strict";
import test from "node:test";
import { GenerationError, ProviderError } from "./errors";
import { generateWithRetry, generationBackoffMs, isRateLimitError } from "./imageTask";
import { RateLimitFlag } from "./rateLimitFlag";
import type { ImageProvider, SleepFn } from "./types";

function recordingSleep() {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

function scriptedProvider(failures: unknown[]) {
  const prompts: string[] = [];
  const provider: ImageProvider = {
    async generateImage(prompt) {
      prompts.push(prompt);
      const failure = failures.shift();
      if (failure !== undefined) throw failure;
      return Buffer.from("png-bytes");
    },
  };
  return { provider, prompts };
}

test("two generic failures then success: three attempts with 5s and 10s backoff", async () => {
  const { delays, sleep } = recordingSleep();
  const { provider, prompts } = scriptedProvider([new Error("upstream 500"), new Error("upstream 500")]);
  const flag = new RateLimitFlag();

  const result = await generateWithRetry("The bear fights the storm", {
    provider,
    rateLimitFlag: flag,
    promptMaxLength: 20,
    sleep,
  });

  assert.equal(result.attempts, 3);
  assert.equal(result.image.toString(), "png-bytes");
  assert.deepEqual(delays, [5_000, 10_000]);
  assert.deepEqual(prompts, [
    "The bear fights the storm",
    "The bear challenges the storm",
    "The bear chall [...]",
  ]);
  assert.equal(flag.isSet(), false);
});

test("rate-limited failures back off 30s per attempt and trip the shared flag", async () => {
  const { delays, sleep } = recordingSleep();
  const { provider } = scriptedProvider([
    new ProviderError("Image API 429: slow down", { statusCode: 429, rateLimited: true }),
    new ProviderError("Image API 429: slow down", { statusCode: 429, rateLimited: true }),
  ]);
  const flag = new RateLimitFlag();

  const result = await generateWithRetry("a calm lake", { provider, rateLimitFlag: flag, sleep });

  assert.equal(result.attempts, 3);
  assert.deepEqual(delays, [30_000, 60_000]);
  assert.equal(flag.isSet(), true);
});

test("exhausted attempts reject with GenerationError carrying the last classification", async () => {
  const { delays, sleep } = recordingSleep();
  const { provider } = scriptedProvider([
    new Error("upstream 500"),
    new Error("upstream 500"),
    new Error("Too Many Requests"),
  ]);
  const flag = new RateLimitFlag();

  await assert.rejects(
    generateWithRetry("a calm lake", { provider, rateLimitFlag: flag, sleep }),
    (error: unknown) =>
      error instanceof GenerationError &&
      error.attempts === 3 &&
      error.rateLimited === true &&
      error.message === "Image generation failed after 3 attempts: Too Many Requests",
  );
  assert.deepEqual(delays, [5_000, 10_000]);
  assert.equal(flag.isSet(), true);
});

test("a synchronous provider throw is retried like any other failure", async () => {
  const { sleep } = recordingSleep();
  let calls = 0;
  const provider: ImageProvider = {
    generateImage() {
      calls += 1;
      if (calls === 1) throw new Error("sync failure");
      return Promise.resolve(Buffer.from("ok"));
    },
  };

  const result = await generateWithRetry("prompt", { provider, rateLimitFlag: new RateLimitFlag(), sleep });
  assert.equal(result.attempts, 2);
});

test("the provider call is never made inline by the caller", async () => {
  const { provider, prompts } = scriptedProvider([]);
  const pending = generateWithRetry("prompt", { provider, rateLimitFlag: new RateLimitFlag() });
  assert.equal(prompts.length, 0);
  await pending;
  assert.equal(prompts.length, 1);
});

test("rate limit classification covers status codes and messages", () => {
  assert.equal(isRateLimitError(new ProviderError("quota", { statusCode: 429 })), true);
  assert.equal(isRateLimitError(new ProviderError("bad request", { statusCode: 400 })), false);
  assert.equal(isRateLimitError(new Error("rate_limit_exceeded")), true);
  assert.equal(isRateLimitError(new Error("socket hang up")), false);
  assert.equal(isRateLimitError("429"), false);
});

test("a provider Retry-After longer than the schedule wins", () => {
  const options = { genericBackoffMs: 5_000, rateLimitBackoffMs: 30_000 };
  const error = new ProviderError("slow down", { rateLimited: true, retryAfterSeconds: 90 });
  assert.equal(generationBackoffMs(1, error, options), 90_000);
  assert.equal(generationBackoffMs(4, error, options), 120_000);
  assert.equal(generationBackoffMs(2, new Error("boom"), options), 10_000);
});
