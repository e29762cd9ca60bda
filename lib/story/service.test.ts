import assert from "node:assert/strict";
import test from "node:test";
import { RateLimitFlag } from "../batch/rateLimitFlag";
import type { ImageProvider, ImageUploader, PipelineConfig, SleepFn } from "../batch/types";
import { StoryService } from "./service";

const noSleep: SleepFn = async () => {};

function pipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    maxConcurrent: 10,
    batchSize: 5,
    maxRequestsPerMinute: 15,
    maxAttempts: 3,
    overallDeadlineMs: 60_000,
    runRetries: 2,
    runRetryDelayMs: 0,
    genericBackoffMs: 0,
    rateLimitBackoffMs: 0,
    promptMaxLength: 1000,
    rateLimitDivisor: 2,
    rateLimitResetMs: null,
    requireApproval: false,
    ...overrides,
  };
}

const provider: ImageProvider = {
  async generateImage(prompt) {
    if (prompt === "a stormy sea") throw new Error("content rejected");
    return Buffer.from(prompt);
  },
};

const uploader: ImageUploader = {
  async upload(_image, options) {
    return `https://cdn.test/${options?.filename ?? "image.png"}`;
  },
};

function createService(overrides: Partial<PipelineConfig> = {}) {
  return new StoryService({
    provider,
    uploader,
    config: pipelineConfig(overrides),
    rateLimitFlag: new RateLimitFlag(),
    sleep: noSleep,
    createId: () => "story-1",
  });
}

test("startStory returns at once and the run completes in the background", async () => {
  const service = createService();
  const { storyId } = service.startStory({ scenes: ["a sunny field", "a stormy sea", "a starry night"] });

  assert.equal(storyId, "story-1");
  assert.equal(service.isRunning(storyId), true);
  assert.equal(service.sessions.get(storyId)?.status, "processing");

  await service.waitFor(storyId);

  const session = service.sessions.get(storyId);
  assert.ok(session);
  assert.equal(session.status, "completed");
  assert.deepEqual(session.results, ["https://cdn.test/story-1-scene-1.png", "skipped", "https://cdn.test/story-1-scene-3.png"]);
  assert.equal(session.completedScenes, 2);
  assert.equal(session.images[2]?.status, "failed");
  assert.equal(service.isRunning(storyId), false);

  const history = service.events.history(storyId);
  assert.deepEqual(
    history.map((event) => event.type),
    ["image_ready", "image_ready", "image_ready", "story_complete"],
  );
  const last = history[history.length - 1];
  assert.ok(last?.type === "story_complete");
  assert.deepEqual(last.data.images, session.results);
  assert.equal(service.events.isClosed(storyId), true);
});

test("a story that cannot run ends with story_error", async () => {
  const service = createService({ maxConcurrent: 2, batchSize: 3 });
  const { storyId } = service.startStory({ scenes: ["a sunny field"] });
  await service.waitFor(storyId);

  const session = service.sessions.get(storyId);
  assert.ok(session);
  assert.equal(session.status, "failed");
  assert.equal(session.error, "batchSize (3) must not exceed maxConcurrent (2)");

  const history = service.events.history(storyId);
  assert.equal(history.length, 1);
  assert.deepEqual(history[0].data, { status: "failed", error: "batchSize (3) must not exceed maxConcurrent (2)" });
});
