import assert from "node:assert/strict";
import test from "node:test";
import { ProgressReporter } from "./progress";
import type { ProgressEvent, TaskOutcome } from "./types";

function success(index: number, url: string): TaskOutcome {
  return { index, result: { ok: true, url }, attempts: 1, uploadAttempts: 1, elapsedMs: 5, startedAt: 0, finishedAt: 5 };
}

function failure(index: number, error: string): TaskOutcome {
  return {
    index,
    result: { ok: false, kind: "GENERATION", error, rateLimited: false },
    attempts: 3,
    uploadAttempts: 0,
    elapsedMs: 5,
    startedAt: 0,
    finishedAt: 5,
  };
}

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

test("each report carries the running completed count", () => {
  const events: Array<[string, ProgressEvent]> = [];
  const reporter = new ProgressReporter({
    channelId: "story-1",
    total: 3,
    notify: (channelId, event) => {
      events.push([channelId, event]);
    },
  });

  reporter.report(success(2, "https://cdn.test/2.png"));
  reporter.report(failure(1, "Scene 1: Image generation failed after 3 attempts: boom"));
  reporter.report(success(3, "https://cdn.test/3.png"));

  assert.deepEqual(events, [
    ["story-1", { index: 2, status: "completed", imageUrl: "https://cdn.test/2.png", cumulativeCompleted: 1, total: 3 }],
    [
      "story-1",
      {
        index: 1,
        status: "failed",
        imageUrl: null,
        cumulativeCompleted: 1,
        total: 3,
        error: "Scene 1: Image generation failed after 3 attempts: boom",
      },
    ],
    ["story-1", { index: 3, status: "completed", imageUrl: "https://cdn.test/3.png", cumulativeCompleted: 2, total: 3 }],
  ]);
  assert.equal(reporter.cumulativeCompleted, 2);
});

test("a scene reported twice is counted once", () => {
  const reporter = new ProgressReporter({ channelId: "story-1", total: 2, notify: () => {} });
  reporter.report(success(1, "https://cdn.test/1.png"));
  reporter.report(success(1, "https://cdn.test/1.png"));
  assert.equal(reporter.cumulativeCompleted, 1);
});

test("approval mode announces successes as pending_approval", () => {
  const statuses: string[] = [];
  const reporter = new ProgressReporter({
    channelId: "story-1",
    total: 1,
    requireApproval: true,
    notify: (_channelId, event) => {
      statuses.push(event.status);
    },
  });
  reporter.report(success(1, "https://cdn.test/1.png"));
  assert.deepEqual(statuses, ["pending_approval"]);
  assert.equal(reporter.cumulativeCompleted, 1);
});

test("channel failures never reach the caller", async () => {
  const throwing = new ProgressReporter({
    channelId: "story-1",
    total: 1,
    notify: () => {
      throw new Error("channel closed");
    },
  });
  assert.doesNotThrow(() => throwing.report(success(1, "https://cdn.test/1.png")));

  const rejecting = new ProgressReporter({
    channelId: "story-1",
    total: 1,
    notify: async () => {
      throw new Error("channel closed");
    },
  });
  assert.doesNotThrow(() => rejecting.report(success(1, "https://cdn.test/1.png")));
  await delay(5);
  assert.equal(rejecting.cumulativeCompleted, 1);
});
