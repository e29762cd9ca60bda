import type { BatchWindow, RunMetrics, TaskOutcome } from "./types";

function round2(value: number) {
  return Math.round(value * 100) / 100;
}

export function summarizeRun(outcomes: TaskOutcome[], batches: BatchWindow[], wallClockMs: number): RunMetrics {
  let succeeded = 0;
  let rateLimited = 0;
  let retries = 0;
  let totalTaskMs = 0;
  let slowestTaskMs = 0;

  for (const outcome of outcomes) {
    if (outcome.result.ok) succeeded += 1;
    else if (outcome.result.rateLimited) rateLimited += 1;
    retries += Math.max(0, outcome.attempts - 1) + Math.max(0, outcome.uploadAttempts - 1);
    totalTaskMs += outcome.elapsedMs;
    slowestTaskMs = Math.max(slowestTaskMs, outcome.elapsedMs);
  }

  return {
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    rateLimited,
    retries,
    batches: batches.length,
    averageTaskMs: outcomes.length > 0 ? Math.round(totalTaskMs / outcomes.length) : 0,
    slowestTaskMs,
    wallClockMs,
    imagesPerMinute: wallClockMs > 0 ? round2(succeeded / (wallClockMs / 60_000)) : 0,
  };
}
