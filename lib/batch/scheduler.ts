import { ensureNotAborted, linkAbortSignal, sleep as defaultSleep } from "./async";
import {
  GenerationError,
  isAbortError,
  TaskError,
  toErrorMessage,
  UploadError,
} from "./errors";
import { assertSchedulerPreconditions, ConcurrencyGate } from "./gate";
import { generateWithRetry } from "./imageTask";
import { effectiveConcurrency, type RateLimitFlag } from "./rateLimitFlag";
import { uploadWithRetry } from "./uploadStage";
import type {
  BatchWindow,
  ImageProvider,
  ImageUploader,
  PipelineConfig,
  SceneTask,
  ScheduleReport,
  SleepFn,
  TaskErrorKind,
  TaskOutcome,
  TaskPhase,
} from "./types";

type SettleAll = (promises: Promise<TaskOutcome>[]) => Promise<PromiseSettledResult<TaskOutcome>[]>;

export type SchedulerConfig = Pick<
  PipelineConfig,
  | "maxConcurrent"
  | "batchSize"
  | "maxRequestsPerMinute"
  | "maxAttempts"
  | "genericBackoffMs"
  | "rateLimitBackoffMs"
  | "promptMaxLength"
  | "rateLimitDivisor"
>;

export type SceneTaskDeps = {
  provider: ImageProvider;
  uploader: ImageUploader;
  rateLimitFlag: RateLimitFlag;
  config: SchedulerConfig;
  sleep?: SleepFn;
  onPhase?: (index: number, phase: TaskPhase) => void;
};

export type RunBatchesInput = SceneTaskDeps & {
  signal?: AbortSignal;
  onOutcome?: (outcome: TaskOutcome) => void;
  onBatch?: (window: BatchWindow, outcomes: TaskOutcome[]) => void;
  // join used for each batch; Promise.allSettled unless overridden
  settleAll?: SettleAll;
};

function chunkTasks<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function interBatchDelayMs(maxRequestsPerMinute: number, batchLength: number) {
  return Math.ceil((60_000 / Math.max(1, maxRequestsPerMinute)) * batchLength);
}

function failedOutcome(
  task: SceneTask,
  kind: TaskErrorKind,
  message: string,
  details: { startedAt: number; attempts?: number; uploadAttempts?: number; rateLimited?: boolean; cause?: unknown },
): TaskOutcome {
  const finishedAt = Date.now();
  const failure = new TaskError(task.index, kind, message, {
    rateLimited: details.rateLimited,
    cause: details.cause,
  });
  return {
    index: task.index,
    result: { ok: false, kind, error: failure.message, rateLimited: failure.rateLimited },
    attempts: details.attempts ?? 0,
    uploadAttempts: details.uploadAttempts ?? 0,
    elapsedMs: finishedAt - details.startedAt,
    startedAt: details.startedAt,
    finishedAt,
    failure,
  };
}

/**
 * One scene end to end: permit, generation with retries, upload with retries.
 * Always resolves; every failure is folded into the returned outcome.
 */
export async function runSceneTask(
  task: SceneTask,
  deps: SceneTaskDeps,
  options: { gate?: ConcurrencyGate; signal?: AbortSignal } = {},
): Promise<TaskOutcome> {
  const { config, onPhase } = deps;
  const { gate, signal } = options;
  const startedAt = Date.now();
  let attempts = 0;
  let uploadAttempts = 0;
  let release: (() => void) | null = null;
  onPhase?.(task.index, "created");

  try {
    release = gate ? await gate.acquire(signal) : null;
    onPhase?.(task.index, "generating");
    const generated = await generateWithRetry(task.prompt, {
      provider: deps.provider,
      rateLimitFlag: deps.rateLimitFlag,
      maxAttempts: config.maxAttempts,
      genericBackoffMs: config.genericBackoffMs,
      rateLimitBackoffMs: config.rateLimitBackoffMs,
      promptMaxLength: config.promptMaxLength,
      sleep: deps.sleep,
      signal,
      label: `scene ${task.index}`,
      onRetry: () => onPhase?.(task.index, "retrying"),
    });
    attempts = generated.attempts;

    onPhase?.(task.index, "uploading");
    const uploaded = await uploadWithRetry(generated.image, {
      uploader: deps.uploader,
      maxAttempts: config.maxAttempts,
      backoffMs: config.genericBackoffMs,
      sleep: deps.sleep,
      signal,
      filename: `${task.destinationTag}-scene-${task.index}.png`,
    });
    uploadAttempts = uploaded.attempts;
    onPhase?.(task.index, "uploaded");

    const finishedAt = Date.now();
    return {
      index: task.index,
      result: { ok: true, url: uploaded.url },
      attempts,
      uploadAttempts,
      elapsedMs: finishedAt - startedAt,
      startedAt,
      finishedAt,
    };
  } catch (error) {
    onPhase?.(task.index, "failed");
    if (error instanceof GenerationError) {
      return failedOutcome(task, "GENERATION", error.message, {
        startedAt,
        attempts: error.attempts,
        rateLimited: error.rateLimited,
        cause: error,
      });
    }
    if (error instanceof UploadError) {
      return failedOutcome(task, "UPLOAD", error.message, {
        startedAt,
        attempts,
        uploadAttempts: error.attempts,
        cause: error,
      });
    }
    if (isAbortError(error)) {
      return failedOutcome(task, "TIMEOUT", "Task aborted before completion", { startedAt, attempts, cause: error });
    }
    return failedOutcome(task, "SCHEDULER", toErrorMessage(error, "Unexpected task failure"), {
      startedAt,
      attempts,
      cause: error,
    });
  } finally {
    release?.();
  }
}

export async function runBatches(tasks: SceneTask[], input: RunBatchesInput): Promise<ScheduleReport> {
  const { config, rateLimitFlag, signal } = input;
  assertSchedulerPreconditions(config);
  const sleep = input.sleep ?? defaultSleep;
  const settleAll: SettleAll = input.settleAll ?? ((promises) => Promise.allSettled(promises));

  const batches = chunkTasks(tasks, config.batchSize);
  const gate = new ConcurrencyGate(config.maxConcurrent);
  const outcomesByIndex = new Map<number, TaskOutcome>();
  const windows: BatchWindow[] = [];

  for (let batchIndex = 0; batchIndex < batches.length; batchIndex++) {
    ensureNotAborted(signal);
    const batch = batches[batchIndex];
    const concurrency = effectiveConcurrency(config.maxConcurrent, rateLimitFlag, config.rateLimitDivisor);
    gate.setCapacity(concurrency);

    const startedAt = Date.now();
    const { controller, dispose } = linkAbortSignal(signal);
    let joinFailed = false;
    let batchOutcomes: TaskOutcome[];

    const launched = batch.map((task) =>
      runSceneTask(task, input, { gate, signal: controller.signal }).then((outcome) => {
        // outcomes of an abandoned batch were already reported as failures
        if (!joinFailed) input.onOutcome?.(outcome);
        return outcome;
      }),
    );

    try {
      const settled = await settleAll(launched);
      batchOutcomes = batch.map((task, i) => {
        const entry = settled[i];
        if (entry && entry.status === "fulfilled") return entry.value;
        const reason = entry && entry.status === "rejected" ? entry.reason : undefined;
        const outcome = failedOutcome(task, "SCHEDULER", toErrorMessage(reason, "Task settled without a result"), {
          startedAt,
          cause: reason,
        });
        input.onOutcome?.(outcome);
        return outcome;
      });
    } catch (error) {
      joinFailed = true;
      controller.abort();
      for (const pending of launched) pending.catch(() => null);
      console.error(`[batch] join for batch ${batchIndex + 1} failed; marking its tasks as failed:`, error);
      batchOutcomes = batch.map((task) => {
        const outcome = failedOutcome(task, "SCHEDULER", `Batch join failed: ${toErrorMessage(error, "unknown error")}`, {
          startedAt,
          cause: error,
        });
        input.onOutcome?.(outcome);
        return outcome;
      });
    } finally {
      dispose();
    }

    const finishedAt = Date.now();
    let successCount = 0;
    for (const outcome of batchOutcomes) {
      outcomesByIndex.set(outcome.index, outcome);
      if (outcome.result.ok) successCount += 1;
    }
    const window: BatchWindow = {
      batchIndex: batchIndex + 1,
      taskIndexes: batch.map((task) => task.index),
      effectiveConcurrency: concurrency,
      startedAt,
      finishedAt,
      successCount,
      failureCount: batchOutcomes.length - successCount,
      joinFailed,
    };
    windows.push(window);
    console.log(
      `[batch] batch ${window.batchIndex}/${batches.length} done in ${finishedAt - startedAt}ms: ` +
        `${window.successCount} ok, ${window.failureCount} failed (concurrency ${concurrency})`,
    );
    input.onBatch?.(window, batchOutcomes);

    if (batchIndex < batches.length - 1) {
      await sleep(interBatchDelayMs(config.maxRequestsPerMinute, batch.length), signal);
    }
  }

  return {
    outcomes: Array.from(outcomesByIndex.values()).sort((a, b) => a.index - b.index),
    batches: windows,
  };
}
