import { ensureNotAborted, sleep as defaultSleep, withDeadline } from "./async";
import { PipelineConfigError, toErrorMessage } from "./errors";
import { summarizeRun } from "./metrics";
import { ProgressReporter } from "./progress";
import { getProcessRateLimitFlag, type RateLimitFlag } from "./rateLimitFlag";
import { runBatches, runSceneTask, type RunBatchesInput } from "./scheduler";
import {
  SKIPPED,
  type BatchWindow,
  type ImageProvider,
  type ImageUploader,
  type NotifyFn,
  type PipelineConfig,
  type RunMode,
  type SceneTask,
  type SleepFn,
  type StoryRunResult,
  type TaskOutcome,
  type TaskPhase,
} from "./types";

export type RunStoryInput = {
  storyId: string;
  provider: ImageProvider;
  uploader: ImageUploader;
  config: PipelineConfig;
  rateLimitFlag?: RateLimitFlag;
  notify?: NotifyFn;
  sleep?: SleepFn;
  signal?: AbortSignal;
  onPhase?: (index: number, phase: TaskPhase) => void;
  settleAll?: RunBatchesInput["settleAll"];
};

export function buildSceneTasks(scenes: string[], destinationTag: string): SceneTask[] {
  return scenes.map((prompt, i) => ({ index: i + 1, prompt, destinationTag }));
}

/**
 * Turns an ordered scene list into an ordered image list of the same length.
 *
 * The concurrent scheduler runs under the overall deadline; a timeout or scheduler
 * fault re-runs the scenes that still lack an image, up to `runRetries` more times,
 * and then the remainder is processed one scene at a time. Scenes that never
 * produce an image come back as "skipped".
 */
export async function runStory(scenes: string[], input: RunStoryInput): Promise<StoryRunResult> {
  const { config, storyId } = input;
  const startedAt = Date.now();
  const tasks = buildSceneTasks(scenes, storyId);
  const sleep = input.sleep ?? defaultSleep;
  const rateLimitFlag = input.rateLimitFlag ?? getProcessRateLimitFlag(config.rateLimitResetMs);
  const reporter = new ProgressReporter({
    channelId: storyId,
    total: tasks.length,
    notify: input.notify ?? (() => {}),
    requireApproval: config.requireApproval,
  });

  // written only from this coordinating function, never by tasks
  const ledger = new Map<number, string>();
  const outcomesByIndex = new Map<number, TaskOutcome>();
  const windows: BatchWindow[] = [];
  let concurrentAttempts = 0;

  const fold = (outcome: TaskOutcome) => {
    // an image already in the ledger stands
    if (!outcome.result.ok && ledger.has(outcome.index)) return;
    outcomesByIndex.set(outcome.index, outcome);
    if (outcome.result.ok) ledger.set(outcome.index, outcome.result.url);
  };
  const remaining = () => tasks.filter((task) => !ledger.has(task.index));

  const finish = (mode: RunMode): StoryRunResult => {
    const outcomes = Array.from(outcomesByIndex.values()).sort((a, b) => a.index - b.index);
    const metrics = summarizeRun(outcomes, windows, Date.now() - startedAt);
    const images = tasks.map((task) => ledger.get(task.index) ?? SKIPPED);
    console.log(
      `[story] ${storyId} finished (${mode}): ${metrics.succeeded}/${tasks.length} images, ` +
        `${metrics.retries} retries, ${metrics.wallClockMs}ms`,
    );
    return { images, mode, concurrentAttempts, metrics, batches: windows };
  };

  const maxConcurrentRuns = Math.max(0, config.runRetries) + 1;
  for (let run = 1; run <= maxConcurrentRuns; run++) {
    const pending = remaining();
    if (pending.length === 0) break;
    concurrentAttempts = run;
    let current = true;
    try {
      await withDeadline(
        (signal) =>
          runBatches(pending, {
            provider: input.provider,
            uploader: input.uploader,
            config,
            rateLimitFlag,
            sleep,
            signal,
            onPhase: input.onPhase,
            settleAll: input.settleAll,
            onOutcome: (outcome) => {
              if (!current) return;
              // a success counts at once, so a run cut short by the deadline keeps it
              if (outcome.result.ok) fold(outcome);
              reporter.report(outcome);
            },
            onBatch: (window, outcomes) => {
              // a run abandoned at its deadline may still finish batches later
              if (!current) return;
              windows.push(window);
              for (const outcome of outcomes) fold(outcome);
            },
          }),
        config.overallDeadlineMs,
        input.signal,
      );
      ensureNotAborted(input.signal);
      current = false;
      return finish("concurrent");
    } catch (error) {
      current = false;
      // cancellation and misconfiguration propagate without another run
      if (input.signal?.aborted || error instanceof PipelineConfigError) throw error;
      console.error(
        `[story] concurrent run ${run}/${maxConcurrentRuns} for ${storyId} failed: ${toErrorMessage(error, "unknown error")}`,
      );
      if (run < maxConcurrentRuns) {
        await sleep(config.runRetryDelayMs, input.signal);
      }
    }
  }

  const leftovers = remaining();
  if (leftovers.length === 0) {
    return finish("concurrent");
  }

  console.warn(`[story] ${storyId}: processing ${leftovers.length} remaining scene(s) sequentially`);
  for (const task of leftovers) {
    ensureNotAborted(input.signal);
    const outcome = await runSceneTask(
      task,
      {
        provider: input.provider,
        uploader: input.uploader,
        rateLimitFlag,
        config,
        sleep,
        onPhase: input.onPhase,
      },
      { signal: input.signal },
    );
    fold(outcome);
    reporter.report(outcome);
  }
  return finish("sequential");
}
