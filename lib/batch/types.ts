import type { TaskError } from "./errors";

export const SKIPPED = "skipped" as const;
export type Skipped = typeof SKIPPED;

export type TaskErrorKind = "GENERATION" | "UPLOAD" | "TIMEOUT" | "SCHEDULER";
export type ProgressStatus = "pending_approval" | "completed" | "failed";
export type RunMode = "concurrent" | "sequential";

export type SceneTask = {
  // 1-based scene number
  index: number;
  prompt: string;
  destinationTag: string;
};

export type TaskResult =
  | { ok: true; url: string }
  | {
      ok: false;
      kind: TaskErrorKind;
      error: string;
      rateLimited: boolean;
    };

export type TaskPhase = "created" | "generating" | "retrying" | "uploading" | "uploaded" | "failed";

export type TaskOutcome = {
  index: number;
  result: TaskResult;
  // generation attempts; upload attempts are counted separately
  attempts: number;
  uploadAttempts: number;
  elapsedMs: number;
  startedAt: number;
  finishedAt: number;
  // failed outcomes keep the error with its cause chain; never serialized
  failure?: TaskError;
};

export type BatchWindow = {
  batchIndex: number;
  taskIndexes: number[];
  effectiveConcurrency: number;
  startedAt: number;
  finishedAt: number;
  successCount: number;
  failureCount: number;
  joinFailed: boolean;
};

export type ScheduleReport = {
  outcomes: TaskOutcome[];
  batches: BatchWindow[];
};

export type ProgressEvent = {
  index: number;
  status: ProgressStatus;
  imageUrl: string | null;
  cumulativeCompleted: number;
  total: number;
  error?: string;
};

export type RunMetrics = {
  total: number;
  succeeded: number;
  failed: number;
  rateLimited: number;
  retries: number;
  batches: number;
  averageTaskMs: number;
  slowestTaskMs: number;
  wallClockMs: number;
  imagesPerMinute: number;
};

export type StoryRunResult = {
  images: Array<string | Skipped>;
  mode: RunMode;
  concurrentAttempts: number;
  metrics: RunMetrics;
  batches: BatchWindow[];
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type ProviderCallOptions = {
  signal?: AbortSignal;
};

export interface ImageProvider {
  generateImage(prompt: string, options?: ProviderCallOptions): Promise<Buffer>;
}

export interface ImageUploader {
  upload(image: Buffer, options?: ProviderCallOptions & { filename?: string }): Promise<string>;
}

export type NotifyFn = (channelId: string, event: ProgressEvent) => void | Promise<void>;

export type PipelineConfig = {
  maxConcurrent: number;
  batchSize: number;
  maxRequestsPerMinute: number;
  maxAttempts: number;
  overallDeadlineMs: number;
  runRetries: number;
  runRetryDelayMs: number;
  genericBackoffMs: number;
  rateLimitBackoffMs: number;
  promptMaxLength: number;
  rateLimitDivisor: number;
  rateLimitResetMs: number | null;
  requireApproval: boolean;
};
