import type { TaskErrorKind } from "./types";

type CauseOptions = { cause?: unknown };

export class ProviderError extends Error {
  rateLimited: boolean;
  statusCode?: number;
  retryAfterSeconds?: number;

  constructor(
    message: string,
    options?: CauseOptions & { rateLimited?: boolean; statusCode?: number; retryAfterSeconds?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.rateLimited = options?.rateLimited ?? false;
    this.statusCode = options?.statusCode;
    this.retryAfterSeconds = options?.retryAfterSeconds;
  }
}

export class StorageError extends Error {
  statusCode?: number;

  constructor(message: string, options?: CauseOptions & { statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.name = "StorageError";
    this.statusCode = options?.statusCode;
  }
}

export class GenerationError extends Error {
  rateLimited: boolean;
  attempts: number;

  constructor(message: string, options: CauseOptions & { rateLimited: boolean; attempts: number }) {
    super(message, { cause: options.cause });
    this.name = "GenerationError";
    this.rateLimited = options.rateLimited;
    this.attempts = options.attempts;
  }
}

export class UploadError extends Error {
  attempts: number;

  constructor(message: string, options: CauseOptions & { attempts: number }) {
    super(message, { cause: options.cause });
    this.name = "UploadError";
    this.attempts = options.attempts;
  }
}

export class SchedulerTimeoutError extends Error {
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Scheduler run exceeded deadline of ${timeoutMs}ms`);
    this.name = "SchedulerTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class TaskError extends Error {
  index: number;
  kind: TaskErrorKind;
  rateLimited: boolean;

  constructor(index: number, kind: TaskErrorKind, message: string, options?: CauseOptions & { rateLimited?: boolean }) {
    super(`Scene ${index}: ${message}`, { cause: options?.cause });
    this.name = "TaskError";
    this.index = index;
    this.kind = kind;
    this.rateLimited = options?.rateLimited ?? false;
  }
}

export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineConfigError";
  }
}

export function createAbortError(message = "Pipeline run aborted") {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown) {
  return error instanceof Error && error.name === "AbortError";
}

export function toErrorMessage(error: unknown, fallback: string) {
  if (error instanceof Error && error.message.trim()) return error.message;
  return fallback;
}
