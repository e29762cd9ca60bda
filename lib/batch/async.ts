import { createAbortError, SchedulerTimeoutError } from "./errors";
import type { SleepFn } from "./types";

export function ensureNotAborted(signal?: AbortSignal) {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

export const sleep: SleepFn = async (ms, signal) => {
  ensureNotAborted(signal);
  if (ms <= 0) return;
  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      reject(createAbortError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

/**
 * Starts a provider call on a later macrotask and hands back its promise.
 *
 * Every I/O-bound collaborator goes through here, so the caller's launch loop
 * never runs a provider call inline: all sibling tasks of a batch are started
 * before the first call begins, and a synchronous throw surfaces as a rejection
 * on the caller's await instead of unwinding the scheduler.
 */
export function dispatch<T>(call: () => Promise<T> | T): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    setImmediate(() => {
      Promise.resolve()
        .then(call)
        .then(resolve, reject);
    });
  });
}

/** Child controller that aborts when any parent does. Call `dispose` once the child is done. */
export function linkAbortSignal(parent?: AbortSignal) {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => {} };
  }
  if (parent.aborted) {
    controller.abort();
    return { controller, dispose: () => {} };
  }
  const onAbort = () => controller.abort();
  parent.addEventListener("abort", onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener("abort", onAbort),
  };
}

/**
 * Runs `work` against an abort signal that fires after `timeoutMs`.
 * The returned promise rejects with SchedulerTimeoutError as soon as the deadline passes,
 * without waiting for `work` to observe the abort.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const { controller, dispose } = linkAbortSignal(parent);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SchedulerTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  const running = work(controller.signal);
  // the losing side of the race must not surface as an unhandled rejection
  running.catch(() => null);
  try {
    return await Promise.race([running, deadline]);
  } finally {
    clearTimeout(timer);
    dispose();
  }
}
