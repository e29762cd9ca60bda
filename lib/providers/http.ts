import { linkAbortSignal } from "../batch/async";

export type FetchLike = typeof fetch;

export function parseRetryAfterSeconds(response: Response): number | undefined {
  const retryAfterRaw = response.headers.get("retry-after");
  if (!retryAfterRaw) return undefined;
  const seconds = Number(retryAfterRaw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Abort signal for one outbound request: fires when the caller aborts or when
 * `timeoutMs` elapses. `timedOut()` tells the two apart afterwards.
 */
export function requestSignal(timeoutMs: number, parent?: AbortSignal) {
  const { controller, dispose } = linkAbortSignal(parent);
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timeoutId);
      dispose();
    },
  };
}
