import { dispatch, ensureNotAborted, sleep as defaultSleep } from "./async";
import { createAbortError, toErrorMessage, UploadError } from "./errors";
import type { ImageUploader, SleepFn } from "./types";

export type UploadWithRetryInput = {
  uploader: ImageUploader;
  maxAttempts?: number;
  backoffMs?: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
  filename?: string;
};

export async function uploadWithRetry(
  image: Buffer,
  input: UploadWithRetryInput,
): Promise<{ url: string; attempts: number }> {
  const maxAttempts = Math.max(1, input.maxAttempts ?? 3);
  const backoffMs = input.backoffMs ?? 5_000;
  const sleep = input.sleep ?? defaultSleep;
  const { uploader, signal, filename } = input;

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    ensureNotAborted(signal);
    try {
      const url = await dispatch(() => uploader.upload(image, { signal, filename }));
      return { url, attempts: attempt };
    } catch (error) {
      if (signal?.aborted) {
        throw createAbortError();
      }
      lastError = error;
      console.warn(
        `[batch] upload of ${filename ?? "image"} attempt ${attempt}/${maxAttempts} failed: ${toErrorMessage(error, "unknown error")}`,
      );
      if (attempt >= maxAttempts) break;
      await sleep(backoffMs * attempt, signal);
    }
  }

  throw new UploadError(`Upload failed after ${maxAttempts} attempts: ${toErrorMessage(lastError, "unknown error")}`, {
    attempts: maxAttempts,
    cause: lastError,
  });
}
