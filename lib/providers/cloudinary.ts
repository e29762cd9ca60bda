import { z } from "zod";
import { createAbortError, isAbortError, StorageError, toErrorMessage } from "../batch/errors";
import type { ImageUploader, ProviderCallOptions } from "../batch/types";
import { type FetchLike, parseJsonBody, requestSignal } from "./http";

const DEFAULT_TIMEOUT_MS = 60_000;

const uploadResponseSchema = z.object({
  secure_url: z.string().url(),
});

export type CloudinaryUploaderOptions = {
  // account API root, e.g. https://api.cloudinary.com/v1_1/<cloud>/
  url: string;
  preset: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

export function cloudinaryUploadEndpoint(url: string) {
  return `${url.replace(/\/+$/, "")}/image/upload`;
}

export class CloudinaryUploader implements ImageUploader {
  private readonly endpoint: string;
  private readonly preset: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: CloudinaryUploaderOptions) {
    this.endpoint = cloudinaryUploadEndpoint(options.url);
    this.preset = options.preset;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async upload(image: Buffer, options: ProviderCallOptions & { filename?: string } = {}): Promise<string> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(image)], { type: "image/png" }), options.filename ?? "image.png");
    form.append("upload_preset", this.preset);

    const request = requestSignal(this.timeoutMs, options.signal);
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        body: form,
        signal: request.signal,
      });
      const responseText = await response.text();
      if (!response.ok) {
        throw new StorageError(`Image storage ${response.status}: ${responseText.slice(0, 300)}`, {
          statusCode: response.status,
        });
      }
      const parsed = uploadResponseSchema.safeParse(parseJsonBody(responseText));
      if (!parsed.success) {
        throw new StorageError("Image storage response did not include secure_url", { statusCode: response.status });
      }
      return parsed.data.secure_url;
    } catch (error) {
      if (isAbortError(error)) {
        if (request.timedOut()) {
          throw new StorageError(`Image upload timed out after ${this.timeoutMs}ms`, { statusCode: 504, cause: error });
        }
        throw createAbortError("Image upload aborted");
      }
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Image upload failed: ${toErrorMessage(error, "unknown error")}`, { cause: error });
    } finally {
      request.dispose();
    }
  }
}
