import { z } from "zod";
import { createAbortError, isAbortError, ProviderError, toErrorMessage } from "../batch/errors";
import type { ImageProvider, ProviderCallOptions } from "../batch/types";
import { type FetchLike, parseJsonBody, parseRetryAfterSeconds, requestSignal } from "./http";
import { inspectImage } from "./imageInspect";

const DEFAULT_BASE_URL = "https://api.openai.com";
const DEFAULT_MODEL = "gpt-image-1";
const DEFAULT_SIZE = "1024x1024";
const DEFAULT_TIMEOUT_MS = 180_000;

const imagesResponseSchema = z.object({
  data: z
    .array(
      z.object({
        b64_json: z.string().min(1).optional(),
        url: z.string().url().optional(),
      }),
    )
    .min(1),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.string().nullable().optional(),
    type: z.string().nullable().optional(),
  }),
});

export type OpenAIImageProviderOptions = {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  size?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

function describeErrorBody(status: number, responseText: string) {
  const parsed = errorBodySchema.safeParse(parseJsonBody(responseText));
  if (!parsed.success) {
    return { message: `Image API ${status}: ${responseText.slice(0, 300)}`, code: null };
  }
  const { message, code, type } = parsed.data.error;
  return { message: `Image API ${status}: ${message ?? type ?? "unknown error"}`, code: code ?? type ?? null };
}

export class OpenAIImageProvider implements ImageProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly size: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIImageProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.model = options.model ?? DEFAULT_MODEL;
    this.size = options.size ?? DEFAULT_SIZE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generateImage(prompt: string, options: ProviderCallOptions = {}): Promise<Buffer> {
    const request = requestSignal(this.timeoutMs, options.signal);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/v1/images/generations`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.model, prompt, size: this.size, n: 1 }),
        signal: request.signal,
      });

      const responseText = await response.text();
      if (!response.ok) {
        const described = describeErrorBody(response.status, responseText);
        throw new ProviderError(described.message, {
          statusCode: response.status,
          rateLimited: response.status === 429 || described.code === "rate_limit_exceeded",
          retryAfterSeconds: parseRetryAfterSeconds(response),
        });
      }

      const parsed = imagesResponseSchema.safeParse(parseJsonBody(responseText));
      if (!parsed.success) {
        throw new ProviderError(`Image API returned an unexpected body: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
          statusCode: response.status,
        });
      }

      const [first] = parsed.data.data;
      let image: Buffer;
      if (first?.b64_json) {
        image = Buffer.from(first.b64_json, "base64");
      } else if (first?.url) {
        image = await this.download(first.url, request.signal);
      } else {
        throw new ProviderError("Image API response carried neither b64_json nor url");
      }

      await inspectImage(image);
      return image;
    } catch (error) {
      if (isAbortError(error)) {
        if (request.timedOut()) {
          throw new ProviderError(`Image generation timed out after ${this.timeoutMs}ms`, {
            statusCode: 504,
            cause: error,
          });
        }
        throw createAbortError("Image generation aborted");
      }
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Image generation request failed: ${toErrorMessage(error, "unknown error")}`, {
        cause: error,
      });
    } finally {
      request.dispose();
    }
  }

  private async download(url: string, signal: AbortSignal): Promise<Buffer> {
    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      throw new ProviderError(`Image download ${response.status}`, { statusCode: response.status });
    }
    return Buffer.from(await response.arrayBuffer());
  }
}
