import { z } from "zod";
import { PipelineConfigError } from "./batch/errors";
import type { PipelineConfig } from "./batch/types";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const pipelineEnvSchema = z
  .object({
    PIPELINE_MAX_CONCURRENT: positiveInt(10),
    PIPELINE_BATCH_SIZE: positiveInt(5),
    PIPELINE_MAX_REQUESTS_PER_MIN: positiveInt(15),
    PIPELINE_MAX_ATTEMPTS: positiveInt(3),
    PIPELINE_DEADLINE_MS: positiveInt(600_000),
    PIPELINE_RUN_RETRIES: nonNegativeInt(2),
    PIPELINE_RUN_RETRY_DELAY_MS: nonNegativeInt(10_000),
    PIPELINE_GENERIC_BACKOFF_MS: nonNegativeInt(5_000),
    PIPELINE_RATE_LIMIT_BACKOFF_MS: nonNegativeInt(30_000),
    PIPELINE_PROMPT_MAX_LENGTH: z.coerce.number().int().min(16).default(1000),
    PIPELINE_RATE_LIMIT_DIVISOR: z.coerce.number().int().min(1).default(2),
    PIPELINE_RATE_LIMIT_RESET_MS: z.coerce.number().int().positive().optional(),
    PIPELINE_REQUIRE_APPROVAL: booleanFlag,
  })
  .refine((env) => env.PIPELINE_BATCH_SIZE <= env.PIPELINE_MAX_CONCURRENT, {
    message: "PIPELINE_BATCH_SIZE must not exceed PIPELINE_MAX_CONCURRENT",
    path: ["PIPELINE_BATCH_SIZE"],
  });

const providerEnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com"),
  OPENAI_IMAGE_MODEL: z.string().default("gpt-image-1"),
  OPENAI_IMAGE_SIZE: z
    .string()
    .regex(/^\d+x\d+$/, "expected WIDTHxHEIGHT")
    .default("1024x1024"),
  OPENAI_IMAGE_TIMEOUT_MS: positiveInt(180_000),
  CLOUDINARY_URL: z.string().url().optional(),
  CLOUDINARY_PRESET: z.string().optional(),
  CLOUDINARY_TIMEOUT_MS: positiveInt(60_000),
});

export type ProviderSettings = {
  openai: {
    apiKey: string | null;
    baseUrl: string;
    model: string;
    size: string;
    timeoutMs: number;
  };
  cloudinary: {
    url: string | null;
    preset: string | null;
    timeoutMs: number;
  };
};

type Env = Record<string, string | undefined>;

// blank variables count as unset
function definedEntries(env: Env): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") entries[key] = value.trim();
  }
  return entries;
}

function describeIssue(error: z.ZodError) {
  const issue = error.issues[0];
  if (!issue) return "invalid configuration";
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const parsed = pipelineEnvSchema.safeParse(definedEntries(env));
  if (!parsed.success) {
    throw new PipelineConfigError(`Invalid pipeline configuration (${describeIssue(parsed.error)})`);
  }
  const values = parsed.data;
  return {
    maxConcurrent: values.PIPELINE_MAX_CONCURRENT,
    batchSize: values.PIPELINE_BATCH_SIZE,
    maxRequestsPerMinute: values.PIPELINE_MAX_REQUESTS_PER_MIN,
    maxAttempts: values.PIPELINE_MAX_ATTEMPTS,
    overallDeadlineMs: values.PIPELINE_DEADLINE_MS,
    runRetries: values.PIPELINE_RUN_RETRIES,
    runRetryDelayMs: values.PIPELINE_RUN_RETRY_DELAY_MS,
    genericBackoffMs: values.PIPELINE_GENERIC_BACKOFF_MS,
    rateLimitBackoffMs: values.PIPELINE_RATE_LIMIT_BACKOFF_MS,
    promptMaxLength: values.PIPELINE_PROMPT_MAX_LENGTH,
    rateLimitDivisor: values.PIPELINE_RATE_LIMIT_DIVISOR,
    rateLimitResetMs: values.PIPELINE_RATE_LIMIT_RESET_MS ?? null,
    requireApproval: values.PIPELINE_REQUIRE_APPROVAL,
  };
}

export function loadProviderSettings(env: Env = process.env): ProviderSettings {
  const parsed = providerEnvSchema.safeParse(definedEntries(env));
  if (!parsed.success) {
    throw new PipelineConfigError(`Invalid provider configuration (${describeIssue(parsed.error)})`);
  }
  const values = parsed.data;
  return {
    openai: {
      apiKey: values.OPENAI_API_KEY ?? null,
      baseUrl: values.OPENAI_BASE_URL.replace(/\/$/, ""),
      model: values.OPENAI_IMAGE_MODEL,
      size: values.OPENAI_IMAGE_SIZE,
      timeoutMs: values.OPENAI_IMAGE_TIMEOUT_MS,
    },
    cloudinary: {
      url: values.CLOUDINARY_URL ?? null,
      preset: values.CLOUDINARY_PRESET ?? null,
      timeoutMs: values.CLOUDINARY_TIMEOUT_MS,
    },
  };
}
