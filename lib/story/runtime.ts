import { PipelineConfigError } from "../batch/errors";
import { getProcessRateLimitFlag } from "../batch/rateLimitFlag";
import { loadPipelineConfig, loadProviderSettings } from "../config";
import { CloudinaryUploader } from "../providers/cloudinary";
import { OpenAIImageProvider } from "../providers/openaiImages";
import { StoryService } from "./service";

let service: StoryService | null = null;

export function createStoryServiceFromEnv(env: Record<string, string | undefined> = process.env): StoryService {
  const config = loadPipelineConfig(env);
  const settings = loadProviderSettings(env);
  if (!settings.openai.apiKey) {
    throw new PipelineConfigError("OPENAI_API_KEY is not set");
  }
  if (!settings.cloudinary.url || !settings.cloudinary.preset) {
    throw new PipelineConfigError("CLOUDINARY_URL and CLOUDINARY_PRESET must both be set");
  }

  return new StoryService({
    config,
    rateLimitFlag: getProcessRateLimitFlag(config.rateLimitResetMs),
    provider: new OpenAIImageProvider({
      apiKey: settings.openai.apiKey,
      baseUrl: settings.openai.baseUrl,
      model: settings.openai.model,
      size: settings.openai.size,
      timeoutMs: settings.openai.timeoutMs,
    }),
    uploader: new CloudinaryUploader({
      url: settings.cloudinary.url,
      preset: settings.cloudinary.preset,
      timeoutMs: settings.cloudinary.timeoutMs,
    }),
  });
}

export function getStoryService(): StoryService {
  if (!service) {
    service = createStoryServiceFromEnv();
  }
  return service;
}

/** Swaps the process-wide service; tests install one built on stub providers. */
export function setStoryService(next: StoryService | null) {
  service = next;
}
