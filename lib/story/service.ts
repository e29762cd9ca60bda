import { randomUUID } from "node:crypto";
import { runStory } from "../batch/driver";
import { toErrorMessage } from "../batch/errors";
import type { RateLimitFlag } from "../batch/rateLimitFlag";
import type { ImageProvider, ImageUploader, PipelineConfig, ProgressEvent, SleepFn } from "../batch/types";
import { StoryEventHub, type ImageReadyData } from "./events";
import { StorySessionStore } from "./sessions";

export type StoryServiceDeps = {
  provider: ImageProvider;
  uploader: ImageUploader;
  config: PipelineConfig;
  sessions?: StorySessionStore;
  events?: StoryEventHub;
  rateLimitFlag?: RateLimitFlag;
  sleep?: SleepFn;
  createId?: () => string;
};

export type StartStoryInput = {
  scenes: string[];
  answers?: Record<string, unknown>;
};

export function toImageReadyData(event: ProgressEvent): ImageReadyData {
  return {
    sceneNumber: event.index,
    imageUrl: event.imageUrl,
    status: event.status,
    completedScenes: event.cumulativeCompleted,
    totalScenes: event.total,
    ...(event.error ? { error: event.error } : {}),
  };
}

export class StoryService {
  readonly sessions: StorySessionStore;
  readonly events: StoryEventHub;
  private readonly deps: StoryServiceDeps;
  private readonly createId: () => string;
  private readonly running = new Map<string, Promise<void>>();

  constructor(deps: StoryServiceDeps) {
    this.deps = deps;
    this.sessions = deps.sessions ?? new StorySessionStore();
    this.events = deps.events ?? new StoryEventHub();
    this.createId = deps.createId ?? randomUUID;
  }

  /** Registers the story and starts generating its images in the background. */
  startStory(input: StartStoryInput): { storyId: string } {
    const storyId = this.createId();
    this.sessions.create({ id: storyId, scenes: input.scenes, answers: input.answers });
    console.log(`[story] ${storyId} accepted with ${input.scenes.length} scene(s)`);

    const run = this.execute(storyId, input.scenes).finally(() => {
      this.running.delete(storyId);
    });
    this.running.set(storyId, run);
    return { storyId };
  }

  /** Resolves once the story's background run has settled. */
  async waitFor(storyId: string): Promise<void> {
    await this.running.get(storyId);
  }

  isRunning(storyId: string) {
    return this.running.has(storyId);
  }

  // Settles in every case; failures end up on the session and the event channel.
  private async execute(storyId: string, scenes: string[]): Promise<void> {
    try {
      const result = await runStory(scenes, {
        storyId,
        provider: this.deps.provider,
        uploader: this.deps.uploader,
        config: this.deps.config,
        rateLimitFlag: this.deps.rateLimitFlag,
        sleep: this.deps.sleep,
        notify: (channelId, event) => {
          this.sessions.applyProgress(channelId, event);
          this.events.publish(channelId, { type: "image_ready", data: toImageReadyData(event) });
        },
      });
      this.sessions.complete(storyId, result);
      this.events.publish(storyId, {
        type: "story_complete",
        data: { status: "completed", mode: result.mode, images: result.images, metrics: result.metrics },
      });
    } catch (error) {
      const message = toErrorMessage(error, "Story generation failed");
      console.error(`[story] ${storyId} failed: ${message}`);
      this.sessions.fail(storyId, message);
      this.events.publish(storyId, { type: "story_error", data: { status: "failed", error: message } });
    }
  }
}
