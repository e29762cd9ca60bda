import { toErrorMessage } from "../batch/errors";
import type { ProgressStatus, RunMetrics, RunMode, Skipped } from "../batch/types";
import { MAX_SCENES } from "./scenes";

export type ImageReadyData = {
  sceneNumber: number;
  imageUrl: string | null;
  status: ProgressStatus;
  completedScenes: number;
  totalScenes: number;
  error?: string;
};

export type StoryEvent =
  | { type: "image_ready"; data: ImageReadyData }
  | {
      type: "story_complete";
      data: { status: "completed"; mode: RunMode; images: Array<string | Skipped>; metrics: RunMetrics };
    }
  | { type: "story_error"; data: { status: "failed"; error: string } };

export type StoryEventType = StoryEvent["type"];

export type StoryEventEnvelope = StoryEvent & { id: number; storyId: string };

export type StoryEventListener = (event: StoryEventEnvelope) => void;

const TERMINAL_EVENTS: ReadonlySet<StoryEventType> = new Set(["story_complete", "story_error"]);

export function isTerminalEvent(event: StoryEvent) {
  return TERMINAL_EVENTS.has(event.type);
}

export function formatServerSentEvent(event: StoryEventEnvelope) {
  return `id: ${event.id}\nevent: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`;
}

// a scene can report once per concurrent run and once sequentially; plus the terminal event
export const DEFAULT_REPLAY_LIMIT = MAX_SCENES * 4 + 1;

type Channel = {
  nextId: number;
  history: StoryEventEnvelope[];
  listeners: Set<StoryEventListener>;
  closed: boolean;
};

/**
 * Per-story publish/subscribe. Each channel keeps its latest `replayLimit` events
 * so a client that connects after the run has started still sees every scene.
 */
export class StoryEventHub {
  private readonly channels = new Map<string, Channel>();
  private readonly replayLimit: number;

  constructor(options: { replayLimit?: number } = {}) {
    this.replayLimit = Math.max(1, options.replayLimit ?? DEFAULT_REPLAY_LIMIT);
  }

  private channel(storyId: string): Channel {
    let channel = this.channels.get(storyId);
    if (!channel) {
      channel = { nextId: 1, history: [], listeners: new Set(), closed: false };
      this.channels.set(storyId, channel);
    }
    return channel;
  }

  publish(storyId: string, event: StoryEvent): StoryEventEnvelope {
    const channel = this.channel(storyId);
    const envelope: StoryEventEnvelope = { ...event, id: channel.nextId, storyId };
    channel.nextId += 1;
    channel.history.push(envelope);
    if (channel.history.length > this.replayLimit) {
      channel.history.splice(0, channel.history.length - this.replayLimit);
    }
    if (isTerminalEvent(event)) channel.closed = true;

    for (const listener of Array.from(channel.listeners)) {
      try {
        listener(envelope);
      } catch (error) {
        console.warn(`[story] listener for ${storyId} threw on ${event.type}: ${toErrorMessage(error, "unknown error")}`);
      }
    }
    return envelope;
  }

  /** Replays buffered events after `afterId`, then delivers new ones until unsubscribed. */
  subscribe(storyId: string, listener: StoryEventListener, options: { afterId?: number } = {}): () => void {
    const channel = this.channel(storyId);
    const afterId = options.afterId ?? 0;
    for (const event of channel.history) {
      if (event.id > afterId) listener(event);
    }
    channel.listeners.add(listener);
    return () => {
      channel.listeners.delete(listener);
    };
  }

  history(storyId: string): StoryEventEnvelope[] {
    return [...(this.channels.get(storyId)?.history ?? [])];
  }

  isClosed(storyId: string) {
    return this.channels.get(storyId)?.closed ?? false;
  }

  listenerCount(storyId: string) {
    return this.channels.get(storyId)?.listeners.size ?? 0;
  }
}
