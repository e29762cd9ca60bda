import { formatServerSentEvent, isTerminalEvent, type StoryEventHub } from "./events";

const HEARTBEAT_MS = 15_000;

type StreamState = {
  closed: boolean;
  unsubscribe: (() => void) | null;
  heartbeat: ReturnType<typeof setInterval> | null;
};

/**
 * Server-sent-events body for one story: replays buffered events newer than
 * `afterId`, follows live ones, and ends after `story_complete` or `story_error`.
 */
export function createStoryEventStream(
  hub: StoryEventHub,
  storyId: string,
  options: { afterId?: number; signal?: AbortSignal; heartbeatMs?: number } = {},
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const state: StreamState = { closed: false, unsubscribe: null, heartbeat: null };

  const teardown = () => {
    state.closed = true;
    state.unsubscribe?.();
    state.unsubscribe = null;
    if (state.heartbeat) clearInterval(state.heartbeat);
    state.heartbeat = null;
  };

  return new ReadableStream<Uint8Array>({
    start(controller) {
      const close = () => {
        if (state.closed) return;
        teardown();
        controller.close();
      };

      const unsubscribe = hub.subscribe(
        storyId,
        (event) => {
          if (state.closed) return;
          controller.enqueue(encoder.encode(formatServerSentEvent(event)));
          if (isTerminalEvent(event)) close();
        },
        { afterId: options.afterId },
      );
      // the replay may already have delivered the terminal event
      if (state.closed) {
        unsubscribe();
        return;
      }
      state.unsubscribe = unsubscribe;

      state.heartbeat = setInterval(() => {
        if (!state.closed) controller.enqueue(encoder.encode(": keep-alive\n\n"));
      }, options.heartbeatMs ?? HEARTBEAT_MS);

      if (options.signal?.aborted) {
        close();
        return;
      }
      options.signal?.addEventListener("abort", close, { once: true });
    },
    cancel() {
      teardown();
    },
  });
}

export function parseLastEventId(value: string | null): number {
  const parsed = Number(value ?? 0);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 0;
}
