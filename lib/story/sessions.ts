import type { ProgressEvent, ProgressStatus, RunMetrics, RunMode, Skipped, StoryRunResult } from "../batch/types";

export type StoryStatus = "processing" | "completed" | "failed";

export type SceneImage = {
  url: string | null;
  status: ProgressStatus;
  error?: string;
};

export type StorySession = {
  id: string;
  status: StoryStatus;
  scenes: string[];
  answers: Record<string, unknown>;
  // keyed by 1-based scene number
  images: Record<number, SceneImage>;
  completedScenes: number;
  totalScenes: number;
  results: Array<string | Skipped> | null;
  mode: RunMode | null;
  metrics: RunMetrics | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
};

export type CreateStoryInput = {
  id: string;
  scenes: string[];
  answers?: Record<string, unknown>;
};

/** In-memory story sessions; `get` hands out copies. */
export class StorySessionStore {
  private readonly sessions = new Map<string, StorySession>();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  create(input: CreateStoryInput): StorySession {
    const timestamp = this.now().toISOString();
    const session: StorySession = {
      id: input.id,
      status: "processing",
      scenes: [...input.scenes],
      answers: { ...(input.answers ?? {}) },
      images: {},
      completedScenes: 0,
      totalScenes: input.scenes.length,
      results: null,
      mode: null,
      metrics: null,
      error: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.sessions.set(input.id, session);
    return structuredClone(session);
  }

  get(id: string): StorySession | null {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  has(id: string) {
    return this.sessions.has(id);
  }

  applyProgress(id: string, event: ProgressEvent): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.images[event.index] = {
      url: event.imageUrl,
      status: event.status,
      ...(event.error ? { error: event.error } : {}),
    };
    session.completedScenes = event.cumulativeCompleted;
    session.updatedAt = this.now().toISOString();
  }

  complete(id: string, result: StoryRunResult): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.status = "completed";
    session.results = [...result.images];
    session.mode = result.mode;
    session.metrics = result.metrics;
    session.completedScenes = result.metrics.succeeded;
    session.updatedAt = this.now().toISOString();
  }

  fail(id: string, message: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.status = "failed";
    session.error = message;
    session.updatedAt = this.now().toISOString();
  }
}
