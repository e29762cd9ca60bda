import { toErrorMessage } from "./errors";
import type { NotifyFn, ProgressEvent, ProgressStatus, TaskOutcome } from "./types";

type ProgressReporterOptions = {
  channelId: string;
  total: number;
  notify: NotifyFn;
  // successes are announced as pending_approval instead of completed
  requireApproval?: boolean;
};

export class ProgressReporter {
  private readonly channelId: string;
  private readonly total: number;
  private readonly notify: NotifyFn;
  private readonly successStatus: ProgressStatus;
  private readonly reported = new Set<number>();
  private completed = 0;

  constructor(options: ProgressReporterOptions) {
    this.channelId = options.channelId;
    this.total = options.total;
    this.notify = options.notify;
    this.successStatus = options.requireApproval ? "pending_approval" : "completed";
  }

  get cumulativeCompleted() {
    return this.completed;
  }

  toEvent(outcome: TaskOutcome): ProgressEvent {
    if (outcome.result.ok) {
      return {
        index: outcome.index,
        status: this.successStatus,
        imageUrl: outcome.result.url,
        cumulativeCompleted: this.completed,
        total: this.total,
      };
    }
    return {
      index: outcome.index,
      status: "failed",
      imageUrl: null,
      cumulativeCompleted: this.completed,
      total: this.total,
      error: outcome.result.error,
    };
  }

  // Never throws and never waits on the channel.
  report(outcome: TaskOutcome): void {
    if (outcome.result.ok && !this.reported.has(outcome.index)) {
      this.reported.add(outcome.index);
      this.completed += 1;
    }
    const event = this.toEvent(outcome);
    try {
      const pending = this.notify(this.channelId, event);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => this.logDropped(event, error));
      }
    } catch (error) {
      this.logDropped(event, error);
    }
  }

  private logDropped(event: ProgressEvent, error: unknown) {
    console.warn(
      `[progress] could not notify ${this.channelId} about scene ${event.index} (${event.status}): ${toErrorMessage(error, "unknown error")}`,
    );
  }
}
