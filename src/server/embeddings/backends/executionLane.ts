import { createLogger } from "../../log.ts";

const log = createLogger("embeddings.lane");

export class LaneTaskAbortedError extends Error {
  constructor() {
    super("Lane task was aborted before it started");
    this.name = "LaneTaskAbortedError";
  }
}

type LaneJob = {
  start: () => Promise<void>;
  drop: () => void;
  signal: AbortSignal | undefined;
  queuedAt: number;
};

/**
 * Runs tasks one at a time in arrival order. Used around models that are not
 * safe to call concurrently. Queued tasks whose signal has aborted are
 * dropped before they start.
 */
export class ExecutionLane {
  private readonly queue: LaneJob[] = [];
  private workerRunning = false;

  constructor(private readonly name: string) {}

  /** Tasks waiting to start, not counting the one running. */
  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.workerRunning;
  }

  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new LaneTaskAbortedError());
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: async () => {
          try {
            resolve(await task());
          } catch (error: unknown) {
            reject(error);
          }
        },
        drop: () => reject(new LaneTaskAbortedError()),
        signal,
        queuedAt: Date.now(),
      });
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    if (this.workerRunning) { return; }
    this.workerRunning = true;

    try {
      let job = this.queue.shift();
      while (job) {
        if (job.signal?.aborted) {
          log.debug("task_dropped", { lane: this.name, waitedMs: Date.now() - job.queuedAt });
          job.drop();
        } else {
          await job.start();
        }
        job = this.queue.shift();
      }
    } finally {
      this.workerRunning = false;
    }
  }
}
