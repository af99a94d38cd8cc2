export type ConversationQueueOptions = {
  /** Pipeline runs allowed in flight across all conversations. */
  maxConcurrency: number;
  /** Waiting plus running tasks allowed per conversation. */
  maxDepth: number;
  onError?: (err: Error, key: string) => void;
};

type Lane = {
  chain: Promise<void>;
  depth: number;
};

/**
 * Runs tasks FIFO per conversation key and caps how many run at once overall.
 * Tasks for different keys are unordered relative to each other.
 */
export class ConversationQueue {
  private readonly opts: ConversationQueueOptions;
  private readonly lanes = new Map<string, Lane>();
  private readonly waiters: Array<() => void> = [];
  private running = 0;

  constructor(opts: ConversationQueueOptions) {
    if (opts.maxConcurrency < 1) throw new Error("maxConcurrency must be at least 1");
    this.opts = opts;
  }

  get inFlight() {
    return this.running;
  }

  get pending() {
    let total = 0;
    for (const lane of this.lanes.values()) total += lane.depth;
    return total;
  }

  depthOf(key: string | number) {
    return this.lanes.get(String(key))?.depth ?? 0;
  }

  /** Returns false when the conversation's backlog is full; the task is not queued. */
  enqueue(key: string | number, task: () => Promise<void>): boolean {
    const laneKey = String(key);
    let lane = this.lanes.get(laneKey);
    if (!lane) {
      lane = { chain: Promise.resolve(), depth: 0 };
      this.lanes.set(laneKey, lane);
    }
    if (lane.depth >= this.opts.maxDepth) return false;
    lane.depth += 1;
    const current = lane;
    current.chain = current.chain.then(async () => {
      await this.acquire();
      try {
        await task();
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        if (this.opts.onError) this.opts.onError(error, laneKey);
        else console.error("[queue] task failed", { key: laneKey, error: error.message });
      } finally {
        this.release();
        current.depth = Math.max(0, current.depth - 1);
        if (current.depth === 0 && this.lanes.get(laneKey) === current) this.lanes.delete(laneKey);
      }
    });
    return true;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    while (this.lanes.size) {
      await Promise.all([...this.lanes.values()].map((lane) => lane.chain));
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.opts.maxConcurrency) {
      this.running += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.running += 1;
        resolve();
      });
    });
  }

  private release() {
    this.running = Math.max(0, this.running - 1);
    const next = this.waiters.shift();
    if (next) next();
  }
}
