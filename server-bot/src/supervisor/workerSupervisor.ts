import type { IngestorLoop } from "../bot/telegramBot.js";
import { errorMessage } from "../errors.js";
import type { AuditSink } from "../logging/audit.js";

export type SupervisorState = "starting" | "running" | "degraded" | "stopping" | "stopped" | "failed";

export interface LivenessHandle {
  start(onFatal: (err: Error) => void): Promise<unknown>;
  stop(): Promise<void>;
}

export type WorkerSupervisorOptions = {
  loop: IngestorLoop;
  liveness: LivenessHandle;
  maxRestarts: number;
  restartBackoffMs: number;
  restartBackoffMaxMs: number;
  /** A loop that stayed up this long gets a fresh restart budget. */
  restartResetMs: number;
  onFatal?: (err: Error) => void;
  audit?: AuditSink;
  now?: () => number;
};

export function restartDelay(restart: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, restart - 1));
}

const toError = (err: unknown) => (err instanceof Error ? err : new Error(String(err)));

export class WorkerSupervisor {
  private readonly opts: WorkerSupervisorOptions;
  private readonly now: () => number;
  private current: SupervisorState = "starting";
  private restarts = 0;
  private stopRequested = false;
  private wake: (() => void) | null = null;
  private supervision: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private exitResolve: (() => void) | null = null;
  private readonly exited: Promise<void>;

  constructor(opts: WorkerSupervisorOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
    this.exited = new Promise<void>((resolve) => {
      this.exitResolve = resolve;
    });
  }

  get state(): SupervisorState {
    return this.current;
  }

  get restartCount(): number {
    return this.restarts;
  }

  /** Resolves once the supervisor is stopped or failed. */
  waitForExit(): Promise<void> {
    return this.exited;
  }

  /** Starts the liveness responder first, then the ingestor loop in the background. */
  async start(): Promise<void> {
    if (this.supervision || this.current !== "starting") throw new Error(`cannot start from ${this.current}`);
    try {
      await this.opts.liveness.start((err) => this.livenessFault(err));
    } catch (err) {
      this.fail(toError(err), "liveness server failed to start");
      throw err;
    }
    this.supervision = this.supervise();
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const terminal = this.current === "failed";
    this.stopRequested = true;
    if (!terminal) this.transition("stopping");
    this.wake?.();
    try {
      await this.opts.loop.stop();
    } catch (err) {
      console.warn("[supervisor] ingestor stop failed", { error: errorMessage(err) });
    }
    await this.supervision;
    try {
      await this.opts.liveness.stop();
    } catch (err) {
      console.warn("[supervisor] liveness stop failed", { error: errorMessage(err) });
    }
    if (!terminal) this.transition("stopped");
    this.exitResolve?.();
  }

  private async supervise(): Promise<void> {
    while (!this.stopRequested) {
      this.transition("running");
      const startedAt = this.now();
      let crash: Error;
      try {
        await this.opts.loop.run();
        if (this.stopRequested) return;
        crash = new Error("ingestor loop exited unexpectedly");
      } catch (err) {
        if (this.stopRequested) return;
        crash = toError(err);
      }

      if (this.now() - startedAt >= this.opts.restartResetMs) this.restarts = 0;
      if (this.restarts >= this.opts.maxRestarts) {
        this.fail(crash, `ingestor loop gave up after ${this.restarts} restart(s)`);
        return;
      }
      this.restarts += 1;
      const delayMs = restartDelay(this.restarts, this.opts.restartBackoffMs, this.opts.restartBackoffMaxMs);
      console.error("[supervisor] ingestor loop crashed", {
        error: crash.message,
        restart: this.restarts,
        delayMs
      });
      this.transition("degraded", crash.message);
      await this.pause(delayMs);
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private livenessFault(err: Error) {
    if (this.current === "stopped" || this.current === "failed") return;
    this.fail(err, "liveness server faulted");
    this.stopRequested = true;
    this.wake?.();
    this.opts.loop.stop().catch((stopErr: unknown) => {
      console.warn("[supervisor] ingestor stop failed", { error: errorMessage(stopErr) });
    });
  }

  private fail(err: Error, why: string) {
    console.error("[supervisor] fatal", { why, error: err.message });
    this.transition("failed", `${why}: ${err.message}`);
    this.exitResolve?.();
    this.opts.onFatal?.(err);
  }

  private transition(to: SupervisorState, message?: string) {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    console.log("[supervisor] state", { from, to, restarts: this.restarts, ...(message ? { message } : {}) });
    this.opts.audit?.({
      type: "supervisor_state",
      at: new Date().toISOString(),
      from,
      to,
      restarts: this.restarts,
      message
    });
  }
}
