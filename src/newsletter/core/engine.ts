import type { StateManager } from "./state.js";
import type { IngestRunner, Logger, PersistedState, RunOptions, RunSummary } from "./types.js";

export interface IngestEngineOptions {
  runner: IngestRunner;
  state: StateManager;
  logger: Logger;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Single entry point for manual and scheduled runs. At most one run is in
 * flight; a trigger that arrives during a run is a no-op.
 */
export class IngestEngine {
  private readonly runner: IngestRunner;
  private readonly state: StateManager;
  private readonly logger: Logger;
  private running = false;

  constructor(opts: IngestEngineOptions) {
    this.runner = opts.runner;
    this.state = opts.state;
    this.logger = opts.logger;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Returns null when another run is already in progress. */
  async runIngestion(options: RunOptions = {}): Promise<RunSummary | null> {
    if (this.running) {
      this.logger.info("Ingestion already in progress, ignoring trigger");
      return null;
    }

    this.running = true;
    try {
      const summary = await this.runner.run(options);
      await this.state.recordRun(summary);
      return summary;
    } finally {
      this.running = false;
    }
  }

  /**
   * Run now and then every `intervalMs` until `signal` aborts. An abort
   * never interrupts a run in progress; the loop exits after it.
   */
  async runEvery(
    intervalMs: number,
    signal: AbortSignal,
    onRun?: (summary: RunSummary) => void,
  ): Promise<void> {
    while (!signal.aborted) {
      const summary = await this.runIngestion();
      if (summary) onRun?.(summary);
      if (signal.aborted) break;
      await waitFor(intervalMs, signal);
    }
    this.logger.info("Scheduler stopped");
  }

  lastRun(): PersistedState {
    return this.state.getState();
  }
}
