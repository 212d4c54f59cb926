import { writeFileAtomic, readFileIfExists } from "./files.js";
import type { PersistedState, RunSummary } from "./types.js";

const DEFAULT_STATE: PersistedState = {
  lastRunAt: null,
  lastSummary: null,
};

function isPersistedState(value: unknown): value is PersistedState {
  if (value == null || typeof value !== "object") return false;
  if (!("lastRunAt" in value) || !("lastSummary" in value)) return false;
  return (
    (value.lastRunAt === null || typeof value.lastRunAt === "string") &&
    (value.lastSummary === null || typeof value.lastSummary === "object")
  );
}

/** Last-run bookkeeping at `<stateDir>/_meta/state.json`. */
export class StateManager {
  private state: PersistedState;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.state = this.loadFromDisk();
  }

  private loadFromDisk(): PersistedState {
    const raw = readFileIfExists(this.filePath);
    if (raw === null) return { ...DEFAULT_STATE };
    try {
      const parsed: unknown = JSON.parse(raw);
      return isPersistedState(parsed) ? parsed : { ...DEFAULT_STATE };
    } catch {
      // unreadable state file: start over
      return { ...DEFAULT_STATE };
    }
  }

  async recordRun(summary: RunSummary): Promise<void> {
    this.state = { lastRunAt: summary.finishedAt, lastSummary: summary };
    writeFileAtomic(this.filePath, JSON.stringify(this.state, null, 2));
  }

  getState(): PersistedState {
    return { ...this.state };
  }
}
