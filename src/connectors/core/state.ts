import * as fs from "node:fs";
import * as path from "node:path";
import type { DateWindow, PersistedState, SyncState } from "./types.js";
import { windowKey } from "./windows.js";

function defaultState(): PersistedState {
  return { lastSyncAt: null, deferredWindows: [], metadata: {} };
}

function isDateWindow(value: unknown): value is DateWindow {
  return (
    typeof value === "object" &&
    value !== null &&
    "from" in value &&
    "to" in value &&
    typeof value.from === "string" &&
    typeof value.to === "string"
  );
}

/** Accept whatever is on disk, keeping only the fields that still parse. */
function coerceState(raw: unknown): PersistedState {
  const state = defaultState();
  if (typeof raw !== "object" || raw === null) return state;
  if ("lastSyncAt" in raw && typeof raw.lastSyncAt === "string") {
    state.lastSyncAt = raw.lastSyncAt;
  }
  if ("deferredWindows" in raw && Array.isArray(raw.deferredWindows)) {
    state.deferredWindows = raw.deferredWindows.filter(isDateWindow);
  }
  if (
    "metadata" in raw &&
    typeof raw.metadata === "object" &&
    raw.metadata !== null &&
    !Array.isArray(raw.metadata)
  ) {
    state.metadata = { ...raw.metadata };
  }
  return state;
}

export class StateManager {
  private state: PersistedState;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.state = this.loadFromDisk();
  }

  private loadFromDisk(): PersistedState {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch {
      return defaultState();
    }
    try {
      return coerceState(JSON.parse(raw));
    } catch {
      // Corrupt file: treated as empty
      return defaultState();
    }
  }

  private async writeToDisk(): Promise<void> {
    const dir = path.dirname(this.filePath);
    fs.mkdirSync(dir, { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(this.state, null, 2));
    fs.renameSync(tmp, this.filePath);
  }

  getSyncState(): SyncState {
    const self = this;
    return {
      get lastSyncAt() {
        return self.state.lastSyncAt;
      },
      set lastSyncAt(val: string | null) {
        self.state.lastSyncAt = val;
      },
      get deferredWindows() {
        return self.state.deferredWindows;
      },
      set deferredWindows(val: DateWindow[]) {
        self.state.deferredWindows = val;
      },
      get metadata() {
        return self.state.metadata;
      },
      set metadata(val: Record<string, unknown>) {
        self.state.metadata = val;
      },
      async checkpoint() {
        await self.writeToDisk();
      },
    };
  }

  /** Record a window whose report was not ready, once per distinct bounds. */
  defer(window: DateWindow): void {
    const key = windowKey(window);
    if (!this.state.deferredWindows.some((w) => windowKey(w) === key)) {
      this.state.deferredWindows.push({ from: window.from, to: window.to });
    }
  }

  /** Drop every deferred window matching `predicate`; returns how many went. */
  release(predicate: (window: DateWindow) => boolean): number {
    const before = this.state.deferredWindows.length;
    this.state.deferredWindows = this.state.deferredWindows.filter(
      (w) => !predicate(w),
    );
    return before - this.state.deferredWindows.length;
  }

  async save(): Promise<void> {
    this.state.lastSyncAt = new Date().toISOString();
    await this.writeToDisk();
  }

  getRawState(): PersistedState {
    return {
      ...this.state,
      deferredWindows: [...this.state.deferredWindows],
    };
  }
}
