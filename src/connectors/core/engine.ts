import { AuthError, ConfigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Sleep } from "./retry.js";
import { sleep } from "./retry.js";
import { StateManager } from "./state.js";
import type {
  DateWindow,
  Logger,
  SyncError,
  SyncRequest,
  SyncResult,
  TimeoutPolicy,
  WindowAdapter,
  WindowOutcome,
} from "./types.js";
import {
  MAX_WINDOW_DAYS,
  planWindows,
  resolveRange,
  today,
  windowCovers,
  windowKey,
  windowsOverlap,
} from "./windows.js";

export interface SyncEngineConfig {
  adapter: WindowAdapter;
  stateFile: string;
  logger?: Logger;
  maxWindowDays?: number;
  /** Attempts per window before it is skipped. */
  windowAttempts?: number;
  /** Delay before retry n is `windowRetryDelayMs * n`. */
  windowRetryDelayMs?: number;
  /** Pause between consecutive windows. */
  interWindowDelayMs?: number;
  sleep?: Sleep;
  clock?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Retry windows deferred by earlier runs before the planned ones. */
  includeDeferred?: boolean;
}

export class SyncEngine {
  private readonly config: SyncEngineConfig;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(config: SyncEngineConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger(config.adapter.name);
    this.sleep = config.sleep ?? sleep;
  }

  async run(request: SyncRequest, opts: RunOptions = {}): Promise<SyncResult> {
    const { adapter } = this.config;
    const maxDays = this.config.maxWindowDays ?? MAX_WINDOW_DAYS;
    const attempts = this.config.windowAttempts ?? 3;
    const retryDelayMs = this.config.windowRetryDelayMs ?? 5_000;
    const pauseMs = this.config.interWindowDelayMs ?? 2_000;

    const now = this.config.clock?.() ?? new Date();
    const range = resolveRange(request, today(now));
    const planned = [...planWindows(range.from, range.to, maxDays)];

    const stateManager = new StateManager(this.config.stateFile);
    const state = stateManager.getSyncState();

    // Without deferred windows, entries from earlier runs are neither retried nor settled
    const settleLedger = opts.includeDeferred !== false;
    // Deferred windows inside the new range are redone by the plan itself
    const superseded = settleLedger
      ? state.deferredWindows.filter((w) => windowCovers(range, w))
      : [];
    const carried = settleLedger
      ? state.deferredWindows.filter((w) => !windowCovers(range, w))
      : [];
    const queue: DateWindow[] = [...carried, ...planned];

    const ac = new AbortController();
    const sigHandler = () => {
      this.logger.warn("Received interrupt, finishing current window...");
      ac.abort();
    };
    process.on("SIGINT", sigHandler);
    process.on("SIGTERM", sigHandler);
    const aborted = () => ac.signal.aborted || (opts.signal?.aborted ?? false);

    this.logger.info(
      `Starting ${request.mode} sync ${range.from}..${range.to}: ${planned.length} windows`,
      { carriedOver: carried.length, superseded: superseded.length },
    );
    const startTime = Date.now();

    const errors: SyncError[] = [];
    const deferred: DateWindow[] = [];
    const synced = new Set<string>();
    let windowsSynced = 0;
    let windowsFailed = 0;
    let itemsSynced = 0;
    let wasAborted = false;

    try {
      for (let i = 0; i < queue.length; i++) {
        const window = queue[i];
        if (aborted()) {
          wasAborted = true;
          const abandoned = queue.slice(i);
          for (const rest of abandoned) stateManager.defer(rest);
          this.logger.warn(
            `Interrupted: ${abandoned.length} window(s) left for a later run`,
          );
          break;
        }
        if (i > 0 && pauseMs > 0) await this.sleep(pauseMs);

        this.logger.progress(i + 1, queue.length, `Window ${windowKey(window)}`);

        const outcome = await this.runWindow(window, attempts, retryDelayMs);
        switch (outcome.kind) {
          case "synced":
            windowsSynced++;
            itemsSynced += outcome.itemsSynced;
            synced.add(windowKey(window));
            if (settleLedger) {
              stateManager.release((w) => windowKey(w) === windowKey(window));
            }
            break;
          case "deferred":
            deferred.push(window);
            stateManager.defer(window);
            this.logger.warn(`Deferred ${windowKey(window)} to a later run: ${outcome.reason}`);
            break;
          case "failed":
            windowsFailed++;
            errors.push(outcome.error);
            break;
        }

        await state.checkpoint();
      }
    } finally {
      process.removeListener("SIGINT", sigHandler);
      process.removeListener("SIGTERM", sigHandler);
    }

    // A superseded window is settled once every planned window touching it synced
    for (const old of superseded) {
      const touching = planned.filter((p) => windowsOverlap(p, old));
      if (touching.every((p) => synced.has(windowKey(p)))) {
        stateManager.release((w) => windowKey(w) === windowKey(old));
      }
    }

    const durationMs = Date.now() - startTime;
    state.metadata.lastRun = {
      mode: request.mode,
      range,
      windowsSynced,
      windowsDeferred: deferred.length,
      windowsFailed,
      itemsSynced,
      finishedAt: new Date().toISOString(),
    };
    if (windowsFailed === 0 && !wasAborted) {
      await stateManager.save();
    } else {
      await state.checkpoint();
    }

    this.logger.info(
      `Sync complete: ${windowsSynced} windows synced, ${deferred.length} deferred, ${windowsFailed} failed`,
      { itemsSynced, durationMs },
    );

    return {
      adapter: adapter.name,
      mode: request.mode,
      range,
      windowsPlanned: queue.length,
      windowsSynced,
      windowsDeferred: deferred.length,
      windowsFailed,
      itemsSynced,
      deferred,
      errors,
      aborted: wasAborted,
      durationMs,
    };
  }

  /**
   * Attempt one window up to `attempts` times. Configuration errors abort
   * the whole run; credential rejections end this window immediately.
   */
  private async runWindow(
    window: DateWindow,
    attempts: number,
    retryDelayMs: number,
  ): Promise<
    | { kind: "synced"; itemsSynced: number }
    | { kind: "deferred"; reason: string }
    | { kind: "failed"; error: SyncError }
  > {
    const key = windowKey(window);

    for (let attempt = 1; ; attempt++) {
      let outcome: WindowOutcome;
      try {
        outcome = await this.config.adapter.syncWindow(window, {
          attempt,
          logger: this.logger,
        });
      } catch (err) {
        if (err instanceof ConfigError) throw err;

        const message = errorMessage(err);
        const fatal = err instanceof AuthError;
        if (fatal || attempt >= attempts) {
          this.logger.error(`Window ${key} failed after ${attempt} attempt(s): ${message}`);
          return {
            kind: "failed",
            error: { entity: `window:${key}`, error: message, retryable: !fatal },
          };
        }

        const delayMs = retryDelayMs * attempt;
        this.logger.warn(
          `Window ${key} attempt ${attempt}/${attempts} failed: ${message}; retrying in ${Math.round(delayMs / 1000)}s`,
        );
        await this.sleep(delayMs);
        continue;
      }

      return outcome.status === "synced"
        ? { kind: "synced", itemsSynced: outcome.itemsSynced }
        : { kind: "deferred", reason: outcome.reason };
    }
  }
}

/**
 * Process exit status for a finished run: 1 when a window failed, when the
 * run was interrupted, or when windows were deferred and deferral counts as
 * failure; otherwise 0.
 */
export function exitCodeFor(
  result: SyncResult,
  onTimeout: TimeoutPolicy = "defer",
): 0 | 1 {
  if (result.windowsFailed > 0 || result.aborted) return 1;
  if (onTimeout === "fail" && result.windowsDeferred > 0) return 1;
  return 0;
}
