/** Core type definitions for the windowed report sync. */

import type { Sleep } from "./retry.js";

// ─── Date Windows ───

/** Closed calendar-date interval, both bounds `YYYY-MM-DD`. */
export interface DateWindow {
  from: string;
  to: string;
}

// ─── Sync Requests ───

export type SyncMode = "backfill" | "range" | "since" | "sync";

export type SyncRequest =
  | { mode: "backfill"; year: number }
  | { mode: "range"; from: string; to: string }
  | { mode: "since"; from: string }
  | { mode: "sync"; daysBack: number };

// ─── Adapter Interface ───

export interface WindowAdapter {
  name: string;
  syncWindow(window: DateWindow, ctx: WindowContext): Promise<WindowOutcome>;
}

// ─── Window Context (injected by engine) ───

export interface WindowContext {
  /** 1-based attempt number for this window within the current run. */
  attempt: number;
  logger: Logger;
}

/** What a window whose report never became ready means for the run. */
export type TimeoutPolicy = "defer" | "fail";

export type WindowOutcome =
  | { status: "synced"; itemsSynced: number }
  | { status: "deferred"; reason: string };

// ─── Sync Result ───

export interface SyncResult {
  adapter: string;
  mode: SyncMode;
  range: DateWindow;
  windowsPlanned: number;
  windowsSynced: number;
  windowsDeferred: number;
  windowsFailed: number;
  itemsSynced: number;
  deferred: DateWindow[];
  errors: SyncError[];
  aborted: boolean;
  durationMs: number;
}

export interface SyncError {
  entity: string;
  error: string;
  retryable: boolean;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  /** Minimum spacing between two acquired slots. */
  minDelayMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Record<string, string>): void;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Run State ───

export interface SyncState {
  lastSyncAt: string | null;
  deferredWindows: DateWindow[];
  metadata: Record<string, unknown>;
  checkpoint(): Promise<void>;
}

export interface PersistedState {
  lastSyncAt: string | null;
  deferredWindows: DateWindow[];
  metadata: Record<string, unknown>;
}
