/** Paid-storage connector type definitions. */

import type { AuthMode, TimeoutPolicy } from "../core/index.js";

// ─── Configuration ───

export type ReportProtocol = "tasks" | "direct";

export interface PaidStorageConfig {
  apiBase: string;
  apiToken: string;
  authScheme: AuthMode;
  /** Absent in dry-run mode. */
  supabase: { url: string; serviceRoleKey: string } | null;
  table: string;
  protocol: ReportProtocol;
  onTimeout: TimeoutPolicy;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  httpTimeoutMs: number;
  includeTaskId: boolean;
}

// ─── Raw report rows ───

/** A report row as the API sends it: camelCase keys, loosely typed values. */
export type RawRow = Record<string, unknown>;

// ─── Normalized records (one table row each) ───

export interface PaidStorageRecord {
  date: string | null;
  log_warehouse_coef: number | null;
  office_id: number | null;
  warehouse: string | null;
  warehouse_coef: number | null;
  gi_id: number | null;
  chrt_id: number | null;
  size: string | null;
  barcode: string | null;
  subject: string | null;
  brand: string | null;
  vendor_code: string | null;
  nm_id: number | null;
  volume: number | null;
  calc_type: string | null;
  warehouse_price: number | null;
  barcodes_count: number | null;
  pallet_place_code: number | null;
  pallet_count: number | null;
  original_date: string | null;
  loyalty_discount: number | null;
  tariff_fix_date: string | null;
  tariff_lower_date: string | null;
}

export type CanonicalField = keyof PaidStorageRecord;

export interface NormalizedRecord extends PaidStorageRecord {
  /** SHA-256 over the canonical fields, for change detection downstream. */
  _hash: string;
  task_id?: string;
}

/** Conflict target of the upsert: one billing line per item, warehouse and day. */
export const NATURAL_KEY = ["date", "nm_id", "chrt_id", "office_id"] as const;

// ─── Report tasks ───

export type RemoteTaskStatus = "pending" | "done" | "failed";

export type TaskWaitResult =
  | { status: "done"; polls: number }
  | { status: "failed"; reason: string; polls: number }
  | { status: "timedOut"; waitedMs: number; polls: number };

export type TaskOutcome =
  | { status: "done"; taskId: string; rows: RawRow[] }
  | { status: "failed"; taskId: string; reason: string }
  | { status: "timedOut"; taskId: string; waitedMs: number };
