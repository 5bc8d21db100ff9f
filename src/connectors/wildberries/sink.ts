/**
 * Batch writer for normalized records.
 *
 * Deduplicates by natural key in memory (last record wins), then upserts in
 * fixed-size chunks whose conflict target is exactly the natural key.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { Logger } from "../core/index.js";
import { errorMessage, SinkWriteError } from "../core/index.js";
import { naturalKey } from "./normalize.js";
import type { NormalizedRecord } from "./types.js";
import { NATURAL_KEY } from "./types.js";

export const UPSERT_CHUNK_SIZE = 1000;
export const ON_CONFLICT = NATURAL_KEY.join(",");

// ─── Store contract ───

export interface RecordStore {
  upsert(records: NormalizedRecord[], onConflict: string): Promise<void>;
}

export class SupabaseRecordStore implements RecordStore {
  private readonly client: SupabaseClient;
  private readonly table: string;

  constructor(opts: { url: string; serviceRoleKey: string; table: string }) {
    this.client = createClient(opts.url, opts.serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    this.table = opts.table;
  }

  async upsert(records: NormalizedRecord[], onConflict: string): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert(records, { onConflict });
    if (error) {
      throw new Error(`${error.message}${error.code ? ` (${error.code})` : ""}`);
    }
  }
}

export class DryRunRecordStore implements RecordStore {
  private readonly logger: Logger;
  written = 0;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async upsert(records: NormalizedRecord[], onConflict: string): Promise<void> {
    this.written += records.length;
    this.logger.info(`[dry-run] would upsert ${records.length} records`, {
      onConflict,
    });
  }
}

// ─── Writer ───

export interface WriteSummary {
  received: number;
  written: number;
  duplicates: number;
  chunks: number;
}

/**
 * One record per natural key; a later record replaces an earlier one but
 * keeps the earlier one's position.
 */
export function dedupeByKey(records: NormalizedRecord[]): NormalizedRecord[] {
  const byKey = new Map<string, NormalizedRecord>();
  for (const record of records) {
    byKey.set(naturalKey(record), record);
  }
  return [...byKey.values()];
}

export class BatchWriter {
  private readonly store: RecordStore;
  private readonly logger: Logger;
  private readonly chunkSize: number;

  constructor(store: RecordStore, logger: Logger, chunkSize = UPSERT_CHUNK_SIZE) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.store = store;
    this.logger = logger;
    this.chunkSize = chunkSize;
  }

  async write(records: NormalizedRecord[]): Promise<WriteSummary> {
    const unique = dedupeByKey(records);
    const duplicates = records.length - unique.length;
    if (duplicates > 0) {
      this.logger.warn(`Dropped ${duplicates} duplicate key(s) within batch`);
    }

    let chunks = 0;
    for (let i = 0; i < unique.length; i += this.chunkSize) {
      const chunk = unique.slice(i, i + this.chunkSize);
      try {
        await this.store.upsert(chunk, ON_CONFLICT);
      } catch (err) {
        throw new SinkWriteError(chunks, errorMessage(err), err);
      }
      chunks++;
    }

    return {
      received: records.length,
      written: unique.length,
      duplicates,
      chunks,
    };
  }
}
