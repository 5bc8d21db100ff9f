import { describe, expect, it, vi } from "vitest";
import { SinkWriteError } from "../../../src/connectors/core/errors.js";
import type { Logger } from "../../../src/connectors/core/types.js";
import { normalizeRow } from "../../../src/connectors/wildberries/normalize.js";
import type { RecordStore } from "../../../src/connectors/wildberries/sink.js";
import {
  BatchWriter,
  DryRunRecordStore,
  dedupeByKey,
  ON_CONFLICT,
} from "../../../src/connectors/wildberries/sink.js";
import type { NormalizedRecord } from "../../../src/connectors/wildberries/types.js";

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), progress: vi.fn() };
}

class MemoryStore implements RecordStore {
  batches: Array<{ records: NormalizedRecord[]; onConflict: string }> = [];

  async upsert(records: NormalizedRecord[], onConflict: string): Promise<void> {
    this.batches.push({ records, onConflict });
  }
}

function record(nmId: number, price: number, date = "2024-03-01"): NormalizedRecord {
  return normalizeRow({ date, nmId, chrtId: 1, officeId: 10, warehousePrice: price });
}

describe("dedupeByKey", () => {
  it("keeps the last record per key at the first record's position", () => {
    const records = [record(1, 10), record(2, 20), record(1, 11)];
    const unique = dedupeByKey(records);
    expect(unique.map((r) => [r.nm_id, r.warehouse_price])).toEqual([
      [1, 11],
      [2, 20],
    ]);
  });

  it("treats different dates as different keys", () => {
    expect(dedupeByKey([record(1, 10, "2024-03-01"), record(1, 10, "2024-03-02")])).toHaveLength(2);
  });
});

describe("BatchWriter", () => {
  it("upserts on the natural key", async () => {
    const store = new MemoryStore();
    const writer = new BatchWriter(store, silentLogger());

    const summary = await writer.write([record(1, 10), record(1, 12), record(2, 20)]);

    expect(summary).toEqual({ received: 3, written: 2, duplicates: 1, chunks: 1 });
    expect(store.batches).toHaveLength(1);
    expect(store.batches[0].onConflict).toBe("date,nm_id,chrt_id,office_id");
    expect(ON_CONFLICT).toBe("date,nm_id,chrt_id,office_id");
  });

  it("splits into chunks of the configured size", async () => {
    const store = new MemoryStore();
    const writer = new BatchWriter(store, silentLogger(), 2);
    const records = [1, 2, 3, 4, 5].map((n) => record(n, n));

    const summary = await writer.write(records);

    expect(store.batches.map((b) => b.records.length)).toEqual([2, 2, 1]);
    expect(summary.chunks).toBe(3);
  });

  it("writes nothing for an empty batch", async () => {
    const store = new MemoryStore();
    const summary = await new BatchWriter(store, silentLogger()).write([]);
    expect(summary).toEqual({ received: 0, written: 0, duplicates: 0, chunks: 0 });
    expect(store.batches).toEqual([]);
  });

  it("wraps a store failure with the chunk index", async () => {
    let calls = 0;
    const store: RecordStore = {
      upsert: async () => {
        calls++;
        if (calls === 2) throw new Error("permission denied for table (42501)");
      },
    };
    const writer = new BatchWriter(store, silentLogger(), 1);

    const err = await writer.write([record(1, 1), record(2, 2), record(3, 3)]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SinkWriteError);
    expect(err).toHaveProperty("chunkIndex", 1);
    expect(err).toHaveProperty(
      "message",
      "Upsert of chunk 1 failed: permission denied for table (42501)",
    );
    expect(calls).toBe(2);
  });

  it("rejects a non-positive chunk size", () => {
    expect(() => new BatchWriter(new MemoryStore(), silentLogger(), 0)).toThrow(RangeError);
  });
});

describe("DryRunRecordStore", () => {
  it("counts instead of writing", async () => {
    const logger = silentLogger();
    const store = new DryRunRecordStore(logger);
    await new BatchWriter(store, logger).write([record(1, 1), record(2, 2)]);
    expect(store.written).toBe(2);
    expect(logger.info).toHaveBeenCalledWith("[dry-run] would upsert 2 records", {
      onConflict: "date,nm_id,chrt_id,office_id",
    });
  });
});
