/**
 * Paid-storage adapter: fetches one window's report and writes it.
 */

import type {
  DateWindow,
  Logger,
  RateLimiter,
  Sleep,
  WindowAdapter,
  WindowContext,
  WindowOutcome,
} from "../core/index.js";
import {
  createRateLimiter,
  RateAwareHttpClient,
  TaskFailedError,
} from "../core/index.js";
import { normalizeRow } from "./normalize.js";
import type { RecordStore } from "./sink.js";
import { BatchWriter, DryRunRecordStore, SupabaseRecordStore } from "./sink.js";
import { DEFAULT_POLL_POLICY, ReportTaskProtocol } from "./tasks.js";
import type { PaidStorageConfig, RawRow, ReportProtocol } from "./types.js";

/** Minimum spacing between status and create calls. */
const API_MIN_INTERVAL_MS = 5_000;

export interface PaidStorageAdapterOptions {
  tasks: ReportTaskProtocol;
  writer: BatchWriter;
  protocol?: ReportProtocol;
  includeTaskId?: boolean;
}

export class PaidStorageAdapter implements WindowAdapter {
  readonly name = "paid-storage";
  private readonly tasks: ReportTaskProtocol;
  private readonly writer: BatchWriter;
  private readonly protocol: ReportProtocol;
  private readonly includeTaskId: boolean;

  constructor(opts: PaidStorageAdapterOptions) {
    this.tasks = opts.tasks;
    this.writer = opts.writer;
    this.protocol = opts.protocol ?? "tasks";
    this.includeTaskId = opts.includeTaskId ?? false;
  }

  async syncWindow(
    window: DateWindow,
    ctx: WindowContext,
  ): Promise<WindowOutcome> {
    if (this.protocol === "direct") {
      const rows = await this.tasks.fetchDirect(window);
      return this.store(window, rows, ctx);
    }

    const outcome = await this.tasks.runTask(window);
    switch (outcome.status) {
      case "failed":
        throw new TaskFailedError(outcome.taskId, outcome.reason);
      case "timedOut":
        return {
          status: "deferred",
          reason: `task ${outcome.taskId} not ready after ${Math.round(outcome.waitedMs / 1000)}s`,
        };
      case "done":
        return this.store(window, outcome.rows, ctx, outcome.taskId);
    }
  }

  private async store(
    window: DateWindow,
    rows: RawRow[],
    ctx: WindowContext,
    taskId?: string,
  ): Promise<WindowOutcome> {
    const records = rows.map((row) =>
      normalizeRow(row, {
        taskId: this.includeTaskId ? taskId : undefined,
      }),
    );
    const summary = await this.writer.write(records);

    ctx.logger.info(
      `${window.from}..${window.to}: ${summary.written} records upserted`,
      {
        rows: summary.received,
        duplicates: summary.duplicates,
        chunks: summary.chunks,
        attempt: ctx.attempt,
      },
    );
    return { status: "synced", itemsSynced: summary.written };
  }
}

// ─── Wiring ───

export interface PaidStorageDeps {
  logger: Logger;
  /** Overrides the Supabase store (tests, dry runs). */
  store?: RecordStore;
  rateLimiter?: RateLimiter;
  downloadLimiter?: RateLimiter;
  fetch?: typeof fetch;
  sleep?: Sleep;
  now?: () => number;
}

export function createPaidStorageAdapter(
  config: PaidStorageConfig,
  deps: PaidStorageDeps,
): PaidStorageAdapter {
  const http = new RateAwareHttpClient({
    baseUrl: config.apiBase,
    token: config.apiToken,
    authScheme: config.authScheme,
    rateLimiter:
      deps.rateLimiter ??
      createRateLimiter({
        minDelayMs: API_MIN_INTERVAL_MS,
        sleep: deps.sleep,
        now: deps.now,
      }),
    logger: deps.logger,
    timeoutMs: config.httpTimeoutMs,
    fetch: deps.fetch,
    sleep: deps.sleep,
  });

  const tasks = new ReportTaskProtocol({
    http,
    logger: deps.logger,
    poll: {
      intervalMs: config.pollIntervalMs,
      maxIntervalMs: Math.max(
        DEFAULT_POLL_POLICY.maxIntervalMs,
        config.pollIntervalMs,
      ),
      timeoutMs: config.pollTimeoutMs,
    },
    downloadLimiter: deps.downloadLimiter,
    sleep: deps.sleep,
    now: deps.now,
  });

  const store =
    deps.store ??
    (config.supabase
      ? new SupabaseRecordStore({
          url: config.supabase.url,
          serviceRoleKey: config.supabase.serviceRoleKey,
          table: config.table,
        })
      : new DryRunRecordStore(deps.logger));

  return new PaidStorageAdapter({
    tasks,
    writer: new BatchWriter(store, deps.logger),
    protocol: config.protocol,
    includeTaskId: config.includeTaskId,
  });
}
