/**
 * Paid-storage report task protocol.
 *
 * The report is produced asynchronously: create a task for a date window,
 * poll its status until it is terminal, then download the rows. Downloads
 * share a limiter that admits one call per minute and back off on 429 with
 * a cooldown measured in minutes rather than seconds.
 *
 * Waiting too long is an outcome, not an error: `waitForTask` returns
 * `timedOut` so the caller can defer the window to a later run.
 */

import type {
  DateWindow,
  Logger,
  RateAwareHttpClient,
  RateLimiter,
  RetryPolicy,
  Sleep,
} from "../core/index.js";
import { createRateLimiter, ProtocolError, sleep } from "../core/index.js";
import { extractRows, isRecord } from "./payload.js";
import type {
  RawRow,
  RemoteTaskStatus,
  TaskOutcome,
  TaskWaitResult,
} from "./types.js";

// ─── Endpoints ───

const REPORT_PATH = "/api/v1/paid_storage";
const statusPath = (taskId: string) =>
  `${REPORT_PATH}/tasks/${encodeURIComponent(taskId)}/status`;
const downloadPath = (taskId: string) =>
  `${REPORT_PATH}/tasks/${encodeURIComponent(taskId)}/download`;

// ─── Constants ───

export const DEFAULT_POLL_POLICY: PollPolicy = {
  intervalMs: 15_000,
  growth: 1.2,
  maxIntervalMs: 60_000,
  timeoutMs: 15 * 60_000,
};

/** The download endpoint admits roughly one call per minute. */
export const DOWNLOAD_MIN_INTERVAL_MS = 60_000;

export const DOWNLOAD_COOLDOWN: Partial<RetryPolicy> = {
  baseDelayMs: 65_000,
  factor: 1.25,
  maxDelayMs: 180_000,
  maxRetries: 5,
};

const PENDING_STATUSES = new Set(["new", "processing", "pending", "in_progress"]);
const FAILED_STATUSES = new Set(["error", "failed", "canceled", "cancelled", "purged"]);

// ─── Types ───

export interface PollPolicy {
  intervalMs: number;
  /** Multiplier applied to the interval after every poll. */
  growth: number;
  maxIntervalMs: number;
  /** Overall wait budget for one task. */
  timeoutMs: number;
}

export interface ReportTaskProtocolOptions {
  http: RateAwareHttpClient;
  logger: Logger;
  poll?: Partial<PollPolicy>;
  downloadLimiter?: RateLimiter;
  downloadRetry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  now?: () => number;
}

export interface TaskStatusReading {
  status: RemoteTaskStatus;
  raw: string;
}

// ─── Protocol ───

export class ReportTaskProtocol {
  private readonly http: RateAwareHttpClient;
  private readonly logger: Logger;
  private readonly poll: PollPolicy;
  private readonly downloadLimiter: RateLimiter;
  private readonly downloadRetry: Partial<RetryPolicy>;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(opts: ReportTaskProtocolOptions) {
    this.http = opts.http;
    this.logger = opts.logger;
    this.poll = { ...DEFAULT_POLL_POLICY, ...opts.poll };
    this.sleep = opts.sleep ?? sleep;
    this.now = opts.now ?? Date.now;
    this.downloadLimiter =
      opts.downloadLimiter ??
      createRateLimiter({
        minDelayMs: DOWNLOAD_MIN_INTERVAL_MS,
        sleep: this.sleep,
        now: this.now,
      });
    this.downloadRetry = opts.downloadRetry ?? DOWNLOAD_COOLDOWN;
  }

  /** Submit a report task for the window and return its id. */
  async createTask(window: DateWindow): Promise<string> {
    const payload = await this.http.get(REPORT_PATH, {
      query: { dateFrom: window.from, dateTo: window.to },
      label: "create task",
    });

    const taskId = readTaskId(payload);
    if (!taskId) {
      throw new ProtocolError("Create-task response carries no task id", payload);
    }
    this.logger.info(`Task ${taskId} created for ${window.from}..${window.to}`);
    return taskId;
  }

  async getTaskStatus(taskId: string): Promise<TaskStatusReading> {
    const payload = await this.http.get(statusPath(taskId), {
      label: "task status",
    });

    const raw = readStatus(payload);
    if (raw === null) {
      throw new ProtocolError(`Status response for task ${taskId} has no status`, payload);
    }

    const status = classifyStatus(raw);
    if (status === "pending" && !PENDING_STATUSES.has(raw)) {
      this.logger.warn(`Unknown status "${raw}" for task ${taskId}, still waiting`);
    }
    return { status, raw };
  }

  /**
   * Poll until the task is done or failed, or the wait budget runs out.
   * The interval grows by `growth` per poll up to `maxIntervalMs`, and the
   * last sleep is trimmed so the budget is never overshot.
   */
  async waitForTask(taskId: string): Promise<TaskWaitResult> {
    const started = this.now();
    let interval = this.poll.intervalMs;
    let polls = 0;

    for (;;) {
      const { status, raw } = await this.getTaskStatus(taskId);
      polls++;

      if (status === "done") {
        return { status: "done", polls };
      }
      if (status === "failed") {
        return { status: "failed", reason: `remote status "${raw}"`, polls };
      }

      const waited = this.now() - started;
      const remaining = this.poll.timeoutMs - waited;
      if (remaining <= 0) {
        this.logger.warn(
          `Task ${taskId} not ready after ${Math.round(waited / 1000)}s, giving up for this run`,
        );
        return { status: "timedOut", waitedMs: waited, polls };
      }

      await this.sleep(Math.min(interval, remaining));
      interval = Math.min(interval * this.poll.growth, this.poll.maxIntervalMs);
    }
  }

  async downloadReport(taskId: string): Promise<RawRow[]> {
    const payload = await this.http.get(downloadPath(taskId), {
      limiter: this.downloadLimiter,
      retry: this.downloadRetry,
      label: "download report",
    });
    return this.rowsFrom(payload, `task ${taskId}`);
  }

  /** create → poll → download for one window. */
  async runTask(window: DateWindow): Promise<TaskOutcome> {
    const taskId = await this.createTask(window);
    const waited = await this.waitForTask(taskId);

    switch (waited.status) {
      case "failed":
        return { status: "failed", taskId, reason: waited.reason };
      case "timedOut":
        return { status: "timedOut", taskId, waitedMs: waited.waitedMs };
      case "done": {
        const rows = await this.downloadReport(taskId);
        this.logger.info(
          `Task ${taskId}: ${rows.length} rows downloaded after ${waited.polls} polls`,
        );
        return { status: "done", taskId, rows };
      }
    }
  }

  /** Older synchronous flavour: the report endpoint answers with rows directly. */
  async fetchDirect(window: DateWindow): Promise<RawRow[]> {
    const payload = await this.http.get(REPORT_PATH, {
      query: { dateFrom: window.from, dateTo: window.to },
      limiter: this.downloadLimiter,
      retry: this.downloadRetry,
      label: "direct report",
    });
    return this.rowsFrom(payload, `${window.from}..${window.to}`);
  }

  private rowsFrom(payload: unknown, source: string): RawRow[] {
    const { rows, strategy, diagnostic } = extractRows(payload);
    if (diagnostic) {
      this.logger.warn(`Report payload for ${source}: ${diagnostic}`, {
        strategy,
      });
    }
    return rows;
  }
}

// ─── Response readers ───

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function asId(value: unknown): string | null {
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/** `{ data: { taskId } }`, `{ taskId }` or `{ data: { id } }`. */
export function readTaskId(payload: unknown): string | null {
  const data = field(payload, "data");
  return (
    asId(field(data, "taskId")) ??
    asId(field(payload, "taskId")) ??
    asId(field(data, "id"))
  );
}

/** `{ data: { status } }` or `{ status }`, lower-cased. */
export function readStatus(payload: unknown): string | null {
  const value = field(field(payload, "data"), "status") ?? field(payload, "status");
  return typeof value === "string" && value.trim() !== ""
    ? value.trim().toLowerCase()
    : null;
}

export function classifyStatus(raw: string): RemoteTaskStatus {
  if (raw === "done") return "done";
  if (FAILED_STATUSES.has(raw)) return "failed";
  return "pending";
}
