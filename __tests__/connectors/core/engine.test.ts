import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { exitCodeFor, SyncEngine } from "../../../src/connectors/core/engine.js";
import { AuthError, ConfigError } from "../../../src/connectors/core/errors.js";
import type {
  DateWindow,
  Logger,
  SyncResult,
  WindowAdapter,
  WindowContext,
  WindowOutcome,
} from "../../../src/connectors/core/types.js";

type Behaviour = (window: DateWindow, ctx: WindowContext) => Promise<WindowOutcome>;

class MockAdapter implements WindowAdapter {
  name = "mock";
  calls: Array<{ window: DateWindow; attempt: number }> = [];
  behaviour: Behaviour = async () => ({ status: "synced", itemsSynced: 10 });

  async syncWindow(window: DateWindow, ctx: WindowContext): Promise<WindowOutcome> {
    this.calls.push({ window, attempt: ctx.attempt });
    return this.behaviour(window, ctx);
  }
}

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), progress: vi.fn() };
}

function readState(file: string) {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

describe("SyncEngine", () => {
  let tmpDir: string;
  let stateFile: string;
  let sleeps: number[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "paid-storage-engine-"));
    stateFile = path.join(tmpDir, "_meta", "state.json");
    sleeps = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function engineFor(adapter: WindowAdapter) {
    return new SyncEngine({
      adapter,
      stateFile,
      logger: silentLogger(),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      clock: () => new Date(2024, 2, 10, 12, 0),
    });
  }

  it("walks every window in order and saves lastSyncAt", async () => {
    const adapter = new MockAdapter();
    const result = await engineFor(adapter).run({
      mode: "range",
      from: "2024-01-01",
      to: "2024-01-20",
    });

    expect(adapter.calls.map((c) => c.window)).toEqual([
      { from: "2024-01-01", to: "2024-01-08" },
      { from: "2024-01-09", to: "2024-01-16" },
      { from: "2024-01-17", to: "2024-01-20" },
    ]);
    expect(result).toMatchObject({
      adapter: "mock",
      mode: "range",
      range: { from: "2024-01-01", to: "2024-01-20" },
      windowsPlanned: 3,
      windowsSynced: 3,
      windowsFailed: 0,
      itemsSynced: 30,
      aborted: false,
    });
    expect(sleeps).toEqual([2_000, 2_000]);
    expect(readState(stateFile).lastSyncAt).toBeTruthy();
  });

  it("resolves sync mode against the injected clock", async () => {
    const adapter = new MockAdapter();
    const result = await engineFor(adapter).run({ mode: "sync", daysBack: 8 });
    expect(result.range).toEqual({ from: "2024-03-03", to: "2024-03-10" });
    expect(adapter.calls).toHaveLength(1);
  });

  it("retries a failing window with a growing delay", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async (_w, ctx) => {
      if (ctx.attempt < 3) throw new Error("connection reset");
      return { status: "synced", itemsSynced: 4 };
    };

    const result = await engineFor(adapter).run({
      mode: "range",
      from: "2024-01-01",
      to: "2024-01-05",
    });

    expect(adapter.calls.map((c) => c.attempt)).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([5_000, 10_000]);
    expect(result.windowsSynced).toBe(1);
  });

  it("isolates a window that keeps failing and leaves lastSyncAt unset", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async (window) => {
      if (window.from === "2024-01-09") throw new Error("upstream exploded");
      return { status: "synced", itemsSynced: 1 };
    };

    const result = await engineFor(adapter).run({
      mode: "range",
      from: "2024-01-01",
      to: "2024-01-20",
    });

    expect(result.windowsSynced).toBe(2);
    expect(result.windowsFailed).toBe(1);
    expect(result.errors).toEqual([
      {
        entity: "window:2024-01-09..2024-01-16",
        error: "upstream exploded",
        retryable: true,
      },
    ]);
    expect(adapter.calls).toHaveLength(5);
    expect(readState(stateFile).lastSyncAt).toBeNull();
    expect(exitCodeFor(result)).toBe(1);
  });

  it("does not retry a rejected credential", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async () => {
      throw new AuthError(401, "https://api.test/x");
    };

    const result = await engineFor(adapter).run({
      mode: "range",
      from: "2024-01-01",
      to: "2024-01-02",
    });

    expect(adapter.calls).toHaveLength(1);
    expect(result.errors[0].retryable).toBe(false);
  });

  it("aborts the run on a configuration error", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async () => {
      throw new ConfigError(["WB_API_TOKEN is not set"]);
    };

    await expect(
      engineFor(adapter).run({ mode: "range", from: "2024-01-01", to: "2024-01-02" }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("records a deferred window and retries it first on the next run", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async () => ({ status: "deferred", reason: "task t-1 not ready" });

    const first = await engineFor(adapter).run({
      mode: "range",
      from: "2024-01-01",
      to: "2024-01-05",
    });
    expect(first.windowsDeferred).toBe(1);
    expect(first.deferred).toEqual([{ from: "2024-01-01", to: "2024-01-05" }]);
    expect(exitCodeFor(first, "defer")).toBe(0);
    expect(exitCodeFor(first, "fail")).toBe(1);
    expect(readState(stateFile).deferredWindows).toEqual([
      { from: "2024-01-01", to: "2024-01-05" },
    ]);

    adapter.calls = [];
    adapter.behaviour = async () => ({ status: "synced", itemsSynced: 2 });
    const second = await engineFor(adapter).run({
      mode: "range",
      from: "2024-02-01",
      to: "2024-02-03",
    });

    expect(adapter.calls.map((c) => c.window)).toEqual([
      { from: "2024-01-01", to: "2024-01-05" },
      { from: "2024-02-01", to: "2024-02-03" },
    ]);
    expect(second.windowsPlanned).toBe(2);
    expect(readState(stateFile).deferredWindows).toEqual([]);
  });

  it("leaves deferred windows alone when asked to skip them", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async () => ({ status: "deferred", reason: "slow" });
    await engineFor(adapter).run({ mode: "range", from: "2024-01-01", to: "2024-01-05" });

    adapter.calls = [];
    adapter.behaviour = async () => ({ status: "synced", itemsSynced: 1 });
    await engineFor(adapter).run(
      { mode: "range", from: "2024-02-01", to: "2024-02-03" },
      { includeDeferred: false },
    );

    expect(adapter.calls).toHaveLength(1);
    expect(readState(stateFile).deferredWindows).toEqual([
      { from: "2024-01-01", to: "2024-01-05" },
    ]);
  });

  it("leaves earlier ledger entries untouched when skipping deferred windows", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async () => ({ status: "deferred", reason: "slow" });
    await engineFor(adapter).run({ mode: "range", from: "2024-01-03", to: "2024-01-05" });

    adapter.calls = [];
    adapter.behaviour = async () => ({ status: "synced", itemsSynced: 1 });
    await engineFor(adapter).run(
      { mode: "range", from: "2024-01-01", to: "2024-01-08" },
      { includeDeferred: false },
    );

    expect(adapter.calls.map((c) => c.window)).toEqual([
      { from: "2024-01-01", to: "2024-01-08" },
    ]);
    expect(readState(stateFile).deferredWindows).toEqual([
      { from: "2024-01-03", to: "2024-01-05" },
    ]);
  });

  it("settles a deferred window once a covering run syncs it", async () => {
    const adapter = new MockAdapter();
    adapter.behaviour = async () => ({ status: "deferred", reason: "slow" });
    await engineFor(adapter).run({ mode: "range", from: "2024-01-03", to: "2024-01-05" });

    adapter.calls = [];
    adapter.behaviour = async () => ({ status: "synced", itemsSynced: 1 });
    await engineFor(adapter).run({ mode: "range", from: "2024-01-01", to: "2024-01-08" });

    expect(adapter.calls.map((c) => c.window)).toEqual([
      { from: "2024-01-01", to: "2024-01-08" },
    ]);
    expect(readState(stateFile).deferredWindows).toEqual([]);
  });

  it("stops between windows when the signal fires", async () => {
    const adapter = new MockAdapter();
    const controller = new AbortController();
    adapter.behaviour = async () => {
      controller.abort();
      return { status: "synced", itemsSynced: 1 };
    };

    const result = await engineFor(adapter).run(
      { mode: "range", from: "2024-01-01", to: "2024-01-20" },
      { signal: controller.signal },
    );

    expect(adapter.calls).toHaveLength(1);
    expect(result.aborted).toBe(true);
    expect(readState(stateFile).lastSyncAt).toBeNull();
    expect(readState(stateFile).deferredWindows).toEqual([
      { from: "2024-01-09", to: "2024-01-16" },
      { from: "2024-01-17", to: "2024-01-20" },
    ]);
    expect(exitCodeFor(result)).toBe(1);
  });

  it("picks up windows left by an interrupted run on the next run", async () => {
    const adapter = new MockAdapter();
    const controller = new AbortController();
    adapter.behaviour = async () => {
      controller.abort();
      return { status: "synced", itemsSynced: 1 };
    };
    await engineFor(adapter).run(
      { mode: "backfill", year: 2023 },
      { signal: controller.signal },
    );
    expect(readState(stateFile).deferredWindows).toHaveLength(45);

    adapter.calls = [];
    adapter.behaviour = async () => ({ status: "synced", itemsSynced: 1 });
    const next = await engineFor(adapter).run({ mode: "sync", daysBack: 1 });

    expect(adapter.calls).toHaveLength(46);
    expect(adapter.calls[0].window).toEqual({ from: "2023-01-09", to: "2023-01-16" });
    expect(next.windowsSynced).toBe(46);
    expect(readState(stateFile).deferredWindows).toEqual([]);
  });

  it("records the last run in state metadata", async () => {
    const adapter = new MockAdapter();
    await engineFor(adapter).run({ mode: "backfill", year: 2023 });
    const state = readState(stateFile);
    expect(state.metadata.lastRun).toMatchObject({
      mode: "backfill",
      range: { from: "2023-01-01", to: "2023-12-31" },
      windowsSynced: 46,
      itemsSynced: 460,
    });
  });
});

describe("exitCodeFor", () => {
  const base: SyncResult = {
    adapter: "mock",
    mode: "sync",
    range: { from: "2024-03-03", to: "2024-03-10" },
    windowsPlanned: 1,
    windowsSynced: 1,
    windowsDeferred: 0,
    windowsFailed: 0,
    itemsSynced: 3,
    deferred: [],
    errors: [],
    aborted: false,
    durationMs: 1,
  };

  it("is 0 for a clean run under either policy", () => {
    expect(exitCodeFor(base)).toBe(0);
    expect(exitCodeFor(base, "fail")).toBe(0);
  });

  it("is 1 when any window failed", () => {
    expect(exitCodeFor({ ...base, windowsFailed: 1 }, "defer")).toBe(1);
  });

  it("is 1 for an interrupted run", () => {
    expect(exitCodeFor({ ...base, aborted: true }, "defer")).toBe(1);
  });
});
