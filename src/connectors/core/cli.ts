#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  createPaidStorageAdapter,
  loadPaidStorageConfig,
} from "../wildberries/index.js";
import { exitCodeFor, SyncEngine } from "./engine.js";
import { ConfigError, errorMessage, InvalidRangeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { StateManager } from "./state.js";
import type { SyncRequest, SyncResult } from "./types.js";
import { DEFAULT_DAYS_BACK, parseIsoDate, windowKey } from "./windows.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

const DEFAULT_STATE_FILE = "./data/paid-storage/_meta/state.json";

type GlobalOptions = {
  dryRun?: boolean;
  state: string;
  skipDeferred?: boolean;
};

// ─── Argument parsers ───

function parseYear(value: string): number {
  const year = Number(value);
  if (!/^\d{4}$/.test(value) || year < 1970) {
    throw new InvalidArgumentError("Expected a four-digit year.");
  }
  return year;
}

function parseDate(value: string): string {
  try {
    parseIsoDate(value);
  } catch {
    throw new InvalidArgumentError("Expected a calendar date as YYYY-MM-DD.");
  }
  return value;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!/^\d+$/.test(value) || days < 1) {
    throw new InvalidArgumentError("Expected a positive whole number of days.");
  }
  return days;
}

// ─── Output ───

function printResult(result: SyncResult): void {
  console.log("\n═══ Sync Summary ═══\n");
  const status =
    result.windowsFailed > 0 ? "✗" : result.windowsDeferred > 0 ? "⚠" : "✓";
  console.log(
    `${status} ${result.adapter} (${result.mode} ${result.range.from}..${result.range.to}): ` +
      `${result.windowsSynced}/${result.windowsPlanned} windows, ${result.itemsSynced} records ` +
      `[${(result.durationMs / 1000).toFixed(1)}s]`,
  );
  for (const window of result.deferred) {
    console.log(`  ⏸ deferred ${windowKey(window)}`);
  }
  for (const err of result.errors.slice(0, 5)) {
    console.log(`  ✗ ${err.entity}: ${err.error}`);
  }
  if (result.errors.length > 5) {
    console.log(`  ... and ${result.errors.length - 5} more errors`);
  }
  if (result.aborted) {
    console.log("  Interrupted before all windows ran.");
  }
}

// ─── Commands ───

async function runSync(request: SyncRequest, opts: GlobalOptions): Promise<void> {
  const logger = createLogger("paid-storage", { timestamps: true });
  const config = loadPaidStorageConfig(process.env, { dryRun: opts.dryRun });
  if (opts.dryRun) {
    logger.info("Dry run: records are counted, nothing is written");
  }

  const engine = new SyncEngine({
    adapter: createPaidStorageAdapter(config, { logger }),
    stateFile: opts.state,
    logger,
  });
  const result = await engine.run(request, {
    includeDeferred: !opts.skipDeferred,
  });

  printResult(result);
  process.exit(exitCodeFor(result, config.onTimeout));
}

const program = new Command()
  .name("paid-storage-sync")
  .description("Sync the paid-storage report into the warehouse table")
  .version("1.0.0")
  .option("--dry-run", "Fetch and normalize without writing to the database")
  .option("--state <file>", "State file location", DEFAULT_STATE_FILE)
  .option("--skip-deferred", "Do not retry windows deferred by earlier runs")
  .exitOverride();

program
  .command("backfill")
  .description("Sync a whole calendar year")
  .argument("<year>", "four-digit year", parseYear)
  .action(async (year: number) => {
    await runSync({ mode: "backfill", year }, program.opts<GlobalOptions>());
  });

program
  .command("range")
  .description("Sync an explicit date range, both ends inclusive")
  .argument("<from>", "first day, YYYY-MM-DD", parseDate)
  .argument("<to>", "last day, YYYY-MM-DD", parseDate)
  .action(async (from: string, to: string) => {
    await runSync({ mode: "range", from, to }, program.opts<GlobalOptions>());
  });

program
  .command("since")
  .description("Sync from a date through today")
  .argument("<from>", "first day, YYYY-MM-DD", parseDate)
  .action(async (from: string) => {
    await runSync({ mode: "since", from }, program.opts<GlobalOptions>());
  });

program
  .command("sync")
  .description("Sync the trailing days ending today")
  .argument("[daysBack]", "number of days, today included", parseDays, DEFAULT_DAYS_BACK)
  .action(async (daysBack: number) => {
    await runSync({ mode: "sync", daysBack }, program.opts<GlobalOptions>());
  });

program
  .command("status")
  .description("Show the last successful run and the deferred windows")
  .action(() => {
    const { state: stateFile } = program.opts<GlobalOptions>();
    const state = new StateManager(stateFile).getRawState();
    console.log(`paid-storage: last synced ${state.lastSyncAt ?? "never"}`);
    if (state.deferredWindows.length === 0) {
      console.log("  no deferred windows");
    }
    for (const window of state.deferredWindows) {
      console.log(`  ⏸ deferred ${windowKey(window)}`);
    }
  });

try {
  await program.parseAsync();
} catch (err) {
  if (err instanceof CommanderError) {
    // Help and version exit cleanly; usage errors are reported by commander
    process.exit(err.exitCode === 0 ? 0 : 2);
  }
  if (err instanceof ConfigError || err instanceof InvalidRangeError) {
    console.error(`✗ ${err.message}`);
    process.exit(2);
  }
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(1);
}
