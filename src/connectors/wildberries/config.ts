import type { AuthMode, TimeoutPolicy } from "../core/index.js";
import { ConfigError } from "../core/index.js";
import type { PaidStorageConfig, ReportProtocol } from "./types.js";

export const DEFAULT_API_BASE = "https://seller-analytics-api.wildberries.ru";
export const DEFAULT_TABLE = "wb_paid_storage";

const AUTH_MODES: readonly AuthMode[] = ["auto", "bearer", "plain"];
const PROTOCOLS: readonly ReportProtocol[] = ["tasks", "direct"];
const TIMEOUT_POLICIES: readonly TimeoutPolicy[] = ["defer", "fail"];

type Env = Record<string, string | undefined>;

/**
 * Read connector configuration from the environment. Every missing or
 * malformed variable is reported in a single ConfigError.
 */
export function loadPaidStorageConfig(
  env: Env = process.env,
  opts: { dryRun?: boolean } = {},
): PaidStorageConfig {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is not set`);
      return "";
    }
    return value;
  };

  const apiToken = required("WB_API_TOKEN");
  let supabase: PaidStorageConfig["supabase"] = null;
  if (!opts.dryRun) {
    const url = required("SUPABASE_URL");
    const serviceRoleKey = required("SUPABASE_SERVICE_ROLE_KEY");
    supabase = { url, serviceRoleKey };
  }

  const config: PaidStorageConfig = {
    apiBase: env.WB_API_BASE?.trim() || DEFAULT_API_BASE,
    apiToken,
    authScheme: parseChoice(env, "WB_AUTH_SCHEME", AUTH_MODES, "auto", problems),
    supabase,
    table: env.PAID_STORAGE_TABLE?.trim() || DEFAULT_TABLE,
    protocol: parseChoice(env, "PAID_STORAGE_PROTOCOL", PROTOCOLS, "tasks", problems),
    onTimeout: parseChoice(
      env,
      "PAID_STORAGE_ON_TIMEOUT",
      TIMEOUT_POLICIES,
      "defer",
      problems,
    ),
    pollIntervalMs: parseMs(env, "PAID_STORAGE_POLL_INTERVAL_MS", 15_000, problems),
    pollTimeoutMs: parseMs(env, "PAID_STORAGE_POLL_TIMEOUT_MS", 15 * 60_000, problems),
    httpTimeoutMs: parseMs(env, "PAID_STORAGE_HTTP_TIMEOUT_MS", 60_000, problems),
    includeTaskId: parseBool(env, "PAID_STORAGE_INCLUDE_TASK_ID", false, problems),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

// ─── Helpers ───

function parseChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T,
  problems: string[],
): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((c) => c === raw);
  if (match === undefined) {
    problems.push(`${name} must be one of ${choices.join(", ")} (got "${raw}")`);
    return fallback;
  }
  return match;
}

function parseMs(
  env: Env,
  name: string,
  fallback: number,
  problems: string[],
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    problems.push(`${name} must be a positive integer of milliseconds (got "${raw}")`);
    return fallback;
  }
  return value;
}

const TRUTHY = ["true", "1", "yes"];
const FALSY = ["false", "0", "no"];

function parseBool(
  env: Env,
  name: string,
  fallback: boolean,
  problems: string[],
): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (TRUTHY.includes(raw)) return true;
  if (FALSY.includes(raw)) return false;
  problems.push(`${name} must be true or false (got "${raw}")`);
  return fallback;
}
