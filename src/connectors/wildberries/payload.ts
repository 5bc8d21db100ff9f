/**
 * Report payload extraction.
 *
 * The download endpoint has answered with a bare array as well as with the
 * rows wrapped under one of several keys. Each strategy is a pure function;
 * the first one that finds an array wins.
 */

import { excerpt } from "../core/index.js";
import type { RawRow } from "./types.js";

export type ExtractionStrategy = {
  name: string;
  extract: (payload: unknown) => unknown[] | undefined;
};

export interface Extraction {
  rows: RawRow[];
  /** Name of the strategy that matched, or null when none did. */
  strategy: string | null;
  /** Set when the shape was not recognised or elements were dropped. */
  diagnostic: string | null;
}

const WRAPPER_KEYS = ["data", "rows", "items", "result"] as const;
const NESTED_KEYS = ["rows", "items", "result"] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function arrayAt(value: unknown, key: string): unknown[] | undefined {
  if (!isRecord(value)) return undefined;
  const inner = value[key];
  return Array.isArray(inner) ? inner : undefined;
}

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  {
    name: "array",
    extract: (payload) => (Array.isArray(payload) ? payload : undefined),
  },
  ...WRAPPER_KEYS.map(
    (key): ExtractionStrategy => ({
      name: key,
      extract: (payload) => arrayAt(payload, key),
    }),
  ),
  ...NESTED_KEYS.map(
    (key): ExtractionStrategy => ({
      name: `data.${key}`,
      extract: (payload) =>
        isRecord(payload) ? arrayAt(payload.data, key) : undefined,
    }),
  ),
];

export function extractRows(
  payload: unknown,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES,
): Extraction {
  for (const strategy of strategies) {
    const found = strategy.extract(payload);
    if (found === undefined) continue;

    const rows = found.filter(isRecord);
    const dropped = found.length - rows.length;
    return {
      rows,
      strategy: strategy.name,
      diagnostic:
        dropped > 0 ? `dropped ${dropped} non-object element(s)` : null,
    };
  }

  return {
    rows: [],
    strategy: null,
    diagnostic: describeShape(payload),
  };
}

function describeShape(payload: unknown): string {
  if (isRecord(payload)) {
    const keys = Object.keys(payload);
    return `unrecognised object with keys [${keys.join(", ")}]: ${excerpt(payload)}`;
  }
  const kind = payload === null ? "null" : typeof payload;
  return `unrecognised ${kind} payload: ${excerpt(payload)}`;
}
