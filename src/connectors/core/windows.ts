/**
 * Calendar-date windows.
 *
 * All arithmetic runs on UTC midnights so a daylight-saving shift can never
 * move a boundary; only `today()` looks at the local clock.
 */

import { InvalidRangeError } from "./errors.js";
import type { DateWindow, SyncRequest } from "./types.js";

/** Widest window the report endpoint accepts, both ends inclusive. */
export const MAX_WINDOW_DAYS = 8;
export const DEFAULT_DAYS_BACK = 8;

const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseIsoDate(value: string): Date {
  const m = ISO_DATE.exec(value);
  if (!m) {
    throw new InvalidRangeError(`Expected a YYYY-MM-DD date, got "${value}"`);
  }
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new InvalidRangeError(`Not a calendar date: "${value}"`);
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(value: string, days: number): string {
  return formatIsoDate(new Date(parseIsoDate(value).getTime() + days * DAY_MS));
}

/** Today's date on the local clock, as `YYYY-MM-DD`. */
export function today(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function windowDays(window: DateWindow): number {
  const span =
    parseIsoDate(window.to).getTime() - parseIsoDate(window.from).getTime();
  return Math.round(span / DAY_MS) + 1;
}

export function windowKey(window: DateWindow): string {
  return `${window.from}..${window.to}`;
}

/** True when `inner` lies entirely within `outer`. */
export function windowCovers(outer: DateWindow, inner: DateWindow): boolean {
  return outer.from <= inner.from && inner.to <= outer.to;
}

export function windowsOverlap(a: DateWindow, b: DateWindow): boolean {
  return a.from <= b.to && b.from <= a.to;
}

/**
 * Split `[from, to]` into consecutive windows of at most `maxDays` days.
 * Lazy, ascending, contiguous, non-overlapping; `from === to` yields one
 * single-day window.
 */
export function* planWindows(
  from: string,
  to: string,
  maxDays: number = MAX_WINDOW_DAYS,
): Generator<DateWindow> {
  if (!Number.isInteger(maxDays) || maxDays < 1) {
    throw new InvalidRangeError(`Window size must be a positive integer, got ${maxDays}`);
  }
  const end = parseIsoDate(to).getTime();
  let cursor = parseIsoDate(from).getTime();
  if (cursor > end) {
    throw new InvalidRangeError(`Range start ${from} is after its end ${to}`);
  }

  while (cursor <= end) {
    const windowEnd = Math.min(cursor + (maxDays - 1) * DAY_MS, end);
    yield {
      from: formatIsoDate(new Date(cursor)),
      to: formatIsoDate(new Date(windowEnd)),
    };
    cursor = windowEnd + DAY_MS;
  }
}

/** The closed interval a sync request covers, relative to `todayIso`. */
export function resolveRange(request: SyncRequest, todayIso: string): DateWindow {
  switch (request.mode) {
    case "backfill":
      if (!Number.isInteger(request.year) || request.year < 1970 || request.year > 9999) {
        throw new InvalidRangeError(`Invalid backfill year: ${request.year}`);
      }
      return { from: `${request.year}-01-01`, to: `${request.year}-12-31` };
    case "range":
      return checked(request.from, request.to);
    case "since":
      return checked(request.from, todayIso);
    case "sync": {
      if (!Number.isInteger(request.daysBack) || request.daysBack < 1) {
        throw new InvalidRangeError(
          `days_back must be a positive integer, got ${request.daysBack}`,
        );
      }
      return { from: addDays(todayIso, -(request.daysBack - 1)), to: todayIso };
    }
  }
}

function checked(from: string, to: string): DateWindow {
  if (parseIsoDate(from).getTime() > parseIsoDate(to).getTime()) {
    throw new InvalidRangeError(`Range start ${from} is after its end ${to}`);
  }
  return { from, to };
}
