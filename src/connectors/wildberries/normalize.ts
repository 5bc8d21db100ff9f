import { createHash } from "node:crypto";
import type {
  CanonicalField,
  NormalizedRecord,
  PaidStorageRecord,
  RawRow,
} from "./types.js";
import { NATURAL_KEY } from "./types.js";

type FieldKind = "date" | "number" | "text";

interface FieldSpec {
  source: string;
  target: CanonicalField;
  kind: FieldKind;
}

// ─── Field table (API name → column) ───

export const FIELD_MAP: readonly FieldSpec[] = [
  { source: "date", target: "date", kind: "date" },
  { source: "logWarehouseCoef", target: "log_warehouse_coef", kind: "number" },
  { source: "officeId", target: "office_id", kind: "number" },
  { source: "warehouse", target: "warehouse", kind: "text" },
  { source: "warehouseCoef", target: "warehouse_coef", kind: "number" },
  { source: "giId", target: "gi_id", kind: "number" },
  { source: "chrtId", target: "chrt_id", kind: "number" },
  { source: "size", target: "size", kind: "text" },
  { source: "barcode", target: "barcode", kind: "text" },
  { source: "subject", target: "subject", kind: "text" },
  { source: "brand", target: "brand", kind: "text" },
  { source: "vendorCode", target: "vendor_code", kind: "text" },
  { source: "nmId", target: "nm_id", kind: "number" },
  { source: "volume", target: "volume", kind: "number" },
  { source: "calcType", target: "calc_type", kind: "text" },
  { source: "warehousePrice", target: "warehouse_price", kind: "number" },
  { source: "barcodesCount", target: "barcodes_count", kind: "number" },
  { source: "palletPlaceCode", target: "pallet_place_code", kind: "number" },
  { source: "palletCount", target: "pallet_count", kind: "number" },
  { source: "originalDate", target: "original_date", kind: "date" },
  { source: "loyaltyDiscount", target: "loyalty_discount", kind: "number" },
  { source: "tariffFixDate", target: "tariff_fix_date", kind: "date" },
  { source: "tariffLowerDate", target: "tariff_lower_date", kind: "date" },
];

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// ─── Coercion ───

function isBlank(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === "string" && value.trim() === "")
  );
}

/** First 10 characters of a date or timestamp: `2024-03-01T00:00:00Z` → `2024-03-01`. */
export function normalizeDate(value: unknown): string | null {
  if (isBlank(value)) return null;
  if (typeof value !== "string" && typeof value !== "number") return null;
  return String(value).trim().slice(0, 10);
}

export function normalizeNumber(value: unknown): number | null {
  if (isBlank(value)) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const compact = value.replace(/\s/g, "");
  // A single comma is the decimal separator; grouping separators are not read
  const commas = compact.split(",").length - 1;
  if (commas > 1 || (commas === 1 && compact.includes("."))) return null;
  const text = compact.replace(",", ".");
  if (!NUMERIC.test(text)) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

export function normalizeText(value: unknown): string | null {
  if (isBlank(value)) return null;
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

const COERCE: Record<FieldKind, (value: unknown) => string | number | null> = {
  date: normalizeDate,
  number: normalizeNumber,
  text: normalizeText,
};

// ─── Fingerprint ───

/** JSON with keys in lexicographic order; values are flat primitives. */
export function canonicalJson(record: Record<string, unknown>): string {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return JSON.stringify(sorted);
}

export function fingerprint(record: PaidStorageRecord): string {
  return createHash("sha256").update(canonicalJson({ ...record })).digest("hex");
}

// ─── Public API ───

export interface NormalizeOptions {
  /** Carried on the record but never part of the fingerprint. */
  taskId?: string;
}

export function normalizeRow(
  row: RawRow,
  opts: NormalizeOptions = {},
): NormalizedRecord {
  const canonical: Record<string, string | number | null> = {};
  for (const field of FIELD_MAP) {
    canonical[field.target] = COERCE[field.kind](row[field.source]);
  }
  const record = toRecord(canonical);

  const out: NormalizedRecord = { ...record, _hash: fingerprint(record) };
  if (opts.taskId !== undefined) out.task_id = opts.taskId;
  return out;
}

export function naturalKey(record: PaidStorageRecord): string {
  return JSON.stringify(NATURAL_KEY.map((field) => record[field]));
}

function toRecord(c: Record<string, string | number | null>): PaidStorageRecord {
  const text = (key: CanonicalField): string | null => {
    const v = c[key];
    return typeof v === "string" ? v : null;
  };
  const num = (key: CanonicalField): number | null => {
    const v = c[key];
    return typeof v === "number" ? v : null;
  };
  return {
    date: text("date"),
    log_warehouse_coef: num("log_warehouse_coef"),
    office_id: num("office_id"),
    warehouse: text("warehouse"),
    warehouse_coef: num("warehouse_coef"),
    gi_id: num("gi_id"),
    chrt_id: num("chrt_id"),
    size: text("size"),
    barcode: text("barcode"),
    subject: text("subject"),
    brand: text("brand"),
    vendor_code: text("vendor_code"),
    nm_id: num("nm_id"),
    volume: num("volume"),
    calc_type: text("calc_type"),
    warehouse_price: num("warehouse_price"),
    barcodes_count: num("barcodes_count"),
    pallet_place_code: num("pallet_place_code"),
    pallet_count: num("pallet_count"),
    original_date: text("original_date"),
    loyalty_discount: num("loyalty_discount"),
    tariff_fix_date: text("tariff_fix_date"),
    tariff_lower_date: text("tariff_lower_date"),
  };
}
