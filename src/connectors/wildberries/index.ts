// Adapter
export type { PaidStorageAdapterOptions, PaidStorageDeps } from "./adapter.js";
export { createPaidStorageAdapter, PaidStorageAdapter } from "./adapter.js";
// Configuration
export {
  DEFAULT_API_BASE,
  DEFAULT_TABLE,
  loadPaidStorageConfig,
} from "./config.js";
// Normalizer
export {
  canonicalJson,
  FIELD_MAP,
  fingerprint,
  naturalKey,
  normalizeRow,
} from "./normalize.js";
// Payload extraction
export type { Extraction, ExtractionStrategy } from "./payload.js";
export { EXTRACTION_STRATEGIES, extractRows } from "./payload.js";
// Sink
export type { RecordStore, WriteSummary } from "./sink.js";
export {
  BatchWriter,
  DryRunRecordStore,
  dedupeByKey,
  ON_CONFLICT,
  SupabaseRecordStore,
  UPSERT_CHUNK_SIZE,
} from "./sink.js";
// Report task protocol
export type { PollPolicy, ReportTaskProtocolOptions } from "./tasks.js";
export {
  DEFAULT_POLL_POLICY,
  DOWNLOAD_COOLDOWN,
  ReportTaskProtocol,
} from "./tasks.js";
// Types
export type {
  NormalizedRecord,
  PaidStorageConfig,
  PaidStorageRecord,
  RawRow,
  ReportProtocol,
  TaskOutcome,
  TaskWaitResult,
} from "./types.js";
export { NATURAL_KEY } from "./types.js";
