// Sync engine
export type { RunOptions, SyncEngineConfig } from "./engine.js";
export { exitCodeFor, SyncEngine } from "./engine.js";
// Errors
export {
  AuthError,
  ConfigError,
  ConnectorError,
  errorMessage,
  excerpt,
  InvalidRangeError,
  NetworkError,
  ProtocolError,
  RateLimitedError,
  RequestRejectedError,
  RetryExhaustedError,
  ServerError,
  SinkWriteError,
  TaskFailedError,
  TransientError,
} from "./errors.js";
// HTTP client
export type {
  AuthMode,
  AuthScheme,
  RateAwareHttpClientOptions,
  RequestOptions,
  RetryPolicy,
} from "./http.js";
export {
  CredentialCache,
  DEFAULT_RETRY_POLICY,
  RateAwareHttpClient,
} from "./http.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Rate limiter
export { createRateLimiter, TokenBucketRateLimiter } from "./rate-limiter.js";
// Retry helper
export type { BackoffPolicy, RetryOptions, Sleep } from "./retry.js";
export { backoffDelay, sleep, withRetry } from "./retry.js";
// State management
export { StateManager } from "./state.js";
export type {
  DateWindow,
  Logger,
  PersistedState,
  RateLimiter,
  RateLimiterConfig,
  SyncError,
  SyncMode,
  SyncRequest,
  SyncResult,
  SyncState,
  TimeoutPolicy,
  WindowAdapter,
  WindowContext,
  WindowOutcome,
} from "./types.js";
// Date windows
export {
  MAX_WINDOW_DAYS,
  parseIsoDate,
  planWindows,
  resolveRange,
  today,
} from "./windows.js";
