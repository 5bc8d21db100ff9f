/**
 * Error taxonomy shared by the HTTP client, the report protocol and the
 * sync engine.
 *
 * Only unrecoverable conditions are thrown. A report task that is still
 * running when the wait budget runs out is a result variant, not an error.
 */

const EXCERPT_LIMIT = 200;

export abstract class ConnectorError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required configuration is missing or malformed. Fatal for the process. */
export class ConfigError extends ConnectorError {
  readonly retryable = false;
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

/** The remote side rejected the credential. */
export class AuthError extends ConnectorError {
  readonly retryable = false;
  readonly status: number;

  constructor(status: number, url: string) {
    super(`Credential rejected (HTTP ${status}) for ${url}`);
    this.status = status;
  }
}

// ─── Transient failures (retried with backoff) ───

export abstract class TransientError extends ConnectorError {
  readonly retryable = true;
}

export class RateLimitedError extends TransientError {
  readonly status = 429;
  /** Delay requested by the server, if it sent one. */
  readonly retryAfterMs: number | null;

  constructor(url: string, retryAfterMs: number | null) {
    super(`Rate limited (HTTP 429) for ${url}`);
    this.retryAfterMs = retryAfterMs;
  }
}

export class ServerError extends TransientError {
  readonly status: number;

  constructor(status: number, url: string, body: string) {
    super(`Server error (HTTP ${status}) for ${url}: ${excerpt(body)}`);
    this.status = status;
  }
}

export class NetworkError extends TransientError {
  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Network failure for ${url}: ${reason}`, { cause });
  }
}

export class RetryExhaustedError extends ConnectorError {
  readonly retryable = true;
  readonly attempts: number;
  readonly lastError: TransientError;

  constructor(attempts: number, lastError: TransientError) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
    });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

// ─── Non-retried request failures ───

/** A 4xx other than 401/403/429, e.g. a bad date window. */
export class RequestRejectedError extends ConnectorError {
  readonly retryable = false;
  readonly status: number;

  constructor(status: number, url: string, body: string) {
    super(`Request rejected (HTTP ${status}) for ${url}: ${excerpt(body)}`);
    this.status = status;
  }
}

/** The response did not have the structure the protocol expects. */
export class ProtocolError extends ConnectorError {
  readonly retryable = false;
  readonly payloadExcerpt: string;

  constructor(message: string, payload: unknown) {
    const snippet = excerpt(payload);
    super(`${message}: ${snippet}`);
    this.payloadExcerpt = snippet;
  }
}

export class TaskFailedError extends ConnectorError {
  readonly retryable = true;
  readonly taskId: string;

  constructor(taskId: string, reason: string) {
    super(`Report task ${taskId} failed: ${reason}`);
    this.taskId = taskId;
  }
}

export class SinkWriteError extends ConnectorError {
  readonly retryable = true;
  readonly chunkIndex: number;

  constructor(chunkIndex: number, reason: string, cause?: unknown) {
    super(`Upsert of chunk ${chunkIndex} failed: ${reason}`, { cause });
    this.chunkIndex = chunkIndex;
  }
}

export class InvalidRangeError extends ConnectorError {
  readonly retryable = false;
}

// ─── Helpers ───

/** Bounded, single-line rendering of an arbitrary payload for diagnostics. */
export function excerpt(value: unknown, max = EXCERPT_LIMIT): string {
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  text = text.replace(/\s+/g, " ").trim();
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
