/**
 * Rate-aware JSON-over-HTTP client for the report API.
 *
 * Every attempt takes a slot from a rate limiter, 429/5xx/network failures
 * are retried with exponential backoff, and credential rejections surface
 * immediately. Callers can swap the limiter and the retry policy per call,
 * which is how the download endpoint gets its own slow cooldown.
 */

import {
  AuthError,
  NetworkError,
  ProtocolError,
  RateLimitedError,
  RequestRejectedError,
  RetryExhaustedError,
  ServerError,
  TransientError,
} from "./errors.js";
import type { BackoffPolicy, Sleep } from "./retry.js";
import { sleep, withRetry } from "./retry.js";
import type { Logger, RateLimiter } from "./types.js";

// ─── Constants ───

const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  baseDelayMs: 2_000,
  factor: 1.8,
  maxDelayMs: 20_000,
  jitter: 0.1,
};

// ─── Types ───

export interface RetryPolicy extends BackoffPolicy {
  maxRetries: number;
}

export type AuthScheme = "bearer" | "plain";
export type AuthMode = AuthScheme | "auto";

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
  query?: QueryParams;
  /** Limiter for this call instead of the client's default one. */
  limiter?: RateLimiter;
  retry?: Partial<RetryPolicy>;
  /** Short name used in log lines. */
  label?: string;
}

export interface RateAwareHttpClientOptions {
  baseUrl: string;
  token: string;
  authScheme?: AuthMode;
  rateLimiter: RateLimiter;
  logger: Logger;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
}

// ─── Credential scheme cache ───

/**
 * Remembers which Authorization format the server accepted. Resolved on the
 * first successful response and kept for the lifetime of the client.
 */
export class CredentialCache {
  private readonly token: string;
  private readonly mode: AuthMode;
  private resolved: AuthScheme | null = null;

  constructor(token: string, mode: AuthMode) {
    this.token = token;
    this.mode = mode;
  }

  get scheme(): AuthScheme | null {
    return this.resolved;
  }

  candidates(): AuthScheme[] {
    if (this.resolved) return [this.resolved];
    return this.mode === "auto" ? ["bearer", "plain"] : [this.mode];
  }

  header(scheme: AuthScheme): string {
    return scheme === "bearer" ? `Bearer ${this.token}` : this.token;
  }

  accept(scheme: AuthScheme): void {
    if (this.resolved === null) this.resolved = scheme;
  }
}

// ─── Client ───

export class RateAwareHttpClient {
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  readonly credentials: CredentialCache;

  constructor(opts: RateAwareHttpClientOptions) {
    this.baseUrl = opts.baseUrl;
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? globalThis.fetch;
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
    this.credentials = new CredentialCache(opts.token, opts.authScheme ?? "auto");
  }

  async get(path: string, opts: RequestOptions = {}): Promise<unknown> {
    return this.request("GET", path, undefined, opts);
  }

  async post(
    path: string,
    body: unknown,
    opts: RequestOptions = {},
  ): Promise<unknown> {
    return this.request("POST", path, body, opts);
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    body: unknown,
    opts: RequestOptions,
  ): Promise<unknown> {
    const url = this.buildUrl(path, opts.query);
    const limiter = opts.limiter ?? this.rateLimiter;
    const policy: RetryPolicy = { ...this.retry, ...opts.retry };
    const label = opts.label ?? `${method} ${path}`;

    try {
      return await withRetry(() => this.attempt(method, url, body, limiter), {
        ...policy,
        retryOn: (err) => err instanceof TransientError,
        minDelayFor: (err) =>
          err instanceof RateLimitedError ? err.retryAfterMs : null,
        onRetry: (err, attempt, delayMs) => {
          const reason = err instanceof Error ? err.message : String(err);
          this.logger.warn(
            `${label}: ${reason}, retrying in ${Math.round(delayMs / 1000)}s (attempt ${attempt}/${policy.maxRetries})`,
          );
        },
        sleep: this.sleep,
        random: this.random,
      });
    } catch (err) {
      if (err instanceof TransientError) {
        throw new RetryExhaustedError(policy.maxRetries + 1, err);
      }
      throw err;
    }
  }

  /** One logical attempt; may try several credential schemes without sleeping. */
  private async attempt(
    method: "GET" | "POST",
    url: string,
    body: unknown,
    limiter: RateLimiter,
  ): Promise<unknown> {
    await limiter.acquire();

    let rejectedWith = 401;
    for (const scheme of this.credentials.candidates()) {
      const res = await this.send(method, url, body, scheme);
      limiter.updateFromHeaders(headerRecord(res.headers));
      const text = await readBody(res, url);

      if (res.status === 401 || res.status === 403) {
        rejectedWith = res.status;
        continue;
      }

      // Resolved on success only; after a transient failure every scheme is tried again
      if (res.ok && this.credentials.scheme === null) {
        this.credentials.accept(scheme);
        this.logger.info(`Credential accepted using the ${scheme} scheme`);
      }
      if (res.status === 429) {
        const waitMs = retryAfterMs(res.headers);
        if (waitMs !== null) limiter.backoff(waitMs);
      }
      return interpret(res, text, url);
    }

    throw new AuthError(rejectedWith, url);
  }

  private async send(
    method: "GET" | "POST",
    url: string,
    body: unknown,
    scheme: AuthScheme,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: this.credentials.header(scheme),
      Accept: "application/json",
    };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    try {
      return await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new NetworkError(url, err);
    }
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

// ─── Helpers ───

function interpret(res: Response, text: string, url: string): unknown {
  if (res.status === 429) {
    throw new RateLimitedError(url, retryAfterMs(res.headers));
  }
  if (res.status >= 500) {
    throw new ServerError(res.status, url, text);
  }
  if (!res.ok) {
    throw new RequestRejectedError(res.status, url, text);
  }
  if (text.trim() === "") {
    throw new ProtocolError(`Empty response body from ${url}`, text);
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolError(`Unparseable response from ${url}`, text);
  }
}

async function readBody(res: Response, url: string): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    throw new NetworkError(url, err);
  }
}

function headerRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

/** Server-requested delay from Retry-After or X-Ratelimit-Retry, in ms. */
export function retryAfterMs(headers: Headers): number | null {
  const value = headers.get("retry-after") ?? headers.get("x-ratelimit-retry");
  if (!value) return null;

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds > 0 ? Math.round(seconds * 1000) : null;
  }
  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  const delta = at - Date.now();
  return delta > 0 ? delta : null;
}
