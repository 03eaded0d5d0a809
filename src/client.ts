import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { selectAuth, type ApiVersion, type Credentials } from "./credentials.js";
import { endpointByName, resolveRoutes, type EndpointDescriptor } from "./endpoints.js";
import {
  ApiError,
  AuthError,
  NotFoundError,
  RateLimitError,
  RequestError,
  ServerError,
  TransportError,
  isRetryable,
  type ErrorContext,
} from "./errors.js";
import { createLogger } from "./logger.js";

export const DEFAULT_BASE_URL = "https://www.cradlepointecm.com/api/v2";
export const DEFAULT_BASE_URL_V3 = "https://api.cradlepointecm.com/api/v3";

export interface ClientOptions {
  credentials?: Credentials;
  /** Base URL of the legacy (v2) API */
  baseUrl?: string;
  /** Base URL of the current (v3) API */
  baseUrlV3?: string;
  /** Transport; defaults to the global fetch */
  fetch?: typeof globalThis.fetch;
  /** Per-request timeout (default 30000) */
  timeoutMs?: number;
  /** Total attempts for retryable failures, first one included (default 3) */
  maxAttempts?: number;
  /** First backoff delay (default 1000) */
  backoffBaseMs?: number;
  /** Backoff multiplier per attempt (default 2) */
  backoffFactor?: number;
  /** Upper bound for any single backoff or Retry-After wait (default 30000) */
  backoffMaxMs?: number;
  /** Delay before each request issued from a pagination or chunk loop (default 200) */
  throttleMs?: number;
  /** Sleep used for backoff and throttling */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface DispatchOptions {
  method: string;
  endpoint: EndpointDescriptor;
  /** Path relative to the version base URL; defaults to the endpoint's collection path */
  path?: string;
  /** Absolute URL (a server-supplied next link). Takes precedence over path and query. */
  url?: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
  /** How a 404 is read: an empty collection, or a missing single resource */
  read?: "collection" | "item";
  /** Issued from inside a loop: wait the throttle delay first */
  throttle?: boolean;
}

export class NcmClient {
  private credentials: Credentials;
  private routeCache: Record<string, EndpointDescriptor> | null = null;
  private readonly baseUrl: string;
  private readonly baseUrlV3: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly backoffFactor: number;
  readonly backoffMaxMs: number;
  readonly throttleMs: number;

  constructor(options: ClientOptions = {}) {
    this.credentials = { ...options.credentials };
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.baseUrlV3 = (options.baseUrlV3 ?? DEFAULT_BASE_URL_V3).replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.log = options.logger ?? createLogger("client");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffBaseMs = options.backoffBaseMs ?? 1_000;
    this.backoffFactor = options.backoffFactor ?? 2;
    this.backoffMaxMs = options.backoffMaxMs ?? 30_000;
    this.throttleMs = options.throttleMs ?? 200;
  }

  /** Replace the credential set (e.g. after key rotation). Requests already started keep their headers. */
  setCredentials(credentials: Credentials): void {
    this.credentials = { ...credentials };
    this.routeCache = null;
  }

  getCredentials(): Readonly<Credentials> {
    return this.credentials;
  }

  /** Catalog endpoint of a resource */
  endpoint(name: string): EndpointDescriptor {
    const endpoint = endpointByName(name);
    if (!endpoint) throw new RequestError(`Unknown resource: ${name}`, undefined, null);
    return endpoint;
  }

  /** Collection a dual route reads from under the current credentials */
  route(name: string): EndpointDescriptor {
    this.routeCache ??= resolveRoutes(this.credentials);
    const routed = this.routeCache[name];
    if (!routed) throw new RequestError(`Unknown route: ${name}`, undefined, null);
    return routed;
  }

  baseUrlFor(version: ApiVersion): string {
    return version === "v3" ? this.baseUrlV3 : this.baseUrl;
  }

  buildUrl(options: Pick<DispatchOptions, "endpoint" | "path" | "url" | "query">): URL {
    const base = this.baseUrlFor(options.endpoint.version);
    if (options.url) {
      // Credentials are only ever sent to the configured API host
      const next = new URL(options.url);
      const origin = new URL(base).origin;
      if (next.origin !== origin) {
        throw new RequestError(`Refusing to follow a link to ${next.origin}; expected ${origin}`, undefined, null, {
          endpoint: options.endpoint.name,
        });
      }
      return next;
    }
    const path = options.path ?? options.endpoint.path;
    const url = new URL(`${base}${path}`);
    if (options.query) {
      for (const [k, v] of Object.entries(options.query)) {
        if (v !== undefined && v !== "") url.searchParams.set(k, v);
      }
    }
    return url;
  }

  /**
   * Issue one logical request: pick auth headers, send, classify the status
   * and retry transient failures with bounded backoff. Resolves with the
   * decoded JSON payload; rejects with a typed error.
   */
  async dispatch(options: DispatchOptions): Promise<unknown> {
    const { endpoint } = options;
    // Headers are fixed here so a credential swap mid-retry cannot change them.
    const auth = selectAuth(this.credentials, endpoint.version);
    const url = this.buildUrl(options);
    const headers: Record<string, string> = {
      ...auth.headers,
      Accept: endpoint.version === "v3" ? "application/vnd.api+json" : "application/json",
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = endpoint.version === "v3" ? "application/vnd.api+json" : "application/json";
    }
    const body = options.body !== undefined ? JSON.stringify(options.body) : undefined;
    const context: ErrorContext = {
      endpoint: endpoint.name,
      query: Object.fromEntries(url.searchParams),
    };

    if (options.throttle && this.throttleMs > 0) await this.sleep(this.throttleMs);

    for (let attempt = 1; ; attempt++) {
      this.log.debug({ method: options.method, url: url.toString(), attempt, auth: auth.mode }, "request");
      try {
        return await this.attempt(options, url, headers, body, { ...context, attempts: attempt });
      } catch (err) {
        if (!isRetryable(err) || attempt >= this.maxAttempts) throw err;
        const waitMs = this.backoffDelay(attempt, err instanceof ApiError ? err.retryAfterMs : undefined);
        this.log.warn(
          { endpoint: endpoint.name, attempt, waitMs, error: err instanceof Error ? err.message : String(err) },
          "retrying request",
        );
        await this.sleep(waitMs);
      }
    }
  }

  /** Delay before the next attempt: Retry-After when the server sent one, else exponential */
  backoffDelay(failedAttempts: number, retryAfterMs?: number): number {
    const exp = this.backoffBaseMs * this.backoffFactor ** (failedAttempts - 1);
    return Math.min(retryAfterMs ?? exp, this.backoffMaxMs);
  }

  private async attempt(
    options: DispatchOptions,
    url: URL,
    headers: Record<string, string>,
    body: string | undefined,
    context: ErrorContext,
  ): Promise<unknown> {
    let resp: Response;
    try {
      resp = await this.fetchFn(url, {
        method: options.method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw this.transportError(err, url, context);
    }

    if (resp.ok) {
      // The timeout signal also covers the body read
      let text: string;
      try {
        text = await resp.text();
      } catch (err) {
        throw this.transportError(err, url, context);
      }
      return decodeBody(text, resp.status, url, context);
    }

    const status = resp.status;
    if (status === 404 && (options.read ?? "collection") === "collection" && options.method.toUpperCase() === "GET") {
      return { data: [] };
    }

    const parsed = await readErrorBody(resp);
    const message = `HTTP ${status}`;
    if (status === 401 || status === 403) throw new AuthError(message, status, parsed, context);
    if (status === 404) throw new NotFoundError(message, status, parsed, context);
    if (status === 429 || status >= 500) {
      const retryAfterMs = parseRetryAfter(resp.headers.get("retry-after"));
      const ErrorClass = status === 429 ? RateLimitError : ServerError;
      throw new ErrorClass(message, status, parsed, { ...context, retryAfterMs });
    }
    throw new RequestError(message, status, parsed, context);
  }

  private transportError(err: unknown, url: URL, context: ErrorContext): TransportError {
    const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
    const message = timedOut
      ? `Request to ${url.pathname} timed out after ${this.timeoutMs}ms`
      : `Request to ${url.pathname} failed: ${err instanceof Error ? err.message : String(err)}`;
    return new TransportError(message, context, { cause: err });
  }
}

/** Retry-After as milliseconds: delta-seconds or an HTTP date */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === "") return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Math.round(Number(trimmed) * 1000);
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function decodeBody(text: string, status: number, url: URL, context: ErrorContext): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ApiError(
      `Expected JSON from ${url.pathname} but got non-JSON response (status ${status}). ` +
        `Snippet: ${text.slice(0, 200)}`,
      status,
      { statusCode: status, body: text.slice(0, 500) },
      context,
    );
  }
}

async function readErrorBody(resp: Response): Promise<unknown> {
  const text = await resp.text().catch(() => "");
  if (!text) return { statusCode: resp.status, message: resp.statusText };
  try {
    return JSON.parse(text);
  } catch {
    return { statusCode: resp.status, message: text };
  }
}
