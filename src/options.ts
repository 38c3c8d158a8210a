import { CookieJar } from "tough-cookie";

/**
 * TLS verification policy: `false` accepts any certificate (controllers ship
 * a self-signed one), `true` uses the system CAs, a string is the path of a
 * PEM bundle to trust instead.
 */
export type VerifyPolicy = boolean | string;

/** Transport-level options shared by every request a client issues */
export interface RequestOptions {
  cookies: CookieJar;
  verify: VerifyPolicy;
  /** Abort the request after this many milliseconds */
  timeout?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Follow 3xx responses (default true) */
  allowRedirects?: boolean;
  /** Raise a TransportError for status >= 400 (default true) */
  httpErrors?: boolean;
}

/** What a caller may pass at construction; anything omitted falls back to the defaults */
export type ClientOptions = Partial<RequestOptions>;

/** Per-call overrides. Session and TLS settings are not overridable per call. */
export type CallOptions = Omit<ClientOptions, "cookies" | "verify">;

/**
 * Effective options for a call, as handed to the transport. `query` and
 * `json` carry the call's payload.
 */
export interface TransportOptions extends RequestOptions {
  query?: Record<string, unknown>;
  json?: unknown;
}

/**
 * Client-level options: defaults < caller options. Only keys the caller
 * actually set (not `undefined`) override a default. A fresh jar is allocated
 * only when the caller did not bring one.
 */
export function resolveRequestOptions(options: ClientOptions = {}): RequestOptions {
  const resolved: RequestOptions = {
    cookies: options.cookies ?? new CookieJar(),
    verify: options.verify ?? false,
  };
  for (const [key, value] of Object.entries(options)) {
    if (key === "cookies" || key === "verify" || value === undefined) continue;
    Object.assign(resolved, { [key]: value });
  }
  return resolved;
}

/**
 * Per-call options: client options < call overrides < payload, with
 * `cookies` and `verify` always taken from the client so one jar follows the
 * session across every request.
 */
export function mergeCallOptions(
  client: RequestOptions,
  call: CallOptions = {},
  payload: { query?: Record<string, unknown>; json?: unknown } = {},
): TransportOptions {
  const merged: TransportOptions = { ...client };
  for (const [key, value] of Object.entries(call)) {
    if (key === "cookies" || key === "verify" || value === undefined) continue;
    Object.assign(merged, { [key]: value });
  }
  if (call.headers && client.headers) {
    merged.headers = { ...client.headers, ...call.headers };
  }
  if (payload.query !== undefined) merged.query = payload.query;
  if (payload.json !== undefined) merged.json = payload.json;
  merged.cookies = client.cookies;
  merged.verify = client.verify;
  return merged;
}
