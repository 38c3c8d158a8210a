import type { HttpResponse } from "./transport.js";

/**
 * A request that did not produce a usable response: network or TLS failure,
 * timeout, or a status >= 400 while `httpErrors` is on.
 */
export class TransportError extends Error {
  readonly method: string;
  readonly url: string;
  /** Set when the controller answered with an error status */
  readonly status?: number;
  readonly response?: HttpResponse;

  constructor(
    message: string,
    details: { method: string; url: string; response?: HttpResponse; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = "TransportError";
    this.method = details.method;
    this.url = details.url;
    this.response = details.response;
    this.status = details.response?.status;
  }
}

/** `relogin()` found neither a supplied nor a stored value for a credential */
export class MissingCredentialsError extends Error {
  readonly missing: ("username" | "password")[];

  constructor(missing: ("username" | "password")[]) {
    super(`No ${missing.join(" or ")} available for relogin; call login() or setLoginData() first`);
    this.name = "MissingCredentialsError";
    this.missing = missing;
  }
}

/** JSON-friendly rendering of an error for CLI output and MCP tool results */
export function errorDetail(err: unknown): { error: string; status?: number; detail?: unknown } {
  if (err instanceof TransportError) {
    const result: { error: string; status?: number; detail?: unknown } = { error: err.message };
    if (err.status !== undefined) result.status = err.status;
    if (err.response) {
      const body = err.response.body;
      try {
        result.detail = JSON.parse(body);
      } catch {
        result.detail = body.slice(0, 500);
      }
    } else if (err.cause instanceof Error) {
      result.detail = err.cause.message;
    }
    return result;
  }
  if (err instanceof Error) return { error: err.message };
  return { error: String(err) };
}
