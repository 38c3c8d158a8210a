import { readFileSync } from "node:fs";
import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";
import { TransportError } from "./errors.js";
import type { TransportOptions, VerifyPolicy } from "./options.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/** The raw answer to a request. The core never interprets the body. */
export interface HttpResponse {
  method: string;
  url: string;
  status: number;
  statusText: string;
  /** Lowercase header names */
  headers: Record<string, string>;
  body: string;
}

/** Performs one HTTP request; the only seam between the session core and the network */
export interface HttpTransport {
  request(method: HttpMethod, path: string, options: TransportOptions): Promise<HttpResponse>;
  /** Release pooled connections */
  close?(): Promise<void>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  redirect: "follow" | "manual";
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

export interface FetchResponseLike {
  status: number;
  statusText: string;
  url: string;
  headers: {
    get(name: string): string | null;
    getSetCookie(): string[];
    forEach(callback: (value: string, key: string) => void): void;
  };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export type TransportLogger = (entry: Record<string, unknown>) => void;

export interface FetchTransportOptions {
  /** Controller URL, e.g. https://192.168.1.1:8443 */
  baseUrl: string;
  fetch?: FetchLike;
  logger?: TransportLogger;
}

/**
 * HttpTransport over undici's fetch. Cookies are read from and written back
 * to the jar in the call options; TLS policy is applied through an undici
 * Agent per distinct `verify` value.
 */
export class FetchTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchLike;
  private readonly logger?: TransportLogger;
  private readonly agents = new Map<string, Dispatcher>();

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? undiciFetch;
    this.logger = options.logger;
  }

  buildUrl(path: string, query?: Record<string, unknown>): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [k, v] of Object.entries(query)) {
        if (v === undefined || v === null) continue;
        url.searchParams.set(k, typeof v === "object" ? JSON.stringify(v) : String(v));
      }
    }
    return url;
  }

  async request(method: HttpMethod, path: string, options: TransportOptions): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...options.headers,
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    }

    // Everything from building the URL to reading the last byte of the body
    // fails as a TransportError; a timeout can fire during either
    let href = `${this.baseUrl}${path}`;
    let response: HttpResponse;
    try {
      href = this.buildUrl(path, options.query).toString();
      this.logger?.({ debug: "request", method, url: href });

      const cookie = await options.cookies.getCookieString(href);
      if (cookie) headers["Cookie"] = cookie;
      const resp = await this.fetchFn(href, {
        method,
        headers,
        body,
        redirect: options.allowRedirects === false ? "manual" : "follow",
        dispatcher: this.dispatcherFor(options.verify),
        signal: options.timeout ? AbortSignal.timeout(options.timeout) : undefined,
      });

      // After a followed redirect the cookies belong to the final URL
      const cookieUrl = resp.url || href;
      for (const setCookie of resp.headers.getSetCookie()) {
        await options.cookies.setCookie(setCookie, cookieUrl, { ignoreError: true });
      }

      response = {
        method,
        url: href,
        status: resp.status,
        statusText: resp.statusText,
        headers: collectHeaders(resp),
        body: await resp.text(),
      };
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${method} ${path} failed: ${reason}`, { method, url: href, cause: err });
    }

    this.logger?.({ debug: "response", method, url: href, status: response.status });

    if (options.httpErrors !== false && response.status >= 400) {
      throw new TransportError(`HTTP ${response.status}`, { method, url: href, response });
    }
    return response;
  }

  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private dispatcherFor(verify: VerifyPolicy): Dispatcher | undefined {
    if (verify === true) return undefined;
    const key = verify === false ? "insecure" : `ca:${verify}`;
    let agent = this.agents.get(key);
    if (!agent) {
      agent = verify === false
        ? new Agent({ connect: { rejectUnauthorized: false } })
        : new Agent({ connect: { ca: readFileSync(verify, "utf-8") } });
      this.agents.set(key, agent);
    }
    return agent;
  }
}

function collectHeaders(resp: FetchResponseLike): Record<string, string> {
  const headers: Record<string, string> = {};
  resp.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });
  return headers;
}

/** Parse a response body as JSON; an empty body reads as `{}` */
export function responseJson(response: HttpResponse): unknown {
  if (!response.body) return {};
  try {
    return JSON.parse(response.body);
  } catch (err: unknown) {
    throw new TransportError(
      `Expected JSON from ${new URL(response.url).pathname} but got non-JSON response (status ${response.status}). ` +
      `This usually means a TLS/certificate issue or wrong URL. ` +
      `Snippet: ${response.body.slice(0, 200)}`,
      { method: response.method, url: response.url, response, cause: err },
    );
  }
}
