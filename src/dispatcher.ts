import { mergeCallOptions, type CallOptions, type RequestOptions } from "./options.js";
import type { HttpMethod, HttpResponse, HttpTransport } from "./transport.js";

/**
 * Turns (method, path, payload) into a transport call carrying the client's
 * shared options. Status codes are the transport's and the caller's concern.
 */
export class RequestDispatcher {
  constructor(
    private readonly transport: HttpTransport,
    readonly options: RequestOptions,
  ) {}

  /** `query` is attached only when it has at least one key */
  get(path: string, query: Record<string, unknown> = {}, overrides?: CallOptions): Promise<HttpResponse> {
    const payload = Object.keys(query).length > 0 ? { query } : {};
    return this.request("GET", path, overrides, payload);
  }

  /** An empty body is still sent, as `{}` */
  post(path: string, body: object = {}, overrides?: CallOptions): Promise<HttpResponse> {
    return this.request("POST", path, overrides, { json: body });
  }

  put(path: string, body: object = {}, overrides?: CallOptions): Promise<HttpResponse> {
    return this.request("PUT", path, overrides, { json: body });
  }

  request(
    method: HttpMethod,
    path: string,
    overrides?: CallOptions,
    payload?: { query?: Record<string, unknown>; json?: unknown },
  ): Promise<HttpResponse> {
    return this.transport.request(method, path, mergeCallOptions(this.options, overrides, payload));
  }
}
