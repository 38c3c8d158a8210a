import { describe, expect, test } from "vitest";
import { MissingCredentialsError, TransportError, errorDetail } from "../errors.js";
import type { HttpResponse } from "../transport.js";

const response: HttpResponse = {
  method: "GET",
  url: "https://unifi.example.com:8443/api/self/sites",
  status: 401,
  statusText: "Unauthorized",
  headers: {},
  body: '{"meta":{"rc":"error","msg":"api.err.LoginRequired"}}',
};

describe("errorDetail", () => {
  test("HTTP failures include status and the parsed body", () => {
    const err = new TransportError("HTTP 401", { method: "GET", url: response.url, response });
    expect(errorDetail(err)).toEqual({
      error: "HTTP 401",
      status: 401,
      detail: { meta: { rc: "error", msg: "api.err.LoginRequired" } },
    });
  });

  test("non-JSON bodies are truncated text", () => {
    const err = new TransportError("HTTP 502", {
      method: "GET",
      url: response.url,
      response: { ...response, status: 502, body: "x".repeat(600) },
    });
    expect(errorDetail(err)).toEqual({ error: "HTTP 502", status: 502, detail: "x".repeat(500) });
  });

  test("network failures report the cause", () => {
    const err = new TransportError("GET /api/self/sites failed: fetch failed", {
      method: "GET",
      url: response.url,
      cause: new Error("getaddrinfo ENOTFOUND unifi.example.com"),
    });
    expect(errorDetail(err)).toEqual({
      error: "GET /api/self/sites failed: fetch failed",
      detail: "getaddrinfo ENOTFOUND unifi.example.com",
    });
  });

  test("other errors keep their message", () => {
    expect(errorDetail(new MissingCredentialsError(["username", "password"]))).toEqual({
      error: "No username or password available for relogin; call login() or setLoginData() first",
    });
    expect(errorDetail("boom")).toEqual({ error: "boom" });
  });
});
