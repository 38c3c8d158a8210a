import { describe, expect, test, vi } from "vitest";
import { RequestDispatcher } from "../dispatcher.js";
import { resolveRequestOptions } from "../options.js";
import { FetchTransport, type FetchLike } from "../transport.js";
import { BASE_URL, FakeTransport, fakeResponse } from "./fakes.js";

describe("RequestDispatcher", () => {
  test("get with an empty query sends no query", async () => {
    const transport = new FakeTransport();
    await new RequestDispatcher(transport, resolveRequestOptions()).get("/api/self/sites", {});

    expect(transport.calls[0].method).toBe("GET");
    expect("query" in transport.calls[0].options).toBe(false);
    expect("json" in transport.calls[0].options).toBe(false);
  });

  test("get query strings as seen on the wire", async () => {
    const fetch = vi.fn<FetchLike>(async () => fakeResponse(200, "{}"));
    const dispatcher = new RequestDispatcher(
      new FetchTransport({ baseUrl: BASE_URL, fetch }),
      resolveRequestOptions({ verify: true }),
    );

    await dispatcher.get("/api/s/default/stat/sta", {});
    await dispatcher.get("/api/s/default/stat/sta", { a: 1 });

    expect(fetch.mock.calls[0][0]).toBe("https://unifi.example.com:8443/api/s/default/stat/sta");
    expect(fetch.mock.calls[1][0]).toBe("https://unifi.example.com:8443/api/s/default/stat/sta?a=1");
  });

  test("post sends the body as json", async () => {
    const transport = new FakeTransport();
    await new RequestDispatcher(transport, resolveRequestOptions()).post("/api/login", { username: "u", password: "p" });

    expect(transport.calls[0].method).toBe("POST");
    expect(transport.calls[0].options.json).toEqual({ username: "u", password: "p" });
  });

  test("an empty post body is sent as {}", async () => {
    const transport = new FakeTransport();
    await new RequestDispatcher(transport, resolveRequestOptions()).post("/api/s/default/cmd/devmgr");
    expect(transport.calls[0].options.json).toEqual({});
  });

  test("put uses PUT with a json body", async () => {
    const transport = new FakeTransport();
    const dispatcher = new RequestDispatcher(transport, resolveRequestOptions());
    await dispatcher.put("/api/s/default/rest/user/abc", { name: "printer" });
    await dispatcher.put("/api/s/default/rest/user/abc");

    expect(transport.calls.map((c) => c.method)).toEqual(["PUT", "PUT"]);
    expect(transport.calls[0].options.json).toEqual({ name: "printer" });
    expect(transport.calls[1].options.json).toEqual({});
  });

  test("every call carries the shared jar and verify policy", async () => {
    const transport = new FakeTransport();
    const options = resolveRequestOptions({ verify: "/path/cert.pem" });
    const dispatcher = new RequestDispatcher(transport, options);

    await dispatcher.get("/api/self/sites");
    await dispatcher.post("/api/login", {});
    await dispatcher.put("/api/s/default/rest/user/abc", {}, { timeout: 50 });

    for (const call of transport.calls) {
      expect(call.options.cookies).toBe(options.cookies);
      expect(call.options.verify).toBe("/path/cert.pem");
    }
    expect(transport.calls[2].options.timeout).toBe(50);
  });

  test("returns error statuses to the caller unchanged when httpErrors is off", async () => {
    const transport = new FakeTransport().on("GET", "/api/s/nowhere/stat/sta", { status: 400, body: "bad site" });
    const dispatcher = new RequestDispatcher(transport, resolveRequestOptions({ httpErrors: false }));

    const response = await dispatcher.get("/api/s/nowhere/stat/sta");
    expect(response.status).toBe(400);
    expect(response.body).toBe("bad site");
  });
});
