import { describe, expect, test } from "vitest";
import { CookieJar } from "tough-cookie";
import { UnifiClient } from "../client.js";
import { FakeTransport } from "./fakes.js";

describe("UnifiClient", () => {
  describe("construction", () => {
    test("defaults to verify=false and an empty jar", async () => {
      const client = new UnifiClient(new FakeTransport());
      expect(client.options.verify).toBe(false);
      expect(await client.options.cookies.getCookies("https://unifi.example.com:8443")).toEqual([]);
    });

    test("keeps caller options", () => {
      const jar = new CookieJar();
      const client = new UnifiClient(new FakeTransport(), { cookies: jar, verify: "/path/cert.pem" });
      expect(client.options.cookies).toBe(jar);
      expect(client.options.verify).toBe("/path/cert.pem");
    });

    test("httpClient exposes the transport", () => {
      const transport = new FakeTransport();
      expect(new UnifiClient(transport).httpClient()).toBe(transport);
    });
  });

  describe("endpoints", () => {
    test("sites", async () => {
      const transport = new FakeTransport();
      await new UnifiClient(transport).sites();
      expect(transport.calls[0].method).toBe("GET");
      expect(transport.calls[0].path).toBe("/api/self/sites");
    });

    test("statistics and deviceStatistics are site-scoped", async () => {
      const transport = new FakeTransport();
      const client = new UnifiClient(transport);
      await client.statistics("default");
      await client.deviceStatistics("branch");
      expect(transport.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
        "GET /api/s/default/stat/sta",
        "GET /api/s/branch/stat/device",
      ]);
    });

    test("command wrappers post to stamgr", async () => {
      const transport = new FakeTransport();
      const client = new UnifiClient(transport);
      await client.authorizeGuest("default", "AA:BB", 60, { up: 100, down: 200, bytes: 1024 });
      await client.unauthorizeGuest("default", "AA:BB");
      await client.reconnectClient("default", "AA:BB");

      expect(transport.calls.map((c) => c.options.json)).toEqual([
        { cmd: "authorize-guest", mac: "AA:BB", minutes: 60, up: 100, down: 200, bytes: 1024 },
        { cmd: "unauthorize-guest", mac: "AA:BB" },
        { cmd: "kick-sta", mac: "AA:BB" },
      ]);
    });
  });

  describe("session", () => {
    test("login cookie follows every request of the same client", async () => {
      const transport = new FakeTransport().withLogin();
      const client = new UnifiClient(transport);
      await client.login("admin", "test-secret");
      await client.sites();
      await client.authorizeGuest("default", "AA:BB", 60);
      await client.put("/api/s/default/rest/user/abc", { note: "x" });
      await client.get("/api/s/default/stat/health", { within: 24 });

      expect(transport.calls.slice(1).every((c) => c.cookie === "unifises=session-1")).toBe(true);
      expect(transport.calls).toHaveLength(5);
    });

    test("two clients keep independent sessions", async () => {
      const first = new FakeTransport().withLogin("first");
      const second = new FakeTransport().withLogin("second");
      const a = new UnifiClient(first);
      const b = new UnifiClient(second);

      await a.login("a", "test-secret");
      await b.login("b", "test-secret");
      await a.sites();
      await b.sites();

      expect(first.calls[1].cookie).toBe("unifises=first");
      expect(second.calls[1].cookie).toBe("unifises=second");
      expect(a.session.loginData()?.username).toBe("a");
      expect(b.session.loginData()?.username).toBe("b");
    });

    test("relogin via setLoginData, then logout keeps credentials", async () => {
      const transport = new FakeTransport().withLogin().on("GET", "/logout", { status: 302 });
      const client = new UnifiClient(transport);
      client.setLoginData({ username: "u", password: "p" });

      await client.relogin();
      await client.logout();
      await client.relogin();

      expect(transport.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
        "POST /api/login",
        "GET /logout",
        "POST /api/login",
      ]);
      expect(transport.calls[2].options.json).toEqual({ username: "u", password: "p" });
    });
  });

  test("close releases the transport", async () => {
    const transport = new FakeTransport();
    await new UnifiClient(transport).close();
    expect(transport.closed).toBe(true);
  });
});
