import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { isCompleteConfig, loadFileConfig, missingConfig, resolveConfig, saveConfig, verifyPolicy } from "../config.js";

describe("resolveConfig", () => {
  test("flags beat env, env beats the file", () => {
    const config = resolveConfig(
      { url: "https://flag:8443" },
      { UNIFI_URL: "https://env:8443", UNIFI_USERNAME: "env-user" },
      { url: "https://file:8443", username: "file-user", password: "file-pass" },
    );
    expect(config.url).toBe("https://flag:8443");
    expect(config.username).toBe("env-user");
    expect(config.password).toBe("file-pass");
  });

  test("defaults", () => {
    expect(resolveConfig({}, {}, {})).toEqual({
      url: undefined,
      username: undefined,
      password: undefined,
      site: "default",
      insecure: false,
      caBundle: undefined,
      timeout: undefined,
      readOnly: false,
      verbose: false,
    });
  });

  test("boolean switches from env", () => {
    const config = resolveConfig({}, { UNIFI_INSECURE: "1", UNIFI_READ_ONLY: "1", UNIFI_DEBUG: "1" }, {});
    expect(config.insecure).toBe(true);
    expect(config.readOnly).toBe(true);
    expect(config.verbose).toBe(true);
  });

  test("an invalid timeout flag falls through to the env value", () => {
    expect(resolveConfig({ timeout: "soon" }, { UNIFI_TIMEOUT: "3000" }, {}).timeout).toBe(3000);
  });

  test("empty strings do not count as set", () => {
    expect(resolveConfig({ site: "" }, { UNIFI_SITE: "" }, { site: "branch" }).site).toBe("branch");
  });
});

describe("verifyPolicy", () => {
  const base = resolveConfig({}, {}, {});

  test("verifies by default", () => {
    expect(verifyPolicy(base)).toBe(true);
  });

  test("--insecure turns verification off", () => {
    expect(verifyPolicy({ ...base, insecure: true })).toBe(false);
  });

  test("a CA bundle wins over --insecure", () => {
    expect(verifyPolicy({ ...base, insecure: true, caBundle: "/etc/unifi/cert.pem" })).toBe("/etc/unifi/cert.pem");
  });
});

describe("missingConfig", () => {
  test("url first, then credentials", () => {
    expect(missingConfig(resolveConfig({}, {}, {}))).toMatch(/^Missing UniFi controller URL/);
    expect(missingConfig(resolveConfig({ url: "https://c" }, {}, {}))).toMatch(/^Missing credentials/);
  });

  test("complete config", () => {
    const config = resolveConfig({ url: "https://c", username: "u", password: "p" }, {}, {});
    expect(missingConfig(config)).toBeUndefined();
    expect(isCompleteConfig(config)).toBe(true);
  });
});

describe("config file", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "unifi-session-"));
    file = join(dir, "nested", "config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("missing file reads as empty", () => {
    expect(loadFileConfig(file)).toEqual({});
  });

  test("saveConfig creates the directory and merges with existing values", () => {
    saveConfig({ url: "https://c:8443", site: "hq" }, file);
    saveConfig({ site: "branch", insecure: true }, file);

    expect(loadFileConfig(file)).toEqual({ url: "https://c:8443", site: "branch", insecure: true });
    expect(readFileSync(file, "utf-8").endsWith("}\n")).toBe(true);
  });

  test("invalid JSON reads as empty", () => {
    saveConfig({}, file);
    writeFileSync(file, "{ not json");
    expect(loadFileConfig(file)).toEqual({});
  });

  test("values of the wrong type read as empty", () => {
    saveConfig({}, file);
    writeFileSync(file, JSON.stringify({ url: 8443 }));
    expect(loadFileConfig(file)).toEqual({});
  });
});
