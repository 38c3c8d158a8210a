#!/usr/bin/env node

import { Command } from "commander";
import { createRequire } from "node:module";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { resolveConfig, requireConfig, saveConfig, CONFIG_FILE, type FileConfig } from "./config.js";
import { createClient, runSession } from "./connect.js";
import { errorDetail } from "./errors.js";
import { ENDPOINTS, GROUP_DESCRIPTIONS, camelCase, type EndpointDef } from "./endpoints.js";
import { executeEndpoint, resolveRequest } from "./execute.js";
import { logError } from "./log.js";
import { formatOutput, pickFields } from "./output.js";
import { responseJson } from "./transport.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

type GlobalOptions = {
  url?: string;
  username?: string;
  password?: string;
  site?: string;
  format: string;
  insecure?: boolean;
  caBundle?: string;
  timeout?: string;
  dryRun?: boolean;
  fields?: string;
  verbose?: boolean;
};

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("unifi-session")
  .version(pkg.version)
  .description(
    "CLI for the UniFi Network controller API (cookie session login)\n\n" +
    "All output is JSON by default, for scripting and AI/LLM tool use.\n\n" +
    "Configuration (in priority order):\n" +
    "  1. CLI flags:      --url, --username, --password, --site\n" +
    "  2. Env vars:       UNIFI_URL, UNIFI_USERNAME, UNIFI_PASSWORD, UNIFI_SITE\n" +
    `  3. Config file:    ${CONFIG_FILE}\n\n` +
    "Quick start:\n" +
    "  $ unifi-session configure --url https://192.168.1.1:8443 --username admin --password ...\n" +
    "  $ unifi-session sites list\n" +
    "  $ unifi-session guests authorize aa:bb:cc:dd:ee:ff 60 --down 2048",
  )
  .option("--url <url>", "Controller URL (e.g. https://192.168.1.1:8443)")
  .option("--username <name>", "Controller username")
  .option("--password <password>", "Controller password")
  .option("--site <name>", "Site name (default: \"default\")")
  .option("--format <fmt>", "Output format: json, jsonl, table", "json")
  .option("--insecure", "Skip TLS certificate verification (for self-signed certs)")
  .option("--ca-bundle <path>", "PEM file with the controller's certificate to trust")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .option("--dry-run", "Print the HTTP request instead of executing it")
  .option("--fields <list>", "Comma-separated list of fields to include in output")
  .option("--verbose", "Log each HTTP request to stderr");

function printResult(result: unknown, globalOpts: GlobalOptions): void {
  const fields = globalOpts.fields ? globalOpts.fields.split(",") : [];
  console.log(formatOutput(fields.length ? pickFields(result, fields) : result, globalOpts.format));
}

function fail(err: unknown): never {
  const detail = errorDetail(err);
  logError(detail, detail.detail !== undefined);
  process.exit(1);
}

// ── configure ─────────────────────────────────────────────────────────

program
  .command("configure")
  .description(`Save connection settings to ${CONFIG_FILE}`)
  .option("--url <url>", "Controller URL")
  .option("--username <name>", "Controller username")
  .option("--password <password>", "Controller password")
  .option("--site <name>", "Default site name")
  .option("--insecure", "Skip TLS certificate verification")
  .option("--ca-bundle <path>", "PEM file with the controller's certificate")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .action((opts: Record<string, string | boolean | undefined>) => {
    const toSave: FileConfig = {};
    if (typeof opts.url === "string") toSave.url = opts.url;
    if (typeof opts.username === "string") toSave.username = opts.username;
    if (typeof opts.password === "string") toSave.password = opts.password;
    if (typeof opts.site === "string") toSave.site = opts.site;
    if (opts.insecure) toSave.insecure = true;
    if (typeof opts.caBundle === "string") toSave.caBundle = opts.caBundle;
    if (typeof opts.timeout === "string") toSave.timeout = Number(opts.timeout);
    if (Object.keys(toSave).length === 0) {
      logError({ error: "Provide at least one of --url, --username, --password, --site, --insecure, --ca-bundle, --timeout" });
      process.exit(1);
    }
    saveConfig(toSave);
    console.log(JSON.stringify({ ok: true, saved: Object.keys(toSave), path: CONFIG_FILE }));
  });

// ── operations ────────────────────────────────────────────────────────

program
  .command("operations")
  .description("List all available operations with method, path, and description")
  .action(() => {
    const ops = ENDPOINTS.map((def) => ({
      command: `${def.group} ${def.action}`,
      id: def.id,
      method: def.method,
      path: def.path,
      summary: def.summary,
      command_envelope: def.command ?? null,
      args: def.args.map((a) => a.name),
      options: def.extra.map((o) => o.name),
    }));
    console.log(JSON.stringify(ops, null, 2));
  });

// ── raw ───────────────────────────────────────────────────────────────

program
  .command("raw <method> <path>")
  .description("Make a raw API request (e.g. unifi-session raw GET /api/s/default/stat/health)")
  .option("-d, --data <json>", "Request body JSON (or @file.json, or - for stdin)")
  .option("-q, --query <params>", "Query params as key=value,key=value")
  .action(async (rawMethod: string, path: string, opts: { data?: string; query?: string }) => {
    const globalOpts = program.opts<GlobalOptions>();
    const config = resolveConfig({ ...globalOpts });
    const method = rawMethod.toUpperCase();

    const query: Record<string, string> = {};
    if (opts.query) {
      for (const pair of opts.query.split(",")) {
        const [k, ...v] = pair.split("=");
        query[k] = v.join("=");
      }
    }

    let body: Record<string, unknown> | undefined;
    try {
      if (opts.data) body = await resolveBody(opts.data);
    } catch (err: unknown) {
      fail(err);
    }

    if (globalOpts.dryRun) {
      console.log(JSON.stringify({
        dryRun: true, method,
        url: `${config.url || "<no-url-configured>"}${path}`,
        query, body: body ?? null,
      }, null, 2));
      return;
    }

    if (method !== "GET" && method !== "POST" && method !== "PUT") {
      fail(new Error(`Unsupported method ${method}; use GET, POST or PUT`));
    }

    requireConfig(config);
    const client = createClient(config);
    try {
      const response = await runSession(client, (c) => {
        if (method === "GET") return c.get(path, query);
        return method === "POST" ? c.post(path, body) : c.put(path, body);
      });
      printResult(responseJson(response), globalOpts);
    } catch (err: unknown) {
      fail(err);
    }
  });

// ── mcp ───────────────────────────────────────────────────────────────

program
  .command("mcp")
  .description("Start MCP server (stdio), exposing all operations as LLM tools")
  .action(async () => {
    const { startMcpServer } = await import("./mcp.js");
    await startMcpServer();
  });

// ---------------------------------------------------------------------------
// Register all endpoint commands
// ---------------------------------------------------------------------------

function registerCommands() {
  const groups = new Map<string, EndpointDef[]>();
  for (const def of ENDPOINTS) {
    const defs = groups.get(def.group) ?? [];
    defs.push(def);
    groups.set(def.group, defs);
  }

  for (const [groupName, defs] of groups) {
    const groupCmd = program
      .command(groupName)
      .description(GROUP_DESCRIPTIONS[groupName] ?? groupName);

    for (const def of defs) {
      registerAction(groupCmd, def);
    }
  }
}

function registerAction(parent: Command, def: EndpointDef) {
  const argParts = def.args.map((a) => `<${a.name}>`).join(" ");
  const cmdStr = argParts ? `${def.action} ${argParts}` : def.action;

  const sub = parent.command(cmdStr).description(def.summary);

  for (const field of def.extra) {
    sub.option(`--${field.name.replace(/_/g, "-")} <value>`, field.desc);
  }

  if (def.command) {
    sub.addHelpText(
      "after",
      `\nSent as POST ${def.path} with body { "cmd": "${def.command}", ... }`,
    );
  }

  sub.action(async () => {
    const opts = sub.opts<Record<string, string | undefined>>();
    const globalOpts = program.opts<GlobalOptions>();
    const config = resolveConfig({ ...globalOpts });

    const args: Record<string, string> = {};
    def.args.forEach((arg, i) => {
      args[arg.name] = sub.args[i];
    });

    const extra: Record<string, string> = {};
    for (const field of def.extra) {
      const val = opts[camelCase(field.name)];
      if (val !== undefined) extra[field.name] = val;
    }

    const params = { site: config.site, args, extra };

    if (globalOpts.dryRun) {
      try {
        const req = resolveRequest(def, params);
        console.log(JSON.stringify({
          dryRun: true,
          method: req.method,
          url: `${config.url || "<no-url-configured>"}${req.path}`,
          body: req.body ?? null,
        }, null, 2));
      } catch (err: unknown) {
        fail(err);
      }
      return;
    }

    requireConfig(config);
    const client = createClient(config);
    try {
      const result = await runSession(client, (c) => executeEndpoint(def, params, c));
      printResult(result, globalOpts);
    } catch (err: unknown) {
      fail(err);
    }
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const JsonObject = z.record(z.unknown());

async function resolveBody(data: string): Promise<Record<string, unknown>> {
  if (data === "-") {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return JsonObject.parse(JSON.parse(Buffer.concat(chunks).toString("utf-8")));
  }
  if (data.startsWith("@")) {
    return JsonObject.parse(JSON.parse(readFileSync(data.slice(1), "utf-8")));
  }
  return JsonObject.parse(JSON.parse(data));
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

registerCommands();

program.parseAsync(process.argv).catch((err: unknown) => {
  logError({ error: String(err) });
  process.exit(1);
});
