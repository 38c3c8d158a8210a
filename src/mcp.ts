import { readFileSync } from "node:fs";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { UnifiClient } from "./client.js";
import { isCompleteConfig, missingConfig, resolveConfig, type Config } from "./config.js";
import { createClient } from "./connect.js";
import { ENDPOINTS, findEndpoint, toolName, type EndpointDef, type EndpointId } from "./endpoints.js";
import { errorDetail } from "./errors.js";
import { executeEndpoint, withRelogin, type ExecuteParams } from "./execute.js";

const pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")) as { version: string };

// ---------------------------------------------------------------------------
// Build JSON Schema input for each tool
// ---------------------------------------------------------------------------

export function buildInputSchema(def: EndpointDef): {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
} {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  if (def.needsSite) {
    properties.site = {
      type: "string",
      description: "Site name (defaults to configured site or \"default\")",
    };
  }

  for (const arg of def.args) {
    properties[arg.name] = { type: arg.type, description: arg.desc };
    required.push(arg.name);
  }

  for (const field of def.extra) {
    properties[field.name] = { type: field.type, description: field.desc };
  }

  return {
    type: "object",
    properties,
    required: required.length ? required : undefined,
  };
}

const toolMap = new Map<string, EndpointDef>();
for (const def of ENDPOINTS) {
  toolMap.set(toolName(def), def);
}

/** Split flat tool arguments into positional args and envelope fields */
export function toExecuteParams(def: EndpointDef, params: Record<string, unknown>, defaultSite: string): ExecuteParams {
  const args: Record<string, unknown> = {};
  for (const arg of def.args) args[arg.name] = params[arg.name];

  const extra: Record<string, unknown> = {};
  for (const field of def.extra) {
    if (params[field.name] !== undefined) extra[field.name] = params[field.name];
  }

  const site = typeof params.site === "string" && params.site ? params.site : defaultSite;
  return { site, args, extra };
}

function endpoint(id: EndpointId): EndpointDef {
  const def = findEndpoint(id);
  if (!def) throw new Error(`Endpoint ${id} is not registered`);
  return def;
}

// ---------------------------------------------------------------------------
// MCP Server
// ---------------------------------------------------------------------------

export interface McpServerOptions {
  /** Defaults to stdio */
  transport?: Transport;
  /** Defaults to a client built from resolved configuration */
  client?: UnifiClient;
  config?: Config;
}

export async function startMcpServer(options: McpServerOptions = {}): Promise<Server> {
  const config = options.config ?? resolveConfig({});
  const readOnly = config.readOnly;

  const server = new Server(
    { name: "unifi-session", version: pkg.version },
    { capabilities: { tools: {}, resources: {}, prompts: {} } },
  );

  let client: UnifiClient | undefined = options.client;
  // Shared by every call that arrives while the first login is in flight
  let pendingLogin: Promise<unknown> | undefined;

  function openSession(c: UnifiClient): Promise<unknown> {
    if (!pendingLogin) {
      pendingLogin = c.relogin().finally(() => {
        pendingLogin = undefined;
      });
    }
    return pendingLogin;
  }

  // The session is opened on first use and reopened on 401
  async function call<T>(fn: (client: UnifiClient) => Promise<T>): Promise<T> {
    if (!client) {
      if (!isCompleteConfig(config)) throw new Error(missingConfig(config));
      client = createClient(config);
    }
    const c = client;
    if (!c.session.isAuthenticated) await openSession(c);
    return withRelogin(c, () => fn(c));
  }

  // ── ListTools ─────────────────────────────────────────────────────
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const defs = readOnly ? ENDPOINTS.filter((def) => def.method === "GET") : ENDPOINTS;
    const tools = defs.map((def) => ({
      name: toolName(def),
      description: def.command
        ? `${def.summary}. API: ${def.method} ${def.path} (cmd: ${def.command})`
        : `${def.summary}. API: ${def.method} ${def.path}`,
      inputSchema: buildInputSchema(def),
    }));
    return { tools };
  });

  // ── CallTool ──────────────────────────────────────────────────────
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const def = toolMap.get(name);

    if (!def) {
      return {
        content: [{ type: "text", text: JSON.stringify({ error: `Unknown tool: ${name}` }) }],
        isError: true,
      };
    }

    if (readOnly && def.method !== "GET") {
      return {
        content: [{
          type: "text",
          text: JSON.stringify({
            error: `Read-only mode: ${def.method} ${def.path} is not allowed`,
            hint: "Unset UNIFI_READ_ONLY to enable write operations",
          }),
        }],
        isError: true,
      };
    }

    const params = toExecuteParams(def, args ?? {}, config.site);

    try {
      const result = await call((c) => executeEndpoint(def, params, c));
      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
      };
    } catch (err: unknown) {
      return {
        content: [{ type: "text", text: JSON.stringify(errorDetail(err), null, 2) }],
        isError: true,
      };
    }
  });

  // ── ListResources ─────────────────────────────────────────────────
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: "unifi://sites",
          name: "Sites",
          description: "Sites visible to the logged-in user",
          mimeType: "application/json",
        },
      ],
    };
  });

  // ── ListResourceTemplates ─────────────────────────────────────────
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return {
      resourceTemplates: [
        {
          uriTemplate: "unifi://sites/{site}/devices",
          name: "Device statistics",
          description: "Statistics for every adopted device on a site",
          mimeType: "application/json",
        },
        {
          uriTemplate: "unifi://sites/{site}/clients",
          name: "Client statistics",
          description: "Statistics for every client connected to a site",
          mimeType: "application/json",
        },
      ],
    };
  });

  // ── ReadResource ──────────────────────────────────────────────────
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    if (uri === "unifi://sites") {
      const result = await call((c) => executeEndpoint(endpoint("sites"), { args: {} }, c));
      return {
        contents: [{ uri, mimeType: "application/json", text: JSON.stringify(result, null, 2) }],
      };
    }

    const templateMatch = uri.match(/^unifi:\/\/sites\/([^/]+)\/(devices|clients)$/);
    if (templateMatch) {
      const [, site, resource] = templateMatch;
      const def = endpoint(resource === "devices" ? "deviceStatistics" : "statistics");
      const result = await call((c) => executeEndpoint(def, { site, args: {} }, c));
      return {
        contents: [{ uri, mimeType: "application/json", text: JSON.stringify(result, null, 2) }],
      };
    }

    throw new Error(`Unknown resource URI: ${uri}`);
  });

  // ── ListPrompts ───────────────────────────────────────────────────
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [
        {
          name: "guest-access",
          description: "Review a guest's connection and grant or revoke hotspot access",
          arguments: [
            { name: "mac", description: "Guest MAC address", required: true },
            { name: "site", description: "Site name", required: false },
          ],
        },
      ],
    };
  });

  // ── GetPrompt ─────────────────────────────────────────────────────
  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: promptArgs } = request.params;
    if (name !== "guest-access") throw new Error(`Unknown prompt: ${name}`);

    const site = promptArgs?.site ?? config.site;
    const mac = promptArgs?.mac ?? "<mac>";
    return {
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: [
              `Review hotspot access for guest ${mac} on site "${site}".`,
              "",
              "Steps:",
              `1. Use the **clients_stats** tool (site: "${site}") and find the entry whose mac is ${mac}.`,
              "2. Report whether the guest is connected, its authorization state, traffic so far and the access point it uses.",
              `3. If access should be granted, use **guests_authorize** (site: "${site}", mac: "${mac}") with a duration in minutes and, if needed, up/down limits in kbps or a bytes quota in MB.`,
              `4. If access should be revoked, use **guests_unauthorize** and then **clients_reconnect** so the client re-enters the portal.`,
            ].join("\n"),
          },
        },
      ],
    };
  });

  // ── Start ─────────────────────────────────────────────────────────
  await server.connect(options.transport ?? new StdioServerTransport());
  return server;
}
