// ---------------------------------------------------------------------------
// Endpoint registry — every operation the CLI and the MCP server expose
// ---------------------------------------------------------------------------

import type { StamgrCommand } from "./commands.js";
import type { HttpMethod } from "./transport.js";

export type EndpointId =
  | "sites"
  | "statistics"
  | "deviceStatistics"
  | "authorizeGuest"
  | "unauthorizeGuest"
  | "reconnectClient";

export interface ParamDef {
  name: string;
  desc: string;
  type: "string" | "integer";
}

export interface EndpointDef {
  /** Command group (e.g. "guests") */
  group: string;
  /** Action name (e.g. "authorize") */
  action: string;
  id: EndpointId;
  method: HttpMethod;
  /** URL path template; `{site}` is replaced by the site name */
  path: string;
  summary: string;
  /** Required positional arguments */
  args: ParamDef[];
  /** Optional fields laid over the command envelope */
  extra: ParamDef[];
  needsSite: boolean;
  /** Set for entries dispatched through the `stamgr` command endpoint */
  command?: StamgrCommand;
}

const MAC_ARG: ParamDef = { name: "mac", desc: "Client MAC address (e.g. aa:bb:cc:dd:ee:ff)", type: "string" };

export const ENDPOINTS: EndpointDef[] = [
  // ── Sites ───────────────────────────────────────────────────────────
  {
    group: "sites", action: "list", id: "sites",
    method: "GET", path: "/api/self/sites",
    summary: "List the sites visible to the logged-in user (site names are needed for most commands)",
    args: [], extra: [], needsSite: false,
  },

  // ── Clients ─────────────────────────────────────────────────────────
  {
    group: "clients", action: "stats", id: "statistics",
    method: "GET", path: "/api/s/{site}/stat/sta",
    summary: "Show statistics for every client connected to a site",
    args: [], extra: [], needsSite: true,
  },
  {
    group: "clients", action: "reconnect", id: "reconnectClient",
    method: "POST", path: "/api/s/{site}/cmd/stamgr",
    summary: "Disconnect a client so that it reconnects (kick-sta)",
    args: [MAC_ARG], extra: [], needsSite: true, command: "kick-sta",
  },

  // ── Devices ─────────────────────────────────────────────────────────
  {
    group: "devices", action: "stats", id: "deviceStatistics",
    method: "GET", path: "/api/s/{site}/stat/device",
    summary: "Show statistics for every adopted device (APs, switches, gateways)",
    args: [], extra: [], needsSite: true,
  },

  // ── Guests ──────────────────────────────────────────────────────────
  {
    group: "guests", action: "authorize", id: "authorizeGuest",
    method: "POST", path: "/api/s/{site}/cmd/stamgr",
    summary: "Authorize a guest on the hotspot portal for a number of minutes",
    args: [MAC_ARG, { name: "minutes", desc: "Minutes of access", type: "integer" }],
    extra: [
      { name: "up", desc: "Upload limit in kbps", type: "integer" },
      { name: "down", desc: "Download limit in kbps", type: "integer" },
      { name: "bytes", desc: "Transfer quota in MB", type: "integer" },
      { name: "ap_mac", desc: "MAC of the access point the guest is connected to", type: "string" },
    ],
    needsSite: true, command: "authorize-guest",
  },
  {
    group: "guests", action: "unauthorize", id: "unauthorizeGuest",
    method: "POST", path: "/api/s/{site}/cmd/stamgr",
    summary: "Revoke a guest's hotspot authorization",
    args: [MAC_ARG], extra: [], needsSite: true, command: "unauthorize-guest",
  },
];

export const GROUP_DESCRIPTIONS: Record<string, string> = {
  sites: "Sites on the controller",
  clients: "Connected clients (statistics, reconnect)",
  devices: "Adopted devices",
  guests: "Hotspot guest authorization",
};

/** Convert kebab-case or snake_case to camelCase (for Commander option keys) */
export function camelCase(s: string): string {
  return s.replace(/[-_]([a-z])/g, (_, c: string) => c.toUpperCase());
}

/** Tool name for the MCP server: group_action */
export function toolName(def: EndpointDef): string {
  return `${def.group.replace(/-/g, "_")}_${def.action.replace(/-/g, "_")}`;
}

export function findEndpoint(id: string): EndpointDef | undefined {
  return ENDPOINTS.find((e) => e.id === id);
}
