import { z } from "zod";
import type { UnifiClient } from "./client.js";
import { buildEnvelope, type CommandEnvelope, type GuestAuthorization } from "./commands.js";
import type { EndpointDef, EndpointId, ParamDef } from "./endpoints.js";
import { TransportError } from "./errors.js";
import { responseJson, type HttpResponse } from "./transport.js";

export interface ExecuteParams {
  /** Site name (used when def.needsSite is true) */
  site?: string;
  /** Positional arguments keyed by name (e.g. { mac: "aa:bb:..." }) */
  args: Record<string, unknown>;
  /** Optional envelope fields keyed by name (e.g. { up: 512 }) */
  extra?: Record<string, unknown>;
}

export interface ResolvedRequest {
  method: string;
  path: string;
  body: CommandEnvelope | undefined;
}

function paramSchema(param: ParamDef) {
  return param.type === "integer"
    ? z.coerce.number({ invalid_type_error: `${param.name} must be an integer` }).int(`${param.name} must be an integer`)
    : z.string({ required_error: `${param.name} is required` }).min(1, `${param.name} is required`);
}

/** Validate and coerce CLI strings or MCP arguments against the endpoint's parameters */
export function parseParams(def: EndpointDef, params: ExecuteParams): { args: Record<string, string | number>; extra: Record<string, string | number> } {
  const argShape: Record<string, z.ZodTypeAny> = {};
  for (const arg of def.args) argShape[arg.name] = paramSchema(arg);
  const extraShape: Record<string, z.ZodTypeAny> = {};
  for (const field of def.extra) extraShape[field.name] = paramSchema(field).optional();

  const value = z.record(z.union([z.string(), z.number()]));
  const args = value.parse(z.object(argShape).parse(params.args));

  const extraInput: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(params.extra ?? {})) {
    if (v !== undefined && v !== "") extraInput[k] = v;
  }
  const extra = value.parse(z.object(extraShape).passthrough().parse(extraInput));
  return { args, extra };
}

/** Resolve path and body without executing the request (dry run) */
export function resolveRequest(def: EndpointDef, params: ExecuteParams): ResolvedRequest {
  const site = params.site || "default";
  const path = def.needsSite ? def.path.replace("{site}", site) : def.path;
  if (!def.command) return { method: def.method, path, body: undefined };

  const { args, extra } = parseParams(def, params);
  return { method: def.method, path, body: buildEnvelope(def.command, args, extra) };
}

type Handler = (
  client: UnifiClient,
  site: string,
  args: Record<string, string | number>,
  extra: GuestAuthorization,
) => Promise<HttpResponse>;

const HANDLERS: Record<EndpointId, Handler> = {
  sites: (client) => client.sites(),
  statistics: (client, site) => client.statistics(site),
  deviceStatistics: (client, site) => client.deviceStatistics(site),
  authorizeGuest: (client, site, args, extra) =>
    client.authorizeGuest(site, String(args.mac), Number(args.minutes), extra),
  unauthorizeGuest: (client, site, args) => client.unauthorizeGuest(site, String(args.mac)),
  reconnectClient: (client, site, args) => client.reconnectClient(site, String(args.mac)),
};

/** Execute an endpoint through the client and return the parsed JSON body */
export async function executeEndpoint(
  def: EndpointDef,
  params: ExecuteParams,
  client: UnifiClient,
): Promise<unknown> {
  const { args, extra } = parseParams(def, params);
  const response = await HANDLERS[def.id](client, params.site || "default", args, extra);
  return responseJson(response);
}

/**
 * Run `fn`; if the controller answers 401 (session cookie expired), log in
 * again with the stored credentials and run it once more.
 */
export async function withRelogin<T>(client: UnifiClient, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (!(err instanceof TransportError) || err.status !== 401) throw err;
    await client.relogin();
    return fn();
  }
}
