import type { RequestDispatcher } from "./dispatcher.js";
import type { HttpResponse } from "./transport.js";

/** Commands understood by the station manager (`stamgr`) endpoint */
export type StamgrCommand = "authorize-guest" | "unauthorize-guest" | "kick-sta";

export interface CommandEnvelope {
  cmd: string;
  [param: string]: unknown;
}

/** Optional limits for an authorized guest. Unknown keys are sent as given. */
export interface GuestAuthorization {
  /** Upload limit in kbps */
  up?: number;
  /** Download limit in kbps */
  down?: number;
  /** Transfer quota in MB */
  bytes?: number;
  /** MAC of the access point the guest is connected to */
  ap_mac?: string;
  [field: string]: unknown;
}

/**
 * Build `{ cmd, ...base }` and lay `overlay` over it. Overlay keys win on
 * conflict, `cmd` included.
 */
export function buildEnvelope(cmd: string, base: Record<string, unknown>, overlay: Record<string, unknown> = {}): CommandEnvelope {
  return { cmd, ...base, ...overlay };
}

export function stamgrPath(site: string): string {
  return `/api/s/${site}/cmd/stamgr`;
}

/** Site-scoped actions dispatched through the generic command endpoint */
export class CommandAPI {
  constructor(private readonly dispatcher: RequestDispatcher) {}

  send(site: string, envelope: CommandEnvelope): Promise<HttpResponse> {
    return this.dispatcher.post(stamgrPath(site), envelope);
  }

  /** Let a guest through the hotspot portal for `minutes` */
  authorizeGuest(site: string, mac: string, minutes: number, extra: GuestAuthorization = {}): Promise<HttpResponse> {
    return this.send(site, buildEnvelope("authorize-guest", { mac, minutes }, extra));
  }

  unauthorizeGuest(site: string, mac: string): Promise<HttpResponse> {
    return this.send(site, buildEnvelope("unauthorize-guest", { mac }));
  }

  /** Disconnect a client so it reconnects */
  reconnectClient(site: string, mac: string): Promise<HttpResponse> {
    return this.send(site, buildEnvelope("kick-sta", { mac }));
  }
}
