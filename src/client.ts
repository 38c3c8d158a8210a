import { CommandAPI, type GuestAuthorization } from "./commands.js";
import { RequestDispatcher } from "./dispatcher.js";
import { resolveRequestOptions, type CallOptions, type ClientOptions, type RequestOptions } from "./options.js";
import { SessionStore, type Credentials } from "./session.js";
import type { HttpResponse, HttpTransport } from "./transport.js";

/**
 * Client for the UniFi controller API. One instance is one session: a single
 * cookie jar is shared by every request it issues.
 *
 * ```ts
 * const client = new UnifiClient(new FetchTransport({ baseUrl: "https://127.0.0.1:8443" }));
 * await client.login("admin", "secret");
 * const stats = await client.statistics("default");
 * ```
 *
 * Controllers come with a self-signed certificate, so `verify` defaults to
 * `false`. Pass the path of the controller's certificate to pin it:
 * `new UnifiClient(transport, { verify: "/etc/unifi/cert.pem" })`.
 */
export class UnifiClient {
  readonly options: RequestOptions;
  readonly session: SessionStore;
  readonly commands: CommandAPI;
  private readonly dispatcher: RequestDispatcher;

  constructor(
    private readonly transport: HttpTransport,
    options: ClientOptions = {},
  ) {
    this.options = resolveRequestOptions(options);
    this.dispatcher = new RequestDispatcher(transport, this.options);
    this.session = new SessionStore(this.dispatcher);
    this.commands = new CommandAPI(this.dispatcher);
  }

  httpClient(): HttpTransport {
    return this.transport;
  }

  // ── Session ─────────────────────────────────────────────────────────

  login(username: string, password: string): Promise<HttpResponse> {
    return this.session.login(username, password);
  }

  relogin(username?: string, password?: string): Promise<HttpResponse> {
    return this.session.relogin(username, password);
  }

  setLoginData(credentials: Credentials): void {
    this.session.setLoginData(credentials);
  }

  logout(): Promise<HttpResponse> {
    return this.session.logout();
  }

  // ── Generic requests ────────────────────────────────────────────────

  get(path: string, query: Record<string, unknown> = {}, overrides?: CallOptions): Promise<HttpResponse> {
    return this.dispatcher.get(path, query, overrides);
  }

  post(path: string, body: object = {}, overrides?: CallOptions): Promise<HttpResponse> {
    return this.dispatcher.post(path, body, overrides);
  }

  put(path: string, body: object = {}, overrides?: CallOptions): Promise<HttpResponse> {
    return this.dispatcher.put(path, body, overrides);
  }

  // ── Endpoints ───────────────────────────────────────────────────────

  sites(): Promise<HttpResponse> {
    return this.get("/api/self/sites");
  }

  /** Statistics of the clients connected to a site */
  statistics(site: string): Promise<HttpResponse> {
    return this.get(`/api/s/${site}/stat/sta`);
  }

  deviceStatistics(site: string): Promise<HttpResponse> {
    return this.get(`/api/s/${site}/stat/device`);
  }

  authorizeGuest(site: string, mac: string, minutes: number, extra: GuestAuthorization = {}): Promise<HttpResponse> {
    return this.commands.authorizeGuest(site, mac, minutes, extra);
  }

  unauthorizeGuest(site: string, mac: string): Promise<HttpResponse> {
    return this.commands.unauthorizeGuest(site, mac);
  }

  reconnectClient(site: string, mac: string): Promise<HttpResponse> {
    return this.commands.reconnectClient(site, mac);
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }
}
