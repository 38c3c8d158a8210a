import { UnifiClient } from "./client.js";
import { verifyPolicy, type CompleteConfig } from "./config.js";
import { errorDetail } from "./errors.js";
import { withRelogin } from "./execute.js";
import { logDebug, logError } from "./log.js";
import { FetchTransport, type HttpTransport } from "./transport.js";

/**
 * Build a client from resolved configuration. Credentials are seeded, not
 * used: the first `relogin()` opens the session.
 */
export function createClient(config: CompleteConfig, transport?: HttpTransport): UnifiClient {
  const client = new UnifiClient(
    transport ?? new FetchTransport({ baseUrl: config.url, logger: config.verbose ? logDebug : undefined }),
    { verify: verifyPolicy(config), timeout: config.timeout },
  );
  client.setLoginData({ username: config.username, password: config.password });
  return client;
}

/**
 * Log in, run `fn` (logging in again once on 401), then log out and release
 * connections. Logout runs whether or not `fn` succeeded; its failure is
 * logged and never replaces the outcome of `fn`.
 */
export async function runSession<T>(client: UnifiClient, fn: (client: UnifiClient) => Promise<T>): Promise<T> {
  try {
    await client.relogin();
    try {
      return await withRelogin(client, () => fn(client));
    } finally {
      await logoutQuietly(client);
    }
  } finally {
    await client.close();
  }
}

async function logoutQuietly(client: UnifiClient): Promise<void> {
  try {
    await client.logout();
  } catch (err: unknown) {
    logError({ ...errorDetail(err), hint: "Logout failed; the controller expires the session on its own" });
  }
}
