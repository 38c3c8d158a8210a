import type { RequestDispatcher } from "./dispatcher.js";
import { MissingCredentialsError } from "./errors.js";
import type { HttpResponse } from "./transport.js";

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Owns the credentials of one controller session. The session cookie itself
 * lives in the dispatcher's jar, which the transport fills from the login
 * response.
 */
export class SessionStore {
  private credentials?: Credentials;
  private authenticated = false;

  constructor(private readonly dispatcher: RequestDispatcher) {}

  /** True once a login response came back; expiry is only noticed by a failing call */
  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  loginData(): Credentials | undefined {
    return this.credentials ? { ...this.credentials } : undefined;
  }

  /** Seed credentials (e.g. from a keychain) so a later `relogin()` can use them */
  setLoginData(credentials: Credentials): void {
    this.credentials = { username: credentials.username, password: credentials.password };
  }

  async login(username: string, password: string): Promise<HttpResponse> {
    this.credentials = { username, password };
    this.authenticated = false;
    const response = await this.dispatcher.post("/api/login", { username, password });
    this.authenticated = true;
    return response;
  }

  /**
   * Log in again, e.g. after the session cookie expired. An omitted or empty
   * argument is replaced by the stored value of the same kind.
   */
  relogin(username?: string, password?: string): Promise<HttpResponse> {
    const user = username || this.credentials?.username;
    const pass = password || this.credentials?.password;

    const missing: ("username" | "password")[] = [];
    if (user === undefined) missing.push("username");
    if (pass === undefined) missing.push("password");
    if (user === undefined || pass === undefined) {
      return Promise.reject(new MissingCredentialsError(missing));
    }

    return this.login(user, pass);
  }

  /** A redirect is the expected answer. Stored credentials are kept. */
  async logout(): Promise<HttpResponse> {
    const response = await this.dispatcher.request("GET", "/logout", { allowRedirects: false });
    this.authenticated = false;
    return response;
  }
}
