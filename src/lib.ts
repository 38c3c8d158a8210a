export { UnifiClient } from "./client.js";
export { CommandAPI, buildEnvelope, stamgrPath, type CommandEnvelope, type GuestAuthorization, type StamgrCommand } from "./commands.js";
export { RequestDispatcher } from "./dispatcher.js";
export { TransportError, MissingCredentialsError, errorDetail } from "./errors.js";
export {
  resolveRequestOptions,
  mergeCallOptions,
  type RequestOptions,
  type ClientOptions,
  type CallOptions,
  type TransportOptions,
  type VerifyPolicy,
} from "./options.js";
export { SessionStore, type Credentials } from "./session.js";
export {
  FetchTransport,
  responseJson,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
  type FetchLike,
  type FetchTransportOptions,
  type TransportLogger,
} from "./transport.js";
export { withRelogin } from "./execute.js";
