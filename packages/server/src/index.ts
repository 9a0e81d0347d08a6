/**
 * @loudline/server — Uppercasing echo server
 */

export {
  TcpServer,
  type TcpServerOptions,
  type ServerEvents,
  type ServerState,
  type SessionOutcome,
} from "./tcp-server.js";
export { runConnectionHandler, shout, type HandlerOutcome } from "./handler.js";
