/**
 * TCP Server + Accept Loop
 *
 * Binds the listening socket and hands every accepted connection to its own
 * handler task. The accept path itself does no per-connection I/O, so a slow
 * client never holds up the next accept.
 *
 * Server lifecycle:
 * 1. binding: listen() on host:port (failure → BindFailure, back to stopped)
 * 2. listening: each connection → admission check → Session → handler
 * 3. stopped: stop() closes the listener and every live session
 */

import { createServer, type Server, type Socket } from "node:net";
import {
  AcceptFailure,
  BindFailure,
  DEFAULT_BIND_HOST,
  DEFAULT_PORT,
  Session,
  toError,
} from "@loudline/protocol";
import { runConnectionHandler, type HandlerOutcome } from "./handler.js";

export type ServerState = "stopped" | "binding" | "listening";

/** Session outcome as reported to the status channel */
export type SessionOutcome = HandlerOutcome | { reason: "error"; error: Error };

export interface ServerEvents {
  /** Called when the server changes state */
  onStateChange?: (state: ServerState) => void;
  /** Called for every admitted connection */
  onAccept?: (remoteAddress: string) => void;
  /** Called when a connection is turned away by the connection limit */
  onReject?: (remoteAddress: string) => void;
  /** Called once a session's handler has finished */
  onSessionEnd?: (remoteAddress: string, outcome: SessionOutcome) => void;
  /** Called when the listener reports an error after binding; listening continues */
  onAcceptError?: (error: AcceptFailure) => void;
  /** Called when onSessionEnd throws; the server keeps running */
  onCallbackError?: (error: Error) => void;
}

export interface TcpServerOptions {
  /** Port to bind (default: DEFAULT_PORT, 0 for an ephemeral port) */
  port?: number;
  /** Interface to bind (default: all interfaces) */
  host?: string;
  /** Live sessions allowed at once; further connections are closed on arrival */
  maxConnections?: number;
  events?: ServerEvents;
}

export class TcpServer {
  protected server: Server | null = null;
  private state: ServerState = "stopped";
  private readonly sessions = new Set<Session>();
  private readonly handlers = new Set<Promise<void>>();
  private readonly port: number;
  private readonly host: string;
  private readonly maxConnections: number | undefined;
  private readonly events: ServerEvents;

  constructor(options: TcpServerOptions = {}) {
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host ?? DEFAULT_BIND_HOST;
    this.maxConnections = options.maxConnections;
    this.events = options.events ?? {};

    if (this.maxConnections !== undefined && !(this.maxConnections >= 1)) {
      throw new RangeError(`maxConnections must be at least 1, got ${this.maxConnections}`);
    }
  }

  /**
   * Bind and start accepting connections.
   *
   * @throws BindFailure if the port cannot be bound
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error("Server already started");
    }

    this.setState("binding");
    const server = createServer((socket) => this.handleConnection(socket));

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
          server.off("listening", onListening);
          reject(new BindFailure(`Failed to bind ${this.host}:${this.port}: ${err.message}`, { cause: err }));
        };
        const onListening = () => {
          server.off("error", onError);
          resolve();
        };
        server.once("error", onError);
        server.once("listening", onListening);
        server.listen(this.port, this.host);
      });
    } catch (err) {
      this.setState("stopped");
      throw err;
    }

    server.on("error", (err) => {
      this.events.onAcceptError?.(new AcceptFailure(`Failed to accept a connection: ${err.message}`, { cause: err }));
    });

    this.server = server;
    this.setState("listening");
  }

  /**
   * Stop listening, close every live session and wait for their handlers.
   * Sessions are closed forcibly: unflushed replies to a peer that has
   * stopped reading are dropped.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    await Promise.all([...this.sessions].map((session) => session.close({ force: true })));
    await Promise.all([...this.handlers]);
    await closed;

    this.setState("stopped");
  }

  /** Bound port (the ephemeral one when started with port 0) */
  get boundPort(): number {
    const address = this.server?.address();
    if (address === null || address === undefined || typeof address === "string") {
      return this.port;
    }
    return address.port;
  }

  get connectionCount(): number {
    return this.sessions.size;
  }

  get serverState(): ServerState {
    return this.state;
  }

  // ===========================================================================
  // Connection handling
  // ===========================================================================

  private handleConnection(socket: Socket): void {
    if (this.maxConnections !== undefined && this.sessions.size >= this.maxConnections) {
      const remoteAddress = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
      socket.destroy();
      this.events.onReject?.(remoteAddress);
      return;
    }

    const session = new Session(socket);
    this.sessions.add(session);
    this.events.onAccept?.(session.remoteAddress);

    const handler: Promise<void> = runConnectionHandler(session)
      .catch(async (err: unknown): Promise<SessionOutcome> => {
        await session.close();
        return { reason: "error", error: toError(err) };
      })
      .then((outcome) => {
        this.sessions.delete(session);
        this.handlers.delete(handler);
        this.events.onSessionEnd?.(session.remoteAddress, outcome);
      })
      .catch((err: unknown) => {
        this.events.onCallbackError?.(toError(err));
      });
    this.handlers.add(handler);
  }

  private setState(state: ServerState): void {
    if (this.state !== state) {
      this.state = state;
      this.events.onStateChange?.(state);
    }
  }
}
