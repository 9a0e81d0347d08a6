/**
 * Connection — client side of one exchange
 *
 * Two cooperating tasks share the session:
 * - outbound: submitted lines are sent one at a time, in submission order
 * - inbound: a reader drains the session and hands each reply to onReply
 *
 * Whichever task hits a transport failure ends both: the session is closed
 * and onError / onClose fire once. Typing "exit" (any case) sends the
 * sentinel and closes the session. A Connection is used once.
 */

import {
  DEFAULT_CONNECT_HOST,
  DEFAULT_PORT,
  EXIT_SENTINEL,
  isExitCommand,
  Session,
  toError,
} from "@loudline/protocol";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "closed";

/** Why the exchange ended */
export type CloseReason = "exit" | "failure";

export interface ConnectionEvents {
  /** Called when connection state changes */
  onStateChange?: (state: ConnectionState) => void;
  /** Called for each reply from the server */
  onReply?: (text: string) => void;
  /** Called when communication with the server fails */
  onError?: (error: Error) => void;
  /** Called once, after the session has been released */
  onClose?: (reason: CloseReason) => void;
}

export interface ConnectionOptions {
  host?: string;
  port?: number;
}

export class Connection {
  private session: Session | null = null;
  private state: ConnectionState = "disconnected";
  private closeReason: CloseReason | null = null;
  /** Settles once connect() has succeeded or failed */
  private readonly opened: Promise<void>;
  private resolveOpened: () => void = () => undefined;
  private outbound: Promise<void>;
  private reader: Promise<void> | null = null;
  private readonly finished: Promise<CloseReason>;
  private resolveFinished: (reason: CloseReason) => void = () => undefined;
  private readonly host: string;
  private readonly port: number;
  private readonly events: ConnectionEvents;

  constructor(options: ConnectionOptions, events: ConnectionEvents) {
    this.host = options.host ?? DEFAULT_CONNECT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.events = events;
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
    this.opened = new Promise((resolve) => {
      this.resolveOpened = () => resolve();
    });
    this.outbound = this.opened;
  }

  /**
   * Open the session and start reading replies. A failed connect rejects
   * here rather than through onError/onClose.
   *
   * @throws ConnectionError if the server cannot be reached
   */
  async connect(): Promise<void> {
    if (this.state !== "disconnected") {
      throw new Error(`Cannot connect from state "${this.state}"`);
    }

    this.setState("connecting");
    let session: Session;
    try {
      session = await Session.connect(this.port, this.host);
    } catch (err) {
      this.closeReason = "failure";
      this.setState("closed");
      this.resolveFinished("failure");
      this.resolveOpened();
      throw err;
    }

    this.session = session;
    this.setState("connected");
    this.reader = this.readReplies(session);
    this.resolveOpened();
  }

  /**
   * Queue a line typed by the user. Resolves once it has been sent (or the
   * exchange has ended); never rejects, failures go to onError.
   *
   * Lines submitted before connect() are held until it settles, and dropped
   * if it fails.
   */
  submit(line: string): Promise<void> {
    const sent = this.outbound.then(() => this.dispatch(line));
    this.outbound = sent;
    return sent;
  }

  /** Same as the user typing "exit". */
  disconnect(): Promise<void> {
    return this.submit(EXIT_SENTINEL);
  }

  /**
   * Resolves with the close reason once the exchange has ended and the
   * reply reader has stopped.
   */
  async closed(): Promise<CloseReason> {
    const reason = await this.finished;
    await this.reader;
    return reason;
  }

  /** `host:port` of the server */
  get serverAddress(): string {
    return `${this.host}:${this.port}`;
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private async dispatch(line: string): Promise<void> {
    const session = this.session;
    if (!session || this.closeReason) return;

    try {
      if (isExitCommand(line)) {
        await session.send(EXIT_SENTINEL);
        await this.shutdown("exit");
        return;
      }
      await session.send(line);
    } catch (err) {
      await this.fail(err);
    }
  }

  private async readReplies(session: Session): Promise<void> {
    try {
      for await (const text of session.messages()) {
        this.events.onReply?.(text);
      }
    } catch (err) {
      await this.fail(err);
    }
  }

  private async fail(err: unknown): Promise<void> {
    if (this.closeReason) return;
    this.events.onError?.(toError(err));
    await this.shutdown("failure");
  }

  private async shutdown(reason: CloseReason): Promise<void> {
    if (this.closeReason) return;
    this.closeReason = reason;

    await this.session?.close();
    this.setState("closed");
    this.events.onClose?.(reason);
    this.resolveFinished(reason);
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.events.onStateChange?.(state);
    }
  }
}
