/**
 * Connection Session
 *
 * One open TCP socket with frame-level read and write operations. A session
 * is owned by exactly one consumer (a server handler or the client loop) and
 * is never reused once closed.
 */

import { createConnection, type Socket } from "node:net";
import { encodeFrame, FrameReader } from "./framing.js";
import { ConnectionError, MalformedFrameError } from "./errors.js";

export interface CloseOptions {
  /** Drop unflushed writes instead of waiting for the peer to take them */
  force?: boolean;
}

export class Session {
  /** `host:port` of the peer */
  readonly remoteAddress: string;

  private readonly socket: Socket;
  private readonly reader: FrameReader;
  private isClosed = false;
  private closing: Promise<void> | null = null;
  /** Last error the socket emitted, kept as the cause of later failures */
  private transportError: Error | null = null;

  constructor(socket: Socket) {
    this.socket = socket;
    this.remoteAddress = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
    this.reader = new FrameReader(socket);

    socket.on("error", (err) => {
      this.transportError = err;
    });
  }

  /**
   * Open a client-side session.
   */
  static connect(port: number, host: string): Promise<Session> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ port, host });

      const onError = (err: Error) => {
        socket.off("connect", onConnect);
        socket.destroy();
        reject(new ConnectionError(`Failed to connect to ${host}:${port}: ${err.message}`, { cause: err }));
      };
      const onConnect = () => {
        socket.off("error", onError);
        resolve(new Session(socket));
      };

      socket.once("error", onError);
      socket.once("connect", onConnect);
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Whether at least one byte is waiting on the read side.
   *
   * Only a hint: a partial frame counts, and `receive()` will then wait for
   * the rest of it.
   */
  hasIncomingData(): boolean {
    if (this.isClosed) return false;
    return this.reader.buffered > 0 || this.socket.readableLength > 0;
  }

  /**
   * Wait for the next message.
   *
   * @throws ConnectionError when the transport fails, the peer has gone, or
   *   the session is (or becomes) closed
   * @throws MalformedFrameError when the peer sent something that is not a frame
   */
  async receive(): Promise<string> {
    if (this.isClosed) throw new ConnectionError("Session is closed");

    let message: string | null;
    try {
      message = await this.reader.read();
    } catch (err) {
      if (err instanceof MalformedFrameError) throw err;
      throw new ConnectionError(
        this.isClosed ? "Session is closed" : `Read failed: ${describe(err)}`,
        { cause: err },
      );
    }

    if (this.isClosed) throw new ConnectionError("Session is closed");
    if (message === null) throw new ConnectionError("Connection closed by peer");
    return message;
  }

  /**
   * Send one message. Resolves once the frame has been handed to the transport.
   *
   * @throws MessageTooLongError before anything is written
   * @throws ConnectionError if the write fails or the session is closed
   */
  async send(message: string): Promise<void> {
    if (this.isClosed) throw new ConnectionError("Session is closed");

    const frame = encodeFrame(message);
    if (!this.socket.writable) {
      throw new ConnectionError("Connection is no longer writable", {
        cause: this.transportError ?? undefined,
      });
    }

    await new Promise<void>((resolve, reject) => {
      const onClose = () => {
        reject(new ConnectionError("Connection closed before the write completed"));
      };
      this.socket.once("close", onClose);
      this.socket.write(frame, (err) => {
        this.socket.off("close", onClose);
        if (err) {
          reject(new ConnectionError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Flush pending writes and release the socket. Safe to call repeatedly;
   * every call resolves once the socket is fully closed.
   *
   * With `force`, pending writes are dropped and the socket is destroyed at
   * once, also when a graceful close is already waiting on a peer that does
   * not read.
   */
  close(options: CloseOptions = {}): Promise<void> {
    this.isClosed = true;

    if (!this.closing) {
      this.closing = new Promise<void>((resolve) => {
        if (this.socket.destroyed) {
          resolve();
          return;
        }
        this.socket.once("close", () => resolve());
      });
      if (!options.force && !this.socket.destroyed) {
        this.socket.end(() => this.socket.destroy());
      }
    }

    if (options.force) this.socket.destroy();
    return this.closing;
  }

  /**
   * Received messages until the session is closed locally.
   * Transport and framing failures are rethrown.
   */
  async *messages(): AsyncGenerator<string> {
    while (!this.isClosed) {
      let message: string;
      try {
        message = await this.receive();
      } catch (err) {
        if (this.isClosed) return;
        throw err;
      }
      yield message;
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
