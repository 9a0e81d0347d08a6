/**
 * Loudline Wire Protocol — Errors
 *
 * Every failure the exchange can surface. Each class carries a
 * machine-readable code so status output can switch on it.
 */

export type ErrorCode =
  | "BIND_FAILED"        // listening socket could not be bound
  | "ACCEPT_FAILED"      // a single accept attempt failed
  | "CONNECTION_ERROR"   // reset, broken pipe, remote close, closed session
  | "MALFORMED_FRAME"    // truncated frame or invalid UTF-8 payload
  | "MESSAGE_TOO_LONG";  // payload does not fit the 2-byte prefix

export abstract class LoudlineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal: the server never reached the listening state. */
export class BindFailure extends LoudlineError {
  readonly code = "BIND_FAILED";
}

/** Recoverable: logged, the server keeps listening. */
export class AcceptFailure extends LoudlineError {
  readonly code = "ACCEPT_FAILED";
}

/** Transport failure. Ends the affected session only. */
export class ConnectionError extends LoudlineError {
  readonly code = "CONNECTION_ERROR";
}

export class MalformedFrameError extends LoudlineError {
  readonly code = "MALFORMED_FRAME";
}

export class MessageTooLongError extends LoudlineError {
  readonly code = "MESSAGE_TOO_LONG";

  constructor(readonly byteLength: number, limit: number) {
    super(`Message is ${byteLength} bytes, the frame limit is ${limit}`);
  }
}

/** Errors that end one session without affecting any other. */
export type SessionError = ConnectionError | MalformedFrameError | MessageTooLongError;

export function isSessionError(err: unknown): err is SessionError {
  return (
    err instanceof ConnectionError ||
    err instanceof MalformedFrameError ||
    err instanceof MessageTooLongError
  );
}

/**
 * Normalise a thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
