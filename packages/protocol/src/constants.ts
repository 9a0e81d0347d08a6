/**
 * Loudline Wire Protocol — Constants
 *
 * Shared by the server and every client. There is no version byte on the
 * wire, so changing any of these is a breaking change for both ends.
 */

/** TCP port the server listens on and the client connects to. */
export const DEFAULT_PORT = 3333;

/** Server bind address: all local interfaces. */
export const DEFAULT_BIND_HOST = "0.0.0.0";

/** Client connect address. */
export const DEFAULT_CONNECT_HOST = "localhost";

/** Size of the big-endian length prefix, in bytes. */
export const FRAME_HEADER_BYTES = 2;

/** Largest payload (in UTF-8 bytes) the 2-byte prefix can describe. */
export const MAX_MESSAGE_BYTES = 0xffff;

/** Reserved message that ends a session instead of being echoed. */
export const EXIT_SENTINEL = "exit";

/**
 * Server-side sentinel check: exact match only.
 *
 * Note the client's check below ignores case, so a raw peer sending "EXIT"
 * gets "EXIT" echoed back. Both ends keep their historical behaviour.
 */
export function isExitSentinel(message: string): boolean {
  return message === EXIT_SENTINEL;
}

/** Client-side check for a line the user typed. */
export function isExitCommand(line: string): boolean {
  return line.toLowerCase() === EXIT_SENTINEL;
}
