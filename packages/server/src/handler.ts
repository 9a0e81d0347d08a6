/**
 * Connection Handler
 *
 * Server side of one session: receive, uppercase, reply, until the client
 * sends the sentinel or the transport fails.
 */

import { isExitSentinel, isSessionError, type Session, type SessionError } from "@loudline/protocol";

export type HandlerOutcome =
  /** Client sent the sentinel; session closed without a reply */
  | { reason: "sentinel" }
  /** Session was closed from outside (server shutdown) */
  | { reason: "closed" }
  /** Transport or framing failure; session closed, not retried */
  | { reason: "error"; error: SessionError };

export function shout(message: string): string {
  return message.toUpperCase();
}

/**
 * Run the echo loop for `session` until it ends. Always leaves the session
 * closed. Errors other than session errors are rethrown after closing.
 */
export async function runConnectionHandler(session: Session): Promise<HandlerOutcome> {
  try {
    while (!session.closed) {
      const message = await session.receive();

      if (isExitSentinel(message)) {
        await session.close();
        return { reason: "sentinel" };
      }

      await session.send(shout(message));
    }
    return { reason: "closed" };
  } catch (err) {
    const closedElsewhere = session.closed;
    await session.close();
    if (closedElsewhere) return { reason: "closed" };
    if (isSessionError(err)) return { reason: "error", error: err };
    throw err;
  }
}
