/**
 * Shared fixtures for server tests: an event recorder, a loopback server
 * on an ephemeral port, and raw sockets for bytes that are not frames.
 */

import { createConnection, type Socket } from "node:net";
import type { AcceptFailure } from "@loudline/protocol";
import { TcpServer, type ServerEvents, type ServerState, type SessionOutcome } from "../src/tcp-server.js";

/** Everything a test server reported, in order */
export interface Recorded {
  states: ServerState[];
  accepted: string[];
  rejected: string[];
  ended: Array<{ remoteAddress: string; outcome: SessionOutcome }>;
  acceptErrors: AcceptFailure[];
  callbackErrors: Error[];
}

export function recordEvents(): { recorded: Recorded; events: ServerEvents } {
  const recorded: Recorded = {
    states: [],
    accepted: [],
    rejected: [],
    ended: [],
    acceptErrors: [],
    callbackErrors: [],
  };
  const events: ServerEvents = {
    onStateChange: (state) => recorded.states.push(state),
    onAccept: (remoteAddress) => recorded.accepted.push(remoteAddress),
    onReject: (remoteAddress) => recorded.rejected.push(remoteAddress),
    onSessionEnd: (remoteAddress, outcome) => recorded.ended.push({ remoteAddress, outcome }),
    onAcceptError: (error) => recorded.acceptErrors.push(error),
    onCallbackError: (error) => recorded.callbackErrors.push(error),
  };
  return { recorded, events };
}

/** Start a server on an ephemeral loopback port */
export async function startServer(
  events: ServerEvents,
  maxConnections?: number,
): Promise<TcpServer> {
  const server = new TcpServer({ port: 0, host: "127.0.0.1", events, maxConnections });
  await server.start();
  return server;
}

/** Raw socket, for sending bytes that are not valid frames */
export async function rawConnect(port: number): Promise<Socket> {
  const socket = createConnection({ port, host: "127.0.0.1" });
  await new Promise<void>((resolve, reject) => {
    socket.once("connect", () => resolve());
    socket.once("error", reject);
  });
  return socket;
}

/** Poll until `predicate` holds or `timeoutMs` passes. */
export async function waitUntil(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
