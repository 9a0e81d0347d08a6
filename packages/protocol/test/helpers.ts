/**
 * Loopback socket helpers for session tests.
 */

import { createServer, createConnection, type Socket } from "node:net";

/**
 * Connected pair of raw sockets on 127.0.0.1. `close` tears both down and
 * stops the listener.
 */
export async function socketPair(): Promise<{ client: Socket; server: Socket; close: () => Promise<void> }> {
  const listener = createServer();
  await new Promise<void>((resolve) => listener.listen(0, "127.0.0.1", () => resolve()));

  const address = listener.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }

  const accepted = new Promise<Socket>((resolve) => listener.once("connection", resolve));
  const client = createConnection({ port: address.port, host: "127.0.0.1" });
  await new Promise<void>((resolve) => client.once("connect", () => resolve()));
  const server = await accepted;

  const close = async () => {
    client.destroy();
    server.destroy();
    await new Promise<void>((resolve) => listener.close(() => resolve()));
  };

  return { client, server, close };
}

/** Async iterable over the given chunks, for FrameReader tests. */
export async function* chunks(...parts: number[][]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield Uint8Array.from(part);
  }
}

/** Poll until `predicate` holds or `timeoutMs` passes. */
export async function waitUntil(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
