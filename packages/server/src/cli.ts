#!/usr/bin/env node
/**
 * loudline-server CLI
 *
 * Usage:
 *   loudline-server [options]
 *
 * Examples:
 *   loudline-server
 *   loudline-server --port 4000 --host 127.0.0.1 --max-connections 16
 */

import { DEFAULT_BIND_HOST, DEFAULT_PORT, BindFailure } from "@loudline/protocol";
import { TcpServer } from "./tcp-server.js";

interface ServeOptions {
  port: number;
  host: string;
  maxConnections?: number;
}

function parseArgs(args: string[]): ServeOptions {
  const options: ServeOptions = {
    port: DEFAULT_PORT,
    host: DEFAULT_BIND_HOST,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    switch (arg) {
      case "--port":
      case "-p":
        options.port = parseInt(args[++i] ?? "", 10);
        if (isNaN(options.port) || options.port < 0 || options.port > 65535) {
          console.error("Invalid port number");
          process.exit(1);
        }
        break;
      case "--host":
        options.host = args[++i] ?? options.host;
        break;
      case "--max-connections": {
        const limit = parseInt(args[++i] ?? "", 10);
        if (isNaN(limit) || limit < 1) {
          console.error("Invalid connection limit");
          process.exit(1);
        }
        options.maxConnections = limit;
        break;
      }
      case "--help":
      case "-h":
        printHelp();
        process.exit(0);
        break;
      default:
        console.error(`Unknown option: ${arg}`);
        process.exit(1);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`loudline-server — Echoes every message back uppercased

Usage:
  loudline-server [options]

Options:
  --port, -p <number>        TCP port (default: ${DEFAULT_PORT})
  --host <address>           Interface to bind (default: ${DEFAULT_BIND_HOST})
  --max-connections <n>      Turn away connections beyond this many (default: unlimited)
  --help, -h                 Show this help
`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  const server = new TcpServer({
    port: options.port,
    host: options.host,
    maxConnections: options.maxConnections,
    events: {
      onAccept: (remote) => console.log(`Accepted connection from: ${remote}`),
      onReject: (remote) => console.error(`Rejected connection from ${remote}: connection limit reached`),
      onSessionEnd: (remote, outcome) => {
        if (outcome.reason === "error") {
          console.error(`Session error (${remote}): ${outcome.error.message}`);
        }
        console.log(`Connection closed: ${remote}`);
      },
      onAcceptError: (error) => console.error(`Failed to accept a socket connection: ${error.message}`),
      onCallbackError: (error) => console.error(`Status callback failed: ${error.message}`),
    },
  });

  try {
    await server.start();
  } catch (err) {
    if (err instanceof BindFailure) {
      console.error("Failed to start the server. Is the port already taken?");
      console.error(`  ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  console.log(`Listening on ${options.host}:${server.boundPort}`);

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Shutdown failed: ${err}`);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(`Fatal: ${err}`);
  process.exit(1);
});
