#!/usr/bin/env node
/**
 * loudline-client CLI — Terminal client for loudline-server
 *
 * Usage:
 *   loudline-client [--host <address>] [--port <number>] [--plain]
 *
 * Renders the Ink UI on a terminal. With --plain, or when stdin is not a
 * TTY, falls back to a line-oriented prompt.
 */

import React from "react";
import { render } from "ink";
import { DEFAULT_CONNECT_HOST, DEFAULT_PORT } from "@loudline/protocol";
import { runPlain } from "./plain.js";
import App from "./app.js";

interface ClientOptions {
  host: string;
  port: number;
  plain: boolean;
}

function parseArgs(args: string[]): ClientOptions {
  const options: ClientOptions = {
    host: DEFAULT_CONNECT_HOST,
    port: DEFAULT_PORT,
    plain: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    switch (arg) {
      case "--host":
        options.host = args[++i] ?? options.host;
        break;
      case "--port":
      case "-p":
        options.port = parseInt(args[++i] ?? "", 10);
        if (isNaN(options.port) || options.port < 1 || options.port > 65535) {
          console.error("Invalid port number");
          process.exit(1);
        }
        break;
      case "--plain":
        options.plain = true;
        break;
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
  console.log(`loudline-client — Terminal client for loudline-server

Usage:
  loudline-client [options]

Options:
  --host <address>       Server address (default: ${DEFAULT_CONNECT_HOST})
  --port, -p <number>    Server port (default: ${DEFAULT_PORT})
  --plain                Line-oriented prompt instead of the full UI
  --help, -h             Show this help

Type a message and press Enter. Type "exit" to quit.
`);
}

async function runInk(options: ClientOptions): Promise<void> {
  const { waitUntilExit } = render(React.createElement(App, { host: options.host, port: options.port }));
  try {
    await waitUntilExit();
  } catch {
    // The app has already shown the error
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.plain || !process.stdin.isTTY) {
    process.exitCode = await runPlain({
      host: options.host,
      port: options.port,
      input: process.stdin,
      output: process.stdout,
    });
  } else {
    await runInk(options);
  }
}

main().catch((err) => {
  console.error(`Fatal: ${err}`);
  process.exit(1);
});
