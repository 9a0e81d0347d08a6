/**
 * Line-oriented client
 *
 * Prints each reply and re-prints the prompt. Used with --plain and whenever
 * stdin is not a terminal. End of input counts as "exit". Before the
 * sentinel goes out, the replies to lines already sent are awaited, so piped
 * input prints every answer.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { isExitCommand } from "@loudline/protocol";
import { Connection, type ConnectionOptions } from "./connection.js";

export interface PlainOptions extends ConnectionOptions {
  input: Readable;
  output: Writable;
}

/**
 * Run one exchange against the server.
 *
 * @returns the process exit code: 0 after "exit", 1 on any failure
 */
export async function runPlain(options: PlainOptions): Promise<number> {
  const { input, output } = options;
  let exitCode = 0;
  /** Lines sent whose reply has not arrived yet */
  let awaiting = 0;
  let onDrained: (() => void) | null = null;
  let leaving = false;
  let inputClosed = false;

  const rl = createInterface({ input, output, prompt: "> " });
  const prompt = () => {
    if (!inputClosed) rl.prompt();
  };

  const connection = new Connection(options, {
    onReply: (text) => {
      output.write(`${text}\n`);
      awaiting = Math.max(0, awaiting - 1);
      if (awaiting === 0) onDrained?.();
      prompt();
    },
    onError: (error) => {
      console.error("A communication error occurred with the server.");
      console.error(`  ${error.message}`);
      exitCode = 1;
    },
  });

  const leave = async () => {
    if (leaving) return;
    leaving = true;
    if (awaiting > 0) {
      await new Promise<void>((resolve) => {
        onDrained = () => resolve();
      });
    }
    await connection.disconnect();
  };

  // Listen before connecting: piped input can arrive, and end, while the
  // connection is still opening.
  rl.on("line", (line) => {
    if (leaving) return;
    if (isExitCommand(line)) {
      void leave();
      return;
    }
    awaiting++;
    void connection.submit(line);
  });
  rl.on("close", () => {
    inputClosed = true;
    void leave();
  });

  try {
    await connection.connect();
  } catch (err) {
    console.error("Failed to connect to the server. Is it running?");
    console.error(`  ${err instanceof Error ? err.message : err}`);
    rl.close();
    return 1;
  }

  prompt();
  await connection.closed();
  rl.close();
  output.write("\nConnection closed.\n");
  return exitCode;
}
