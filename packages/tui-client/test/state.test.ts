/**
 * State reducer tests — connection state, transcript, errors.
 */

import { describe, it, expect } from "vitest";
import { appReducer, initialState, canSubmit, type AppState } from "../src/state.js";

// =============================================================================
// Helpers
// =============================================================================

function reduce(state: AppState, ...actions: Parameters<typeof appReducer>[1][]): AppState {
  return actions.reduce((s, a) => appReducer(s, a), state);
}

function contents(state: AppState): Array<[string, string]> {
  return state.transcript.map((entry) => [entry.role, entry.content]);
}

// =============================================================================
// Transcript
// =============================================================================

describe("transcript", () => {
  it("records sent lines and replies in order", () => {
    const state = reduce(
      initialState,
      { type: "USER_MESSAGE", content: "hello" },
      { type: "SERVER_REPLY", content: "HELLO" },
      { type: "SYSTEM_NOTICE", content: "Connection closed." },
    );

    expect(contents(state)).toEqual([
      ["user", "hello"],
      ["server", "HELLO"],
      ["system", "Connection closed."],
    ]);
  });

  it("gives every entry a distinct id", () => {
    const state = reduce(
      initialState,
      { type: "USER_MESSAGE", content: "a" },
      { type: "USER_MESSAGE", content: "a" },
    );

    const [first, second] = state.transcript;
    expect(first!.id).not.toBe(second!.id);
  });

  it("does not mutate the previous state", () => {
    const before = reduce(initialState, { type: "USER_MESSAGE", content: "one" });
    reduce(before, { type: "SERVER_REPLY", content: "ONE" });

    expect(before.transcript).toHaveLength(1);
  });
});

// =============================================================================
// Connection
// =============================================================================

describe("connection state", () => {
  it("only accepts input while connected", () => {
    expect(canSubmit(initialState)).toBe(false);

    const connected = reduce(initialState, { type: "SET_CONNECTION_STATE", state: "connected" });
    expect(canSubmit(connected)).toBe(true);

    const closed = reduce(connected, { type: "SET_CONNECTION_STATE", state: "closed" });
    expect(canSubmit(closed)).toBe(false);
  });

  it("stores the server address", () => {
    const state = reduce(initialState, { type: "SET_SERVER_ADDRESS", address: "localhost:3333" });
    expect(state.serverAddress).toBe("localhost:3333");
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("errors", () => {
  it("SET_ERROR keeps the transcript", () => {
    const talked = reduce(initialState, { type: "SERVER_REPLY", content: "HELLO" });
    const failed = reduce(talked, { type: "SET_ERROR", message: "Connection closed by peer" });

    expect(failed.errorMessage).toBe("Connection closed by peer");
    expect(failed.transcript.map((e) => e.content)).toEqual(["HELLO"]);
  });
});
