/**
 * TUI Client State — Types and Reducer
 *
 * All application state flows through a single reducer.
 * The Connection callbacks dispatch actions to update state.
 */

import type { ConnectionState } from "./connection.js";

// =============================================================================
// Transcript
// =============================================================================

export interface TranscriptEntry {
  id: string;
  /** user: typed locally · server: reply · system: client notice */
  role: "user" | "server" | "system";
  content: string;
}

// =============================================================================
// App State
// =============================================================================

export interface AppState {
  connectionState: ConnectionState;
  /** host:port being talked to */
  serverAddress: string | null;
  /** Everything sent and received, oldest first (rendered in <Static>) */
  transcript: TranscriptEntry[];
  /** Error message to display */
  errorMessage: string | null;
}

export const initialState: AppState = {
  connectionState: "disconnected",
  serverAddress: null,
  transcript: [],
  errorMessage: null,
};

// =============================================================================
// Actions
// =============================================================================

export type AppAction =
  | { type: "SET_CONNECTION_STATE"; state: ConnectionState }
  | { type: "SET_SERVER_ADDRESS"; address: string }
  | { type: "USER_MESSAGE"; content: string }
  | { type: "SERVER_REPLY"; content: string }
  | { type: "SYSTEM_NOTICE"; content: string }
  | { type: "SET_ERROR"; message: string };

// =============================================================================
// Reducer
// =============================================================================

let entryCounter = 0;

function append(state: AppState, role: TranscriptEntry["role"], content: string): AppState {
  return {
    ...state,
    transcript: [...state.transcript, { id: `entry-${++entryCounter}`, role, content }],
  };
}

export function appReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case "SET_CONNECTION_STATE":
      return { ...state, connectionState: action.state };

    case "SET_SERVER_ADDRESS":
      return { ...state, serverAddress: action.address };

    case "USER_MESSAGE":
      return append(state, "user", action.content);

    case "SERVER_REPLY":
      return append(state, "server", action.content);

    case "SYSTEM_NOTICE":
      return append(state, "system", action.content);

    case "SET_ERROR":
      return { ...state, errorMessage: action.message };

    default:
      return state;
  }
}

/** Whether the prompt should accept input */
export function canSubmit(state: AppState): boolean {
  return state.connectionState === "connected";
}
