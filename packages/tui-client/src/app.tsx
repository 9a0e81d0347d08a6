/**
 * TUI Client — Main Ink Application
 *
 * Renders the interactive terminal UI:
 * - Connection status bar
 * - Transcript of sent lines and server replies (in <Static>)
 * - Error line
 * - Prompt
 */

import React, { useReducer, useCallback, useState, useEffect } from "react";
import { Box, Text, Static, useApp, useStdout } from "ink";
import TextInput from "ink-text-input";
import { Connection, type ConnectionState } from "./connection.js";
import {
  appReducer,
  initialState,
  canSubmit,
  type AppState,
  type TranscriptEntry,
} from "./state.js";

// =============================================================================
// Main App
// =============================================================================

export interface AppProps {
  host?: string;
  port?: number;
}

export default function App({ host, port }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [state, dispatch] = useReducer(appReducer, initialState);
  const [connection, setConnection] = useState<Connection | null>(null);
  const [draft, setDraft] = useState("");

  const columns = stdout?.columns ?? 80;

  useEffect(() => {
    const conn = new Connection({ host, port }, {
      onStateChange: (connState: ConnectionState) => {
        dispatch({ type: "SET_CONNECTION_STATE", state: connState });
      },

      onReply: (text) => {
        dispatch({ type: "SERVER_REPLY", content: text });
      },

      onError: (error) => {
        dispatch({
          type: "SET_ERROR",
          message: `A communication error occurred with the server: ${error.message}`,
        });
      },

      onClose: (reason) => {
        dispatch({ type: "SYSTEM_NOTICE", content: "Connection closed." });
        exit(reason === "failure" ? new Error("Lost connection to the server") : undefined);
      },
    });

    dispatch({ type: "SET_SERVER_ADDRESS", address: conn.serverAddress });
    setConnection(conn);

    conn.connect().catch((err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      dispatch({
        type: "SET_ERROR",
        message: `Failed to connect to the server. Is it running? (${error.message})`,
      });
      exit(error);
    });

    // submit() never rejects
    return () => void conn.disconnect();
  }, [host, port, exit]);

  const handleSubmit = useCallback(
    (text: string) => {
      setDraft("");
      if (!connection || !canSubmit(state)) return;

      dispatch({ type: "USER_MESSAGE", content: text });
      void connection.submit(text);
    },
    [connection, state],
  );

  return (
    <Box flexDirection="column" width={columns}>
      <Static items={state.transcript}>
        {(entry) => <TranscriptLine key={entry.id} entry={entry} />}
      </Static>

      <Box flexDirection="column">
        <StatusBar state={state} />

        {state.errorMessage && (
          <Box marginLeft={1}>
            <Text color="red">⚠ {state.errorMessage}</Text>
          </Box>
        )}

        {canSubmit(state) ? (
          <Box>
            <Text color="green">{"> "}</Text>
            <TextInput
              value={draft}
              onChange={setDraft}
              onSubmit={handleSubmit}
              placeholder='Type a message ("exit" to quit)'
            />
          </Box>
        ) : (
          <Box>
            <Text color="gray">{"> "}</Text>
            <Text dimColor>
              {state.connectionState === "closed" ? "Disconnected" : "Connecting..."}
            </Text>
          </Box>
        )}
      </Box>
    </Box>
  );
}

// =============================================================================
// Status Bar
// =============================================================================

function StatusBar({ state }: { state: AppState }) {
  const stateColor: Record<ConnectionState, string> = {
    disconnected: "red",
    connecting: "yellow",
    connected: "green",
    closed: "red",
  };

  const stateLabel: Record<ConnectionState, string> = {
    disconnected: "● Disconnected",
    connecting: "◌ Connecting...",
    connected: "● Connected",
    closed: "● Closed",
  };

  return (
    <Box gap={2}>
      <Text color={stateColor[state.connectionState]}>
        {stateLabel[state.connectionState]}
      </Text>
      {state.serverAddress && <Text dimColor>{state.serverAddress}</Text>}
    </Box>
  );
}

// =============================================================================
// Transcript
// =============================================================================

function TranscriptLine({ entry }: { entry: TranscriptEntry }) {
  switch (entry.role) {
    case "user":
      return <Text dimColor>{`> ${entry.content}`}</Text>;
    case "server":
      return <Text>{entry.content}</Text>;
    case "system":
      return <Text italic dimColor>{entry.content}</Text>;
  }
}
