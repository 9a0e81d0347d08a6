/**
 * @loudline/tui-client — Terminal client for loudline-server
 */

export {
  Connection,
  type ConnectionState,
  type ConnectionEvents,
  type ConnectionOptions,
  type CloseReason,
} from "./connection.js";
export { runPlain, type PlainOptions } from "./plain.js";
export { default as App, type AppProps } from "./app.js";
export {
  appReducer,
  initialState,
  canSubmit,
  type AppState,
  type AppAction,
  type TranscriptEntry,
} from "./state.js";
