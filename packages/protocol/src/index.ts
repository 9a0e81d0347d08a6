/**
 * @loudline/protocol — Wire protocol for the loudline exchange
 *
 * Framing, error taxonomy and the Connection Session shared by the server
 * and the console client.
 */

export {
  DEFAULT_PORT,
  DEFAULT_BIND_HOST,
  DEFAULT_CONNECT_HOST,
  FRAME_HEADER_BYTES,
  MAX_MESSAGE_BYTES,
  EXIT_SENTINEL,
  isExitSentinel,
  isExitCommand,
} from "./constants.js";

export {
  LoudlineError,
  BindFailure,
  AcceptFailure,
  ConnectionError,
  MalformedFrameError,
  MessageTooLongError,
  isSessionError,
  toError,
} from "./errors.js";

export type { ErrorCode, SessionError } from "./errors.js";

export { encodeFrame, tryDecodeFrame, FrameReader } from "./framing.js";
export { SlidingBuffer } from "./sliding-buffer.js";
export { Session, type CloseOptions } from "./session.js";
