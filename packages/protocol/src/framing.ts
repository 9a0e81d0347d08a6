/**
 * Loudline Wire Protocol — Framing
 *
 * One frame per message:
 *
 *   +--------+--------+---------------------------+
 *   | length (u16 BE) | UTF-8 payload (length B)  |
 *   +--------+--------+---------------------------+
 *
 * The length counts bytes, not characters. No version byte, no type
 * discriminator, no checksum. The codec knows nothing about the sentinel.
 */

import { TextDecoder } from "node:util";
import { FRAME_HEADER_BYTES, MAX_MESSAGE_BYTES } from "./constants.js";
import { MalformedFrameError, MessageTooLongError } from "./errors.js";
import { SlidingBuffer } from "./sliding-buffer.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Encode a message as a single frame.
 *
 * @throws MessageTooLongError if the UTF-8 payload exceeds 65535 bytes
 */
export function encodeFrame(message: string): Buffer {
  const payload = Buffer.from(message, "utf8");
  if (payload.length > MAX_MESSAGE_BYTES) {
    throw new MessageTooLongError(payload.length, MAX_MESSAGE_BYTES);
  }

  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  frame.writeUInt16BE(payload.length, 0);
  payload.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Take one complete frame off the front of `buffer`.
 * Returns `null` (consuming nothing) while the frame is still incomplete.
 */
export function tryDecodeFrame(buffer: SlidingBuffer): string | null {
  const header = buffer.peek(FRAME_HEADER_BYTES);
  if (header === null) return null;

  const length = header.readUInt16BE(0);
  if (buffer.available < FRAME_HEADER_BYTES + length) return null;

  buffer.read(FRAME_HEADER_BYTES);
  const payload = buffer.read(length) ?? Buffer.alloc(0);
  return decodePayload(payload);
}

function decodePayload(payload: Uint8Array): string {
  try {
    return utf8.decode(payload);
  } catch (err) {
    throw new MalformedFrameError("Frame payload is not valid UTF-8", { cause: err });
  }
}

/**
 * Describe why the bytes left in `buffer` at end of stream are not a frame.
 */
function truncatedFrameError(buffer: SlidingBuffer): MalformedFrameError {
  const header = buffer.peek(FRAME_HEADER_BYTES);
  if (header === null) {
    return new MalformedFrameError(
      `Stream ended inside a frame header (${buffer.available} of ${FRAME_HEADER_BYTES} bytes)`
    );
  }
  const declared = header.readUInt16BE(0);
  const received = buffer.available - FRAME_HEADER_BYTES;
  return new MalformedFrameError(
    `Stream ended after ${received} of ${declared} payload bytes`
  );
}

/**
 * Reads frames from a byte stream (a socket, or any async iterable of chunks).
 *
 * `read()` blocks until a whole frame is buffered. Only one read may be in
 * flight at a time.
 */
export class FrameReader {
  private readonly buffer = new SlidingBuffer();
  private readonly chunks: AsyncIterator<Uint8Array>;

  constructor(source: AsyncIterable<Uint8Array>) {
    this.chunks = source[Symbol.asyncIterator]();
  }

  /** Bytes received from the source but not yet consumed by a frame. */
  get buffered(): number {
    return this.buffer.available;
  }

  /**
   * Next message, or `null` once the stream has ended cleanly on a frame
   * boundary.
   *
   * @throws MalformedFrameError on a truncated frame or invalid UTF-8
   */
  async read(): Promise<string | null> {
    for (;;) {
      const message = tryDecodeFrame(this.buffer);
      if (message !== null) return message;

      const next = await this.chunks.next();
      if (next.done) {
        if (this.buffer.available > 0) throw truncatedFrameError(this.buffer);
        return null;
      }
      this.buffer.append(next.value);
    }
  }
}
