/**
 * Framing codec — encode, incremental decode, malformed input.
 */

import { describe, it, expect } from "vitest";
import { encodeFrame, tryDecodeFrame, FrameReader } from "../src/framing.js";
import { SlidingBuffer } from "../src/sliding-buffer.js";
import { MalformedFrameError, MessageTooLongError } from "../src/errors.js";
import { MAX_MESSAGE_BYTES } from "../src/constants.js";
import { chunks } from "./helpers.js";

// =============================================================================
// encodeFrame
// =============================================================================

describe("encodeFrame", () => {
  it("prefixes the payload with its big-endian byte length", () => {
    expect(encodeFrame("hello")).toEqual(Buffer.from([0, 5, 0x68, 0x65, 0x6c, 0x6c, 0x6f]));
  });

  it("counts UTF-8 bytes, not characters", () => {
    const frame = encodeFrame("héllo");
    expect(frame.readUInt16BE(0)).toBe(6);
    expect(frame.subarray(2)).toEqual(Buffer.from([0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]));
  });

  it("encodes the empty message as a bare header", () => {
    expect(encodeFrame("")).toEqual(Buffer.from([0, 0]));
  });

  it("accepts a payload of exactly 65535 bytes", () => {
    const frame = encodeFrame("a".repeat(MAX_MESSAGE_BYTES));
    expect(frame.length).toBe(MAX_MESSAGE_BYTES + 2);
    expect(frame.readUInt16BE(0)).toBe(0xffff);
  });

  it("rejects payloads over the limit", () => {
    expect(() => encodeFrame("a".repeat(MAX_MESSAGE_BYTES + 1))).toThrow(MessageTooLongError);
  });

  it("applies the limit to the encoded size", () => {
    // 21846 three-byte characters = 65538 bytes
    expect(() => encodeFrame("日".repeat(21846))).toThrow(
      "Message is 65538 bytes, the frame limit is 65535",
    );
  });
});

// =============================================================================
// tryDecodeFrame
// =============================================================================

describe("tryDecodeFrame", () => {
  it("returns null and consumes nothing until the frame is complete", () => {
    const buffer = new SlidingBuffer();
    buffer.append(Buffer.from([0, 3, 0x61, 0x62]));

    expect(tryDecodeFrame(buffer)).toBeNull();
    expect(buffer.available).toBe(4);

    buffer.append(Buffer.from([0x63]));
    expect(tryDecodeFrame(buffer)).toBe("abc");
    expect(buffer.available).toBe(0);
  });

  it("leaves the following frame in the buffer", () => {
    const buffer = new SlidingBuffer();
    buffer.append(Buffer.concat([encodeFrame("one"), encodeFrame("two").subarray(0, 3)]));

    expect(tryDecodeFrame(buffer)).toBe("one");
    expect(buffer.available).toBe(3);
  });
});

// =============================================================================
// FrameReader
// =============================================================================

describe("FrameReader", () => {
  it("reassembles frames split across chunks", async () => {
    const reader = new FrameReader(
      chunks([0], [5, 0x68, 0x65], [0x6c, 0x6c, 0x6f, 0, 2, 0x68, 0x69]),
    );

    expect(await reader.read()).toBe("hello");
    expect(await reader.read()).toBe("hi");
    expect(await reader.read()).toBeNull();
  });

  it("decodes the empty message", async () => {
    const reader = new FrameReader(chunks([0, 0]));
    expect(await reader.read()).toBe("");
    expect(await reader.read()).toBeNull();
  });

  it("round-trips multi-byte text", async () => {
    const messages = ["hello", "Grüße", "日本語", "🙂 ok", ""];
    const reader = new FrameReader(
      chunks(...messages.map((m) => [...encodeFrame(m)])),
    );

    for (const message of messages) {
      expect(await reader.read()).toBe(message);
    }
    expect(await reader.read()).toBeNull();
  });

  it("fails when the stream ends before the declared length", async () => {
    const reader = new FrameReader(chunks([0, 5, 0x61]));
    await expect(reader.read()).rejects.toThrow(
      new MalformedFrameError("Stream ended after 1 of 5 payload bytes"),
    );
  });

  it("fails when the stream ends inside the header", async () => {
    const reader = new FrameReader(chunks([0]));
    await expect(reader.read()).rejects.toThrow(
      "Stream ended inside a frame header (1 of 2 bytes)",
    );
  });

  it("fails on invalid UTF-8", async () => {
    const reader = new FrameReader(chunks([0, 2, 0xff, 0xfe]));
    await expect(reader.read()).rejects.toBeInstanceOf(MalformedFrameError);
  });

  it("reports bytes buffered but not yet consumed", async () => {
    const reader = new FrameReader(chunks([0, 1, 0x61, 0, 4]));
    expect(await reader.read()).toBe("a");
    expect(reader.buffered).toBe(2);
  });
});
