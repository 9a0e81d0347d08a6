/**
 * Growable byte buffer with separate read and write offsets.
 *
 * Chunks arrive from the socket in arbitrary sizes; frames are read off the
 * front once enough bytes are present. Consumed space is reclaimed by
 * compacting before the buffer is grown.
 */
export class SlidingBuffer {
  private buffer: Buffer;
  private readOffset = 0;
  private writeOffset = 0;

  constructor(initialSize = 1024) {
    this.buffer = Buffer.alloc(initialSize);
  }

  append(chunk: Uint8Array): void {
    if (this.writeOffset + chunk.length > this.buffer.length) {
      this.ensureCapacity(chunk.length);
    }
    this.buffer.set(chunk, this.writeOffset);
    this.writeOffset += chunk.length;
  }

  /**
   * Consume `length` bytes. Returns `null` if fewer are buffered.
   *
   * The returned slice shares memory with the buffer and is only valid
   * until the next `append`.
   */
  read(length: number): Buffer | null {
    const slice = this.peek(length);
    if (slice === null) return null;

    this.readOffset += length;
    if (this.readOffset === this.writeOffset) {
      this.readOffset = 0;
      this.writeOffset = 0;
    }
    return slice;
  }

  /** Like `read`, without consuming. */
  peek(length: number): Buffer | null {
    if (length < 0) throw new RangeError(`Cannot read ${length} bytes`);
    if (this.available < length) return null;
    return this.buffer.subarray(this.readOffset, this.readOffset + length);
  }

  /** Unread bytes currently buffered. */
  get available(): number {
    return this.writeOffset - this.readOffset;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  private ensureCapacity(minFreeSpace: number): void {
    const headroom = this.buffer.length - this.writeOffset;
    const unread = this.available;

    // Compact first
    if (headroom + this.readOffset >= minFreeSpace) {
      this.buffer.copy(this.buffer, 0, this.readOffset, this.writeOffset);
      this.readOffset = 0;
      this.writeOffset = unread;
      return;
    }

    const grown = Buffer.alloc(Math.max(this.buffer.length * 2, unread + minFreeSpace));
    this.buffer.copy(grown, 0, this.readOffset, this.writeOffset);
    this.buffer = grown;
    this.readOffset = 0;
    this.writeOffset = unread;
  }
}
