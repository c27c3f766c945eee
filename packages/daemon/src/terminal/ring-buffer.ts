/**
 * Ring Buffer for terminal scrollback.
 *
 * Keeps the most recent `capacity` bytes of PTY output so late-joining
 * subscribers can be replayed recent history. Oldest bytes are evicted first;
 * nothing else ever removes them.
 */

/**
 * Fixed-capacity circular byte store.
 */
export class RingBuffer {
  private readonly buffer: Buffer;
  private readonly capacity: number;
  /** Next write position */
  private pos = 0;
  private full = false;
  private totalWritten = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = Buffer.alloc(capacity);
  }

  /**
   * Append bytes, evicting the oldest bytes on overflow.
   */
  append(data: Uint8Array): void {
    const length = data.length;
    if (length === 0) return;
    this.totalWritten += length;

    if (length >= this.capacity) {
      // Only the tail survives
      this.buffer.set(data.subarray(length - this.capacity));
      this.pos = 0;
      this.full = true;
      return;
    }

    const spaceAtEnd = this.capacity - this.pos;
    if (length <= spaceAtEnd) {
      this.buffer.set(data, this.pos);
    } else {
      this.buffer.set(data.subarray(0, spaceAtEnd), this.pos);
      this.buffer.set(data.subarray(spaceAtEnd), 0);
    }

    const nextPos = this.pos + length;
    if (nextPos >= this.capacity) {
      this.full = true;
    }
    this.pos = nextPos % this.capacity;
  }

  /**
   * Copy of the buffered bytes, oldest first.
   */
  snapshot(): Buffer {
    if (!this.full) {
      return Buffer.from(this.buffer.subarray(0, this.pos));
    }
    return Buffer.concat([this.buffer.subarray(this.pos), this.buffer.subarray(0, this.pos)]);
  }

  /** Number of bytes currently stored. */
  get length(): number {
    return this.full ? this.capacity : this.pos;
  }

  /**
   * Get buffer statistics.
   */
  getStats(): { bytes: number; capacity: number; totalWritten: number; evicted: number } {
    return {
      bytes: this.length,
      capacity: this.capacity,
      totalWritten: this.totalWritten,
      evicted: this.totalWritten - this.length,
    };
  }
}
