/**
 * Append-only byte log with a fixed capacity. Once full, the oldest bytes are
 * dropped first; appends and reads each run to completion, so a tail is a
 * left-truncated copy of what was written and never a torn one.
 */
export class RingLogBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private written = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  append(data: Buffer | string): void {
    let chunk = typeof data === "string" ? Buffer.from(data, "utf8") : data;
    if (chunk.length === 0) {
      return;
    }

    this.written += chunk.length;
    if (chunk.length >= this.capacity) {
      chunk = chunk.subarray(chunk.length - this.capacity);
      this.chunks = [];
      this.size = 0;
    }

    this.chunks.push(chunk);
    this.size += chunk.length;

    while (this.size > this.capacity) {
      const head = this.chunks[0];
      const overflow = this.size - this.capacity;
      if (head.length <= overflow) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(overflow);
        this.size -= overflow;
      }
    }
  }

  /** Returns the last `maxBytes` bytes held, oldest first. */
  tail(maxBytes: number): Buffer {
    if (maxBytes <= 0 || this.size === 0) {
      return Buffer.alloc(0);
    }

    const all = Buffer.concat(this.chunks, this.size);
    return maxBytes >= all.length ? all : all.subarray(all.length - maxBytes);
  }

  lastLines(count: number): string[] {
    const lines = this.tail(this.size).toString("utf8").split(/\r?\n|\r/);
    return lines.map((line) => line.trim()).filter(Boolean).slice(-count);
  }

  get byteLength(): number {
    return this.size;
  }

  /** Total bytes ever appended, including dropped ones. */
  get totalWritten(): number {
    return this.written;
  }

  clear(): void {
    this.chunks = [];
    this.size = 0;
  }
}

/**
 * Decodes a log tail as UTF-8. A tail cut inside a multibyte character starts
 * with continuation bytes; those are dropped instead of becoming U+FFFD.
 */
export function decodeLogTail(bytes: Buffer): string {
  let start = 0;
  while (start < bytes.length && start < 3 && (bytes[start] & 0xc0) === 0x80) {
    start += 1;
  }
  return bytes.subarray(start).toString("utf8");
}
