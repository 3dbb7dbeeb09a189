/**
 * Growable byte buffer for serializing a PDF file.
 *
 * The document writer reads `position` before each indirect object to
 * build the cross-reference table, so every write goes through here and
 * the recorded offsets are exact byte counts, not string lengths.
 */

export interface ByteWriterOptions {
  /** Initial buffer size in bytes. Default: 65536 (64KB) */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Uint8Array;
  private length = 0;

  constructor(options: ByteWriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialSize ?? 65536));
  }

  /** Make room for `needed` more bytes, doubling the buffer as often as it takes */
  private reserve(needed: number): void {
    const required = this.length + needed;

    if (required <= this.buffer.length) {
      return;
    }

    let size = this.buffer.length;

    while (size < required) {
      size *= 2;
    }

    const grown = new Uint8Array(size);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }

  /** Bytes written so far; the offset the next write lands at */
  get position(): number {
    return this.length;
  }

  writeByte(byte: number): void {
    this.reserve(1);
    this.buffer[this.length++] = byte;
  }

  writeBytes(data: Uint8Array): void {
    this.reserve(data.length);
    this.buffer.set(data, this.length);
    this.length += data.length;
  }

  /**
   * Write 7-bit ASCII text, one byte per character.
   *
   * @throws {RangeError} on any character above 0x7F, which would make
   *   string length and byte length disagree
   */
  writeAscii(text: string): void {
    this.reserve(text.length);

    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);

      if (code > 0x7f) {
        throw new RangeError(`Cannot write non-ASCII character U+${code.toString(16).toUpperCase().padStart(4, "0")}`);
      }

      this.buffer[this.length++] = code;
    }
  }

  /**
   * `count` bytes written so far, starting at `start`.
   * Returns a view; copy it before writing again.
   */
  peek(start: number, count: number): Uint8Array {
    return this.buffer.subarray(start, Math.min(start + count, this.length));
  }

  /** A copy of everything written */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
