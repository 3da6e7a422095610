/**
 * Growable byte buffer used by every serializer.
 *
 * The buffer doubles when needed and `toBytes()` returns a trimmed copy.
 * Writers that lay out a file before all values are known reserve a fixed
 * width field and fill it later with `overwriteAscii()`.
 */

export interface ByteWriterOptions {
  /** Initial buffer size in bytes. Default: 65536 (64KB) */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Uint8Array;
  private offset = 0;

  constructor(options: ByteWriterOptions = {}) {
    this.buffer = new Uint8Array(options.initialSize ?? 65536);
  }

  private grow(needed: number): void {
    const requiredSize = this.offset + needed;

    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = Math.max(this.buffer.length, 1);

    while (newSize < requiredSize) {
      newSize *= 2;
    }

    const newBuffer = new Uint8Array(newSize);
    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
  }

  /** Current write position (number of bytes written) */
  get position(): number {
    return this.offset;
  }

  writeByte(b: number): void {
    this.grow(1);
    this.buffer[this.offset++] = b;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Write a string whose characters are all below U+0100 (PDF keywords,
   * numbers, escaped names), one byte per character.
   */
  writeAscii(str: string): void {
    this.grow(str.length);

    for (let i = 0; i < str.length; i++) {
      this.buffer[this.offset++] = str.charCodeAt(i) & 0xff;
    }
  }

  /** Write a string followed by a line feed. */
  writeLine(str: string): void {
    this.writeAscii(str);
    this.writeByte(0x0a);
  }

  /**
   * Replace already written bytes, starting at `position`, with `str`.
   *
   * @throws {RangeError} if the text would extend past the written data
   */
  overwriteAscii(position: number, str: string): void {
    if (position < 0 || position + str.length > this.offset) {
      throw new RangeError(`Cannot overwrite ${str.length} bytes at ${position}`);
    }

    for (let i = 0; i < str.length; i++) {
      this.buffer[position + i] = str.charCodeAt(i) & 0xff;
    }
  }

  /**
   * Get final bytes as a trimmed copy.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
