/**
 * Cursor over an immutable byte buffer.
 *
 * All parsers share this primitive: `peek()` looks without consuming,
 * `advance()` consumes, `moveTo()` jumps. Reads past the end return -1.
 */
export class Scanner {
  private _position = 0;

  constructor(readonly bytes: Uint8Array) {}

  get position(): number {
    return this._position;
  }

  get length(): number {
    return this.bytes.length;
  }

  isAtEnd(): boolean {
    return this._position >= this.bytes.length;
  }

  /** Byte at the current position, or -1 at end of input. */
  peek(): number {
    return this.peekAt(this._position);
  }

  /** Byte at an absolute offset, or -1 outside the buffer. */
  peekAt(offset: number): number {
    if (offset < 0 || offset >= this.bytes.length) {
      return -1;
    }

    return this.bytes[offset];
  }

  /** Consume and return the current byte, or -1 at end of input. */
  advance(): number {
    if (this._position >= this.bytes.length) {
      return -1;
    }

    return this.bytes[this._position++];
  }

  /** Jump to an absolute offset, clamped to the buffer. */
  moveTo(offset: number): void {
    this._position = Math.max(0, Math.min(offset, this.bytes.length));
  }

  /** Check whether the bytes at the current position spell `text`. */
  matches(text: string): boolean {
    for (let i = 0; i < text.length; i++) {
      if (this.peekAt(this._position + i) !== text.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }
}
