/**
 * Big-endian bit packer for the hint tables of linearized files.
 *
 * Values are written most significant bit first. `align()` pads the
 * current byte with zero bits.
 */
export class BitWriter {
  private readonly bytes: number[] = [];
  private current = 0;
  private used = 0;

  /**
   * Write the low `bits` bits of `value` (up to 32).
   *
   * @throws {RangeError} if `value` does not fit
   */
  writeBits(value: number, bits: number): void {
    if (bits < 0 || bits > 32) {
      throw new RangeError(`Bit width must be 0 to 32, got ${bits}`);
    }

    if (value < 0 || (bits < 32 && value >= 2 ** bits)) {
      throw new RangeError(`Value ${value} does not fit in ${bits} bits`);
    }

    for (let bit = bits - 1; bit >= 0; bit--) {
      this.current = (this.current << 1) | (Math.floor(value / 2 ** bit) & 1);
      this.used++;

      if (this.used === 8) {
        this.bytes.push(this.current);
        this.current = 0;
        this.used = 0;
      }
    }
  }

  writeUint32(value: number): void {
    this.writeBits(value, 32);
  }

  writeUint16(value: number): void {
    this.writeBits(value, 16);
  }

  /** Pad to the next byte boundary */
  align(): void {
    if (this.used > 0) {
      this.writeBits(0, 8 - this.used);
    }
  }

  /** Bytes written so far, including a padded partial byte */
  get length(): number {
    return this.bytes.length + (this.used > 0 ? 1 : 0);
  }

  toBytes(): Uint8Array {
    const result = new Uint8Array(this.length);

    result.set(this.bytes);

    if (this.used > 0) {
      result[this.bytes.length] = this.current << (8 - this.used);
    }

    return result;
  }
}

/**
 * Bits needed to store every value from 0 to `max`.
 */
export function bitsNeeded(max: number): number {
  let bits = 0;

  while (max >= 2 ** bits) {
    bits++;
  }

  return bits;
}
