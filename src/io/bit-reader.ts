/**
 * Big-endian bit cursor, the reading side of `BitWriter`. Bits are read
 * most significant first.
 */
export class BitReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  /** Bits left before the end of data */
  get remaining(): number {
    return this.bytes.length * 8 - this.offset;
  }

  /**
   * Read `bits` bits (up to 32) as an unsigned number, or null when fewer
   * than that are left.
   */
  readBits(bits: number): number | null {
    if (bits > this.remaining) {
      return null;
    }

    let value = 0;

    for (let i = 0; i < bits; i++, this.offset++) {
      const bit = (this.bytes[this.offset >> 3] >> (7 - (this.offset & 7))) & 1;

      value = value * 2 + bit;
    }

    return value;
  }
}
