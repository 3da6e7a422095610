/**
 * RC4 stream cipher, used by standard security handler revisions 2 to 4.
 *
 * RC4 is symmetric: the same operation encrypts and decrypts. A cipher
 * keeps its keystream position, so every object needs a fresh instance.
 */

import { SINGLE_BYTE_MASK } from "#src/helpers/chars";

export class RC4Cipher {
  private readonly s = new Uint8Array(256);
  private i = 0;
  private j = 0;

  /**
   * @param key - 1 to 256 bytes (5 to 16 in PDF)
   */
  constructor(key: Uint8Array) {
    if (key.length === 0 || key.length > 256) {
      throw new RangeError(`RC4 key must be 1 to 256 bytes, got ${key.length}`);
    }

    for (let i = 0; i < 256; i++) {
      this.s[i] = i;
    }

    // Key scheduling
    let j = 0;

    for (let i = 0; i < 256; i++) {
      j = (j + this.s[i] + key[i % key.length]) & SINGLE_BYTE_MASK;
      this.swap(i, j);
    }
  }

  /**
   * XOR `data` with the next keystream bytes.
   */
  process(data: Uint8Array): Uint8Array {
    const output = new Uint8Array(data.length);

    for (let k = 0; k < data.length; k++) {
      this.i = (this.i + 1) & SINGLE_BYTE_MASK;
      this.j = (this.j + this.s[this.i]) & SINGLE_BYTE_MASK;
      this.swap(this.i, this.j);

      output[k] = data[k] ^ this.s[(this.s[this.i] + this.s[this.j]) & SINGLE_BYTE_MASK];
    }

    return output;
  }

  private swap(a: number, b: number): void {
    const tmp = this.s[a];

    this.s[a] = this.s[b];
    this.s[b] = tmp;
  }
}

/**
 * Encrypt or decrypt `data` with a fresh cipher.
 */
export function rc4(key: Uint8Array, data: Uint8Array): Uint8Array {
  return new RC4Cipher(key).process(data);
}
