/**
 * AES-128-CBC as PDF uses it (crypt filter method AESV2).
 *
 * Encrypted strings and streams carry a random 16-byte IV in front of the
 * ciphertext, which is PKCS#7 padded.
 */

import { cbc } from "@noble/ciphers/aes.js";
import { randomBytes } from "@noble/ciphers/utils.js";
import { SecurityError } from "../errors";

export const AES_BLOCK_SIZE = 16;

/**
 * @returns IV followed by the ciphertext
 */
export function aesEncrypt(key: Uint8Array, plaintext: Uint8Array): Uint8Array {
  const iv = randomBytes(AES_BLOCK_SIZE);
  const ciphertext = cbc(key, iv).encrypt(plaintext);
  const result = new Uint8Array(AES_BLOCK_SIZE + ciphertext.length);

  result.set(iv);
  result.set(ciphertext, AES_BLOCK_SIZE);

  return result;
}

/**
 * @param data - IV followed by the ciphertext
 * @throws {SecurityError} if the data is not whole blocks or the padding
 *   is wrong
 */
export function aesDecrypt(key: Uint8Array, data: Uint8Array): Uint8Array {
  // An IV alone is an empty value
  if (data.length === AES_BLOCK_SIZE) {
    return new Uint8Array(0);
  }

  if (data.length < AES_BLOCK_SIZE || data.length % AES_BLOCK_SIZE !== 0) {
    throw new SecurityError(`AES data must be whole ${AES_BLOCK_SIZE}-byte blocks, got ${data.length} bytes`);
  }

  try {
    return cbc(key, data.subarray(0, AES_BLOCK_SIZE)).decrypt(data.subarray(AES_BLOCK_SIZE));
  } catch (error) {
    throw new SecurityError(
      `AES decryption failed: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
