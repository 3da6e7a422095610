/**
 * MD5 key derivation of the standard security handler, revisions 2 to 4.
 *
 * @see ISO 32000-1, 7.6.3.3 (Algorithms 2 to 7)
 */

import { md5 } from "@noble/hashes/legacy.js";
import { concatBytes } from "@noble/hashes/utils.js";
import { SINGLE_BYTE_MASK } from "#src/helpers/chars";
import { rc4 } from "../ciphers/rc4";

/**
 * The fixed 32-byte string passwords are padded with.
 */
export const PASSWORD_PADDING = new Uint8Array([
  0x28, 0xbf, 0x4e, 0x5e, 0x4e, 0x75, 0x8a, 0x41, 0x64, 0x00, 0x4e, 0x56, 0xff, 0xfa, 0x01, 0x08,
  0x2e, 0x2e, 0x00, 0xb6, 0xd0, 0x68, 0x3e, 0x80, 0x2f, 0x0c, 0xa9, 0xfe, 0x64, 0x53, 0x69, 0x7a,
]);

/** "sAlT", appended to object keys for AES */
const AES_SALT = new Uint8Array([0x73, 0x41, 0x6c, 0x54]);

/**
 * Values from the encryption dictionary and trailer that feed the file key.
 */
export interface KeyDerivationParams {
  revision: number;
  /** 5 for 40-bit keys, up to 16 */
  keyLengthBytes: number;
  /** /O */
  ownerHash: Uint8Array;
  /** /P as a signed 32-bit integer */
  permissions: number;
  /** First element of the trailer /ID */
  fileId: Uint8Array;
  encryptMetadata: boolean;
}

/**
 * Truncate a password to 32 bytes, or fill it up to 32 from the padding.
 */
export function padPassword(password: Uint8Array): Uint8Array {
  const padded = new Uint8Array(32);
  const used = Math.min(password.length, 32);

  padded.set(password.subarray(0, used));
  padded.set(PASSWORD_PADDING.subarray(0, 32 - used), used);

  return padded;
}

function littleEndian(value: number, bytes: number): Uint8Array {
  const result = new Uint8Array(bytes);

  for (let i = 0; i < bytes; i++) {
    result[i] = (value >> (8 * i)) & SINGLE_BYTE_MASK;
  }

  return result;
}

/**
 * RC4 with the key XORed with 1..19 after the first pass (R3+), in forward
 * order to encrypt and reverse order to decrypt.
 */
function rc4Rounds(key: Uint8Array, data: Uint8Array, revision: number, reverse: boolean): Uint8Array {
  if (revision === 2) {
    return rc4(key, data);
  }

  let result: Uint8Array = data;

  for (let step = 0; step < 20; step++) {
    const round = reverse ? 19 - step : step;

    result = rc4(
      key.map(byte => byte ^ round),
      result,
    );
  }

  return result;
}

/**
 * The RC4 key hidden in /O: MD5 of the padded owner password, rehashed 50
 * times from R3 on (Algorithm 3, steps a to d).
 */
function ownerKey(ownerPassword: Uint8Array, revision: number, keyLengthBytes: number): Uint8Array {
  let hash = md5(padPassword(ownerPassword));

  if (revision >= 3) {
    for (let i = 0; i < 50; i++) {
      hash = md5(hash);
    }
  }

  return hash.subarray(0, keyLengthBytes);
}

/**
 * File encryption key from a user password (Algorithm 2).
 */
export function computeFileKey(password: Uint8Array, params: KeyDerivationParams): Uint8Array {
  const { revision, keyLengthBytes } = params;
  const parts = [
    padPassword(password),
    params.ownerHash,
    littleEndian(params.permissions, 4),
    params.fileId,
  ];

  if (revision >= 4 && !params.encryptMetadata) {
    parts.push(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
  }

  let hash = md5(concatBytes(...parts));

  if (revision >= 3) {
    for (let i = 0; i < 50; i++) {
      hash = md5(hash.subarray(0, keyLengthBytes));
    }
  }

  return hash.slice(0, keyLengthBytes);
}

/**
 * The /O value (Algorithm 3). An empty owner password falls back to the
 * user password.
 */
export function computeOwnerHash(
  ownerPassword: Uint8Array,
  userPassword: Uint8Array,
  revision: number,
  keyLengthBytes: number,
): Uint8Array {
  const key = ownerKey(
    ownerPassword.length > 0 ? ownerPassword : userPassword,
    revision,
    keyLengthBytes,
  );

  return rc4Rounds(key, padPassword(userPassword), revision, false);
}

/**
 * The /U value (Algorithms 4 and 5). From R3 on only the first 16 bytes
 * are significant; the rest are zero.
 */
export function computeUserHash(fileKey: Uint8Array, fileId: Uint8Array, revision: number): Uint8Array {
  if (revision === 2) {
    return rc4(fileKey, PASSWORD_PADDING);
  }

  const result = new Uint8Array(32);

  result.set(rc4Rounds(fileKey, md5(concatBytes(PASSWORD_PADDING, fileId)), revision, false));

  return result;
}

/**
 * Check a user password against /U.
 *
 * @returns the file key, or null if the password is wrong
 */
export function authenticateUserPassword(
  password: Uint8Array,
  userHash: Uint8Array,
  params: KeyDerivationParams,
): Uint8Array | null {
  const key = computeFileKey(password, params);
  const expected = computeUserHash(key, params.fileId, params.revision);
  const significant = params.revision === 2 ? 32 : 16;

  return constantTimeEquals(expected.subarray(0, significant), userHash.subarray(0, significant))
    ? key
    : null;
}

/**
 * Check an owner password: decrypting /O with it yields the padded user
 * password (Algorithm 7).
 *
 * @returns the file key, or null if the password is wrong
 */
export function authenticateOwnerPassword(
  password: Uint8Array,
  userHash: Uint8Array,
  params: KeyDerivationParams,
): Uint8Array | null {
  const key = ownerKey(password, params.revision, params.keyLengthBytes);
  const userPassword = rc4Rounds(key, params.ownerHash, params.revision, true);

  return authenticateUserPassword(userPassword, userHash, params);
}

/**
 * Key for one object (Algorithm 1): MD5 over the file key, the low three
 * bytes of the object number and the low two of the generation.
 */
export function deriveObjectKey(
  fileKey: Uint8Array,
  objectNumber: number,
  generation: number,
  aes: boolean,
): Uint8Array {
  const parts = [fileKey, littleEndian(objectNumber, 3), littleEndian(generation, 2)];

  if (aes) {
    parts.push(AES_SALT);
  }

  return md5(concatBytes(...parts)).slice(0, Math.min(fileKey.length + 5, 16));
}

function constantTimeEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let diff = 0;

  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }

  return diff === 0;
}
