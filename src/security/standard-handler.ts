/**
 * Standard security handler, revisions 2 to 4.
 *
 * Authentication turns a password into the file key. Every string and
 * stream is then encrypted with a key derived from the file key and the
 * number of the indirect object it belongs to.
 *
 * @see ISO 32000-1, 7.6.2 and 7.6.3
 */

import { encodePdfDocEncoding } from "#src/helpers/strings";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfString } from "#src/objects/pdf-string";
import { aesDecrypt, aesEncrypt } from "./ciphers/aes";
import { rc4 } from "./ciphers/rc4";
import type { EncryptionDict } from "./encryption-dict";
import { AuthenticationError } from "./errors";
import {
  authenticateOwnerPassword,
  authenticateUserPassword,
  deriveObjectKey,
  type KeyDerivationParams,
} from "./key-derivation/md5-based";
import type { Permissions } from "./permissions";
import type { EncryptionAlgorithm } from "./schemas";

export type PasswordKind = "user" | "owner";

/**
 * Encrypts and decrypts the strings or the streams of one object.
 */
export interface CryptHandler {
  readonly algorithm: EncryptionAlgorithm;
  encrypt(data: Uint8Array, objectNumber: number, generation: number): Uint8Array;
  decrypt(data: Uint8Array, objectNumber: number, generation: number): Uint8Array;
}

class IdentityHandler implements CryptHandler {
  readonly algorithm = "Identity";

  encrypt(data: Uint8Array): Uint8Array {
    return data;
  }

  decrypt(data: Uint8Array): Uint8Array {
    return data;
  }
}

class RC4Handler implements CryptHandler {
  readonly algorithm = "RC4";

  constructor(private readonly fileKey: Uint8Array) {}

  encrypt(data: Uint8Array, objectNumber: number, generation: number): Uint8Array {
    return rc4(deriveObjectKey(this.fileKey, objectNumber, generation, false), data);
  }

  decrypt(data: Uint8Array, objectNumber: number, generation: number): Uint8Array {
    return this.encrypt(data, objectNumber, generation);
  }
}

class AES128Handler implements CryptHandler {
  readonly algorithm = "AES-128";

  constructor(private readonly fileKey: Uint8Array) {}

  encrypt(data: Uint8Array, objectNumber: number, generation: number): Uint8Array {
    return aesEncrypt(deriveObjectKey(this.fileKey, objectNumber, generation, true), data);
  }

  decrypt(data: Uint8Array, objectNumber: number, generation: number): Uint8Array {
    return aesDecrypt(deriveObjectKey(this.fileKey, objectNumber, generation, true), data);
  }
}

export function createCryptHandler(algorithm: EncryptionAlgorithm, fileKey: Uint8Array): CryptHandler {
  switch (algorithm) {
    case "Identity":
      return new IdentityHandler();
    case "RC4":
      return new RC4Handler(fileKey);
    case "AES-128":
      return new AES128Handler(fileKey);
  }
}

/**
 * Password bytes to try. R2 to R4 passwords are PDFDocEncoding; UTF-8 is
 * tried as well for passwords set by tools that ignore that.
 */
function passwordCandidates(password: string): Uint8Array[] {
  const utf8 = new TextEncoder().encode(password);
  const docEncoded = encodePdfDocEncoding(password);

  if (docEncoded === null || docEncoded.every((byte, i) => byte === utf8[i])) {
    return [utf8];
  }

  return [docEncoded, utf8];
}

export function keyDerivationParams(
  encryption: EncryptionDict,
  fileId: Uint8Array,
): KeyDerivationParams {
  return {
    revision: encryption.revision,
    keyLengthBytes: encryption.keyLengthBits / 8,
    ownerHash: encryption.ownerHash,
    permissions: encryption.permissionsRaw,
    fileId,
    encryptMetadata: encryption.encryptMetadata,
  };
}

export class StandardSecurityHandler {
  readonly strings: CryptHandler;
  readonly streams: CryptHandler;

  constructor(
    readonly encryption: EncryptionDict,
    readonly fileKey: Uint8Array,
    readonly passwordKind: PasswordKind,
  ) {
    this.strings = createCryptHandler(encryption.stringAlgorithm, fileKey);
    this.streams = createCryptHandler(encryption.streamAlgorithm, fileKey);
  }

  /**
   * Open the document with `password`, or with the empty user password
   * when none is given. The user password is tried before the owner
   * password.
   *
   * @throws {AuthenticationError} `NEED_CREDENTIALS` if no password was
   *   given and the empty one fails, `INVALID_CREDENTIALS` if the given one
   *   is wrong
   */
  static authenticate(
    encryption: EncryptionDict,
    fileId: Uint8Array,
    password?: string,
  ): StandardSecurityHandler {
    const params = keyDerivationParams(encryption, fileId);

    for (const candidate of passwordCandidates(password ?? "")) {
      const userKey = authenticateUserPassword(candidate, encryption.userHash, params);

      if (userKey !== null) {
        return new StandardSecurityHandler(encryption, userKey, "user");
      }

      const ownerKey = authenticateOwnerPassword(candidate, encryption.userHash, params);

      if (ownerKey !== null) {
        return new StandardSecurityHandler(encryption, ownerKey, "owner");
      }
    }

    if (password === undefined) {
      throw new AuthenticationError("Document is encrypted and needs a password", "NEED_CREDENTIALS");
    }

    throw new AuthenticationError("Incorrect password", "INVALID_CREDENTIALS");
  }

  get permissions(): Permissions {
    return this.encryption.permissions;
  }

  /**
   * Whether a stream of this /Type is encrypted. Cross-reference streams
   * never are, metadata streams depend on /EncryptMetadata.
   */
  encryptsStreamType(type: string | undefined): boolean {
    if (type === "XRef") {
      return false;
    }

    return type !== "Metadata" || this.encryption.encryptMetadata;
  }

  /**
   * Decrypt every string and stream inside a parsed indirect object.
   */
  decryptObject(object: PdfObject, objectNumber: number, generation: number): PdfObject {
    return this.transform(object, objectNumber, generation, "decrypt");
  }

  /**
   * Encrypt every string and stream of an object about to be written.
   * Returns a copy; the object itself is not changed.
   */
  encryptObject(object: PdfObject, objectNumber: number, generation: number): PdfObject {
    return this.transform(object.clone(), objectNumber, generation, "encrypt");
  }

  /**
   * Replace strings in place inside containers. The top-level value is
   * returned since a bare string is replaced rather than changed.
   */
  private transform(
    object: PdfObject,
    objectNumber: number,
    generation: number,
    direction: "encrypt" | "decrypt",
  ): PdfObject {
    const visit = (value: PdfObject): PdfObject => {
      switch (value.type) {
        case "string":
          return new PdfString(
            this.strings[direction](value.bytes, objectNumber, generation),
            value.format,
          );

        case "array":
          for (let i = 0; i < value.length; i++) {
            const item = value.at(i);

            if (item !== undefined) {
              value.set(i, visit(item));
            }
          }

          return value;

        case "dict":
          for (const [key, item] of value) {
            value.set(key, visit(item));
          }

          return value;

        case "stream":
          visit(value.dict);

          if (this.encryptsStreamType(value.dict.getName("Type")?.value)) {
            value.setRawData(this.streams[direction](value.data, objectNumber, generation));
          }

          return value;

        default:
          return value;
      }
    };

    return visit(object);
  }
}
