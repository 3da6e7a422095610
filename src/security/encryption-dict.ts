/**
 * Reading the /Encrypt dictionary of the standard security handler.
 *
 * @see ISO 32000-1, 7.6.1 and 7.6.3.2
 */

import type { PdfDict } from "#src/objects/pdf-dict";
import { EncryptionDictError, UnsupportedEncryptionError } from "./errors";
import { type Permissions, parsePermissions } from "./permissions";
import {
  type CryptFilterMethod,
  CryptFilterMethodSchema,
  type EncryptionAlgorithm,
  type Revision,
  RevisionSchema,
  type Version,
  VersionSchema,
} from "./schemas";

export interface EncryptionDict {
  version: Version;
  revision: Revision;
  keyLengthBits: number;
  /** /O, 32 bytes */
  ownerHash: Uint8Array;
  /** /U, 32 bytes */
  userHash: Uint8Array;
  permissions: Permissions;
  /** /P as stored, feeds the key derivation */
  permissionsRaw: number;
  encryptMetadata: boolean;
  /** Cipher for streams (/StmF with V4) */
  streamAlgorithm: EncryptionAlgorithm;
  /** Cipher for strings (/StrF with V4) */
  stringAlgorithm: EncryptionAlgorithm;
}

const VALID_COMBINATIONS: ReadonlyArray<readonly [Version, Revision]> = [
  [1, 2],
  [2, 3],
  [3, 3],
  [4, 4],
];

function methodAlgorithm(method: CryptFilterMethod): EncryptionAlgorithm {
  switch (method) {
    case "None":
      return "Identity";
    case "V2":
      return "RC4";
    case "AESV2":
      return "AES-128";
    case "AESV3":
      throw new UnsupportedEncryptionError("AES-256 crypt filters (AESV3) are not supported");
  }
}

/**
 * Cipher named by /StmF or /StrF. `Identity` is predefined; any other name
 * must be an entry of /CF.
 */
function filterAlgorithm(dict: PdfDict, key: "StmF" | "StrF"): EncryptionAlgorithm {
  const name = dict.getName(key)?.value ?? "Identity";

  if (name === "Identity") {
    return "Identity";
  }

  const filter = dict.getDict("CF")?.getDict(name);

  if (filter === undefined) {
    throw new EncryptionDictError(`Crypt filter /${name} is not defined in /CF`);
  }

  const cfm = filter.getName("CFM")?.value ?? "None";
  const parsed = CryptFilterMethodSchema.safeParse(cfm);

  if (!parsed.success) {
    throw new EncryptionDictError(`Invalid crypt filter method: ${cfm}`);
  }

  return methodAlgorithm(parsed.data);
}

function requiredHash(dict: PdfDict, key: "O" | "U"): Uint8Array {
  const bytes = dict.getString(key)?.bytes;

  if (bytes === undefined) {
    throw new EncryptionDictError(`Missing /${key} in encryption dictionary`);
  }

  if (bytes.length < 32) {
    throw new EncryptionDictError(`Invalid /${key} length: expected 32 bytes, got ${bytes.length}`);
  }

  // Some writers pad the value
  return bytes.subarray(0, 32);
}

/**
 * Parse and validate an /Encrypt dictionary.
 *
 * @param warnings - receives a note about unusual V/R combinations
 * @throws {EncryptionDictError} if the dictionary is malformed
 * @throws {UnsupportedEncryptionError} for other security handlers and for
 *   AES-256 (V5, R5, R6, AESV3)
 */
export function parseEncryptionDict(dict: PdfDict, warnings: string[] = []): EncryptionDict {
  const filter = dict.getName("Filter")?.value;

  if (filter === undefined) {
    throw new EncryptionDictError("Missing /Filter in encryption dictionary");
  }

  if (filter !== "Standard") {
    throw new UnsupportedEncryptionError(`Unsupported security handler: ${filter}`);
  }

  const rawVersion = dict.getNumber("V")?.value ?? 0;
  const version = VersionSchema.safeParse(rawVersion);

  if (!version.success) {
    throw new EncryptionDictError(`Unsupported encryption version: ${rawVersion}`);
  }

  const rawRevision = dict.getNumber("R")?.value;
  const revision = RevisionSchema.safeParse(rawRevision);

  if (!revision.success) {
    throw new EncryptionDictError(
      rawRevision === undefined
        ? "Missing /R in encryption dictionary"
        : `Unsupported encryption revision: ${rawRevision}`,
    );
  }

  if (version.data === 5 || revision.data >= 5) {
    throw new UnsupportedEncryptionError(
      `AES-256 encryption (V${version.data} R${revision.data}) is not supported`,
    );
  }

  const known = VALID_COMBINATIONS.some(([v, r]) => v === version.data && r === revision.data);

  if (!known) {
    const message = `Unusual V/R combination: V=${version.data}, R=${revision.data}`;

    console.warn(message);
    warnings.push(message);
  }

  // V1 keys are always 40 bits and V4 keys 128
  const keyLengthBits =
    version.data === 1 ? 40 : version.data === 4 ? 128 : (dict.getNumber("Length")?.value ?? 40);

  if (keyLengthBits < 40 || keyLengthBits > 128 || keyLengthBits % 8 !== 0) {
    throw new EncryptionDictError(`Invalid key length: ${keyLengthBits} bits`);
  }

  const permissionsRaw = dict.getNumber("P")?.value;

  if (permissionsRaw === undefined) {
    throw new EncryptionDictError("Missing /P in encryption dictionary");
  }

  let streamAlgorithm: EncryptionAlgorithm = "RC4";
  let stringAlgorithm: EncryptionAlgorithm = "RC4";

  if (version.data === 4) {
    streamAlgorithm = filterAlgorithm(dict, "StmF");
    stringAlgorithm = filterAlgorithm(dict, "StrF");
  }

  return {
    version: version.data,
    revision: revision.data,
    keyLengthBits,
    ownerHash: requiredHash(dict, "O"),
    userHash: requiredHash(dict, "U"),
    permissions: parsePermissions(permissionsRaw),
    permissionsRaw: permissionsRaw | 0,
    encryptMetadata: dict.getBool("EncryptMetadata")?.value ?? true,
    streamAlgorithm,
    stringAlgorithm,
  };
}
