/**
 * Creating the /Encrypt dictionary and file key for a document being
 * written with encryption.
 */

import { encodePdfDocEncoding } from "#src/helpers/strings";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfString } from "#src/objects/pdf-string";
import { parseEncryptionDict } from "./encryption-dict";
import {
  computeFileKey,
  computeOwnerHash,
  computeUserHash,
} from "./key-derivation/md5-based";
import { encodePermissions } from "./permissions";
import type { ResolvedEncryptOptions, WriteEncryptionAlgorithm } from "./schemas";
import { StandardSecurityHandler } from "./standard-handler";

interface AlgorithmParameters {
  version: 1 | 2 | 4;
  revision: 2 | 3 | 4;
  keyLengthBits: number;
}

const ALGORITHMS: Record<WriteEncryptionAlgorithm, AlgorithmParameters> = {
  "RC4-40": { version: 1, revision: 2, keyLengthBits: 40 },
  "RC4-128": { version: 2, revision: 3, keyLengthBits: 128 },
  "AES-128": { version: 4, revision: 4, keyLengthBits: 128 },
};

export interface EncryptionSetup {
  /** Goes into the trailer as /Encrypt */
  dict: PdfDict;
  handler: StandardSecurityHandler;
}

function passwordBytes(password: string): Uint8Array {
  return encodePdfDocEncoding(password) ?? new TextEncoder().encode(password);
}

/**
 * @param fileId - first element of the /ID the file will be written with
 */
export function setupEncryption(options: ResolvedEncryptOptions, fileId: Uint8Array): EncryptionSetup {
  const { version, revision, keyLengthBits } = ALGORITHMS[options.algorithm];
  const keyLengthBytes = keyLengthBits / 8;
  const userPassword = passwordBytes(options.userPassword);
  const ownerPassword = passwordBytes(options.ownerPassword ?? options.userPassword);
  const permissions = encodePermissions(options.permissions);
  const encryptMetadata = revision < 4 || options.encryptMetadata;

  const ownerHash = computeOwnerHash(ownerPassword, userPassword, revision, keyLengthBytes);
  const fileKey = computeFileKey(userPassword, {
    revision,
    keyLengthBytes,
    ownerHash,
    permissions,
    fileId,
    encryptMetadata,
  });
  const userHash = computeUserHash(fileKey, fileId, revision);

  const dict = PdfDict.of({
    Filter: PdfName.of("Standard"),
    V: PdfNumber.integer(version),
    R: PdfNumber.integer(revision),
    Length: PdfNumber.integer(keyLengthBits),
    O: new PdfString(ownerHash, "hex"),
    U: new PdfString(userHash, "hex"),
    P: PdfNumber.integer(permissions),
  });

  if (version === 4) {
    dict.set(
      "CF",
      PdfDict.of({
        StdCF: PdfDict.of({
          Type: PdfName.of("CryptFilter"),
          CFM: PdfName.of("AESV2"),
          AuthEvent: PdfName.of("DocOpen"),
          Length: PdfNumber.integer(keyLengthBytes),
        }),
      }),
    );
    dict.set("StmF", PdfName.of("StdCF"));
    dict.set("StrF", PdfName.of("StdCF"));

    if (!encryptMetadata) {
      dict.set("EncryptMetadata", PdfBool.of(false));
    }
  }

  // Read back through the parser so writing and reading agree on the
  // parameters
  const handler = new StandardSecurityHandler(parseEncryptionDict(dict), fileKey, "owner");

  return { dict, handler };
}
