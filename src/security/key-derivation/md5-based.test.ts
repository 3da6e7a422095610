import { describe, expect, it } from "vitest";
import {
  authenticateOwnerPassword,
  authenticateUserPassword,
  computeFileKey,
  computeOwnerHash,
  computeUserHash,
  deriveObjectKey,
  type KeyDerivationParams,
  PASSWORD_PADDING,
  padPassword,
} from "./md5-based";

const bytes = (text: string) => new TextEncoder().encode(text);
const fileId = Uint8Array.from({ length: 16 }, (_, i) => i);

/**
 * Encryption parameters the way a writer produces them.
 */
function setup(revision: number, keyLengthBytes: number, user: string, owner: string) {
  const ownerHash = computeOwnerHash(bytes(owner), bytes(user), revision, keyLengthBytes);
  const params: KeyDerivationParams = {
    revision,
    keyLengthBytes,
    ownerHash,
    permissions: -4,
    fileId,
    encryptMetadata: true,
  };
  const fileKey = computeFileKey(bytes(user), params);

  return { params, fileKey, userHash: computeUserHash(fileKey, fileId, revision) };
}

describe("padPassword", () => {
  it("pads the empty password to the padding string", () => {
    expect(padPassword(new Uint8Array(0))).toEqual(PASSWORD_PADDING);
  });

  it("fills up short passwords", () => {
    const padded = padPassword(bytes("ab"));

    expect(Array.from(padded.subarray(0, 4))).toEqual([0x61, 0x62, 0x28, 0xbf]);
    expect(padded.length).toBe(32);
  });

  it("truncates long passwords", () => {
    const long = bytes("x".repeat(40));

    expect(padPassword(long)).toEqual(long.subarray(0, 32));
  });
});

describe.each([
  [2, 5],
  [3, 16],
  [4, 16],
])("revision %i", (revision, keyLength) => {
  const { params, fileKey, userHash } = setup(revision, keyLength, "user-secret", "owner-secret");

  it("derives a key of the requested length", () => {
    expect(fileKey.length).toBe(keyLength);
  });

  it("accepts the user password", () => {
    expect(authenticateUserPassword(bytes("user-secret"), userHash, params)).toEqual(fileKey);
  });

  it("accepts the owner password", () => {
    expect(authenticateOwnerPassword(bytes("owner-secret"), userHash, params)).toEqual(fileKey);
  });

  it("rejects wrong passwords", () => {
    expect(authenticateUserPassword(bytes("wrong"), userHash, params)).toBeNull();
    expect(authenticateOwnerPassword(bytes("wrong"), userHash, params)).toBeNull();
    expect(authenticateUserPassword(bytes("owner-secret"), userHash, params)).toBeNull();
  });
});

describe("computeUserHash", () => {
  it("zero-fills the second half from revision 3 on", () => {
    const { userHash } = setup(3, 16, "", "owner-secret");

    expect(userHash.length).toBe(32);
    expect(userHash.subarray(16)).toEqual(new Uint8Array(16));
  });

  it("uses the empty owner password as the user password", () => {
    const withEmpty = computeOwnerHash(new Uint8Array(0), bytes("u"), 3, 16);
    const withUser = computeOwnerHash(bytes("u"), bytes("u"), 3, 16);

    expect(withEmpty).toEqual(withUser);
  });
});

describe("computeFileKey", () => {
  it("mixes in unencrypted metadata only from revision 4 on", () => {
    const r3 = setup(3, 16, "", "o").params;
    const r4 = setup(4, 16, "", "o").params;
    const empty = new Uint8Array(0);

    expect(computeFileKey(empty, { ...r3, encryptMetadata: false })).toEqual(computeFileKey(empty, r3));
    expect(computeFileKey(empty, { ...r4, encryptMetadata: false })).not.toEqual(
      computeFileKey(empty, r4),
    );
  });
});

describe("deriveObjectKey", () => {
  it("extends the key by five bytes up to 16", () => {
    expect(deriveObjectKey(new Uint8Array(5), 1, 0, false).length).toBe(10);
    expect(deriveObjectKey(new Uint8Array(16), 1, 0, false).length).toBe(16);
  });

  it("depends on the object, generation and cipher", () => {
    const key = new Uint8Array(16).fill(7);
    const base = deriveObjectKey(key, 12, 0, false);

    expect(deriveObjectKey(key, 13, 0, false)).not.toEqual(base);
    expect(deriveObjectKey(key, 12, 1, false)).not.toEqual(base);
    expect(deriveObjectKey(key, 12, 0, true)).not.toEqual(base);
    expect(deriveObjectKey(key, 12, 0, false)).toEqual(base);
  });
});
