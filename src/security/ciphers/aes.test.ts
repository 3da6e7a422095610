import { describe, expect, it } from "vitest";
import { SecurityError } from "../errors";
import { AES_BLOCK_SIZE, aesDecrypt, aesEncrypt } from "./aes";

const key = new Uint8Array(16).fill(0x42);

describe("AES-128-CBC", () => {
  it("prefixes a random IV and pads to whole blocks", () => {
    const plaintext = new TextEncoder().encode("Hello");
    const first = aesEncrypt(key, plaintext);
    const second = aesEncrypt(key, plaintext);

    expect(first.length).toBe(AES_BLOCK_SIZE * 2);
    expect(first.subarray(0, AES_BLOCK_SIZE)).not.toEqual(second.subarray(0, AES_BLOCK_SIZE));
  });

  it("adds a full padding block to block-aligned input", () => {
    expect(aesEncrypt(key, new Uint8Array(16)).length).toBe(48);
  });

  it("decrypts what it encrypts", () => {
    const plaintext = new TextEncoder().encode("BT /F1 12 Tf (Hi) Tj ET");

    expect(aesDecrypt(key, aesEncrypt(key, plaintext))).toEqual(plaintext);
  });

  it("treats a lone IV as empty data", () => {
    expect(aesDecrypt(key, new Uint8Array(16))).toEqual(new Uint8Array(0));
  });

  it("rejects data that is not whole blocks", () => {
    expect(() => aesDecrypt(key, new Uint8Array(20))).toThrow(SecurityError);
    expect(() => aesDecrypt(key, new Uint8Array(20))).toThrow(
      "AES data must be whole 16-byte blocks, got 20 bytes",
    );
    expect(() => aesDecrypt(key, new Uint8Array(7))).toThrow(SecurityError);
  });
});
