import { describe, expect, it } from "vitest";
import { bytesToString, stringToBytes } from "#src/test-utils";
import { ASCIIHexFilter } from "./ascii-hex-filter";

describe("ASCIIHexFilter", () => {
  const filter = new ASCIIHexFilter();

  it("decodes pairs, skipping whitespace", () => {
    expect(bytesToString(filter.decode(stringToBytes("48 65\n6c 6C6F>")))).toBe("Hello");
  });

  it("pads an odd final digit with zero", () => {
    expect([...filter.decode(stringToBytes("7>"))]).toEqual([0x70]);
  });

  it("ignores everything after the terminator", () => {
    expect([...filter.decode(stringToBytes("41>zz"))]).toEqual([0x41]);
  });

  it("accepts data without a terminator", () => {
    expect([...filter.decode(stringToBytes("4142"))]).toEqual([0x41, 0x42]);
  });

  it("reports the offset of an invalid digit", () => {
    expect(() => filter.decode(stringToBytes("41 4g>"))).toThrow(
      "ASCIIHexDecode: Invalid hex digit 0x67 at offset 4",
    );
  });

  it("encodes as upper case hex with a terminator", () => {
    expect(bytesToString(filter.encode(new Uint8Array([0x00, 0xab, 0x10])))).toBe("00AB10>");
  });
});
