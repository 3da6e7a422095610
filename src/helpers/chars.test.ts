import { describe, expect, it } from "vitest";
import { charClass, hexValue, isRegularChar } from "./chars";

describe("charClass", () => {
  it("classifies the six whitespace bytes", () => {
    expect([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20].map(charClass)).toEqual(Array(6).fill("whitespace"));
  });

  it("classifies the ten delimiters", () => {
    expect([..."()<>[]{}/%"].map(c => charClass(c.charCodeAt(0)))).toEqual(Array(10).fill("delimiter"));
  });

  it("has no class at the end of input", () => {
    expect(charClass(-1)).toBeUndefined();
    expect(isRegularChar(-1)).toBe(false);
    expect(isRegularChar(0x41)).toBe(true);
  });
});

describe("hexValue", () => {
  it("reads both letter cases", () => {
    expect([..."09afAF"].map(c => hexValue(c.charCodeAt(0)))).toEqual([0, 9, 10, 15, 10, 15]);
  });

  it("returns -1 for anything else", () => {
    expect(hexValue(0x67)).toBe(-1);
    expect(hexValue(-1)).toBe(-1);
  });
});
