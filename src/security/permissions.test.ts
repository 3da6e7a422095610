import { describe, expect, it } from "vitest";
import { DEFAULT_PERMISSIONS, encodePermissions, parsePermissions } from "./permissions";

describe("permissions", () => {
  it("grants everything by default", () => {
    expect(encodePermissions()).toBe(-4);
    expect(parsePermissions(-4)).toEqual(DEFAULT_PERMISSIONS);
  });

  it("clears the bit of a denied permission", () => {
    expect(encodePermissions({ print: false })).toBe(-8);
    expect(encodePermissions({ printHighQuality: false })).toBe(-2052);
  });

  it("denies everything when only the reserved bits are set", () => {
    const parsed = parsePermissions(-3904);

    expect(Object.values(parsed).every(allowed => !allowed)).toBe(true);
  });

  it("reads individual bits", () => {
    // bits 3 (print) and 5 (copy)
    const parsed = parsePermissions(0b10100);

    expect(parsed.print).toBe(true);
    expect(parsed.copy).toBe(true);
    expect(parsed.modify).toBe(false);
    expect(parsed.assemble).toBe(false);
  });

  it("round-trips through /P", () => {
    const permissions = { ...DEFAULT_PERMISSIONS, copy: false, assemble: false };

    expect(parsePermissions(encodePermissions(permissions))).toEqual(permissions);
  });
});
