/**
 * User access permissions, the /P entry of the encryption dictionary.
 *
 * /P is a signed 32-bit integer; a set bit allows the action.
 *
 * @see ISO 32000-1, Table 22
 */

export interface Permissions {
  print: boolean;
  /** Without it only a degraded print is allowed (R3+) */
  printHighQuality: boolean;
  modify: boolean;
  copy: boolean;
  annotate: boolean;
  fillForms: boolean;
  accessibility: boolean;
  /** Insert, rotate and delete pages */
  assemble: boolean;
}

/** 1-based bit number of each permission */
export const PERMISSION_BITS: Readonly<Record<keyof Permissions, number>> = {
  print: 3,
  modify: 4,
  copy: 5,
  annotate: 6,
  fillForms: 9,
  accessibility: 10,
  assemble: 11,
  printHighQuality: 12,
};

const PERMISSION_KEYS: readonly (keyof Permissions)[] = [
  "print",
  "printHighQuality",
  "modify",
  "copy",
  "annotate",
  "fillForms",
  "accessibility",
  "assemble",
];

export const DEFAULT_PERMISSIONS: Readonly<Permissions> = {
  print: true,
  printHighQuality: true,
  modify: true,
  copy: true,
  annotate: true,
  fillForms: true,
  accessibility: true,
  assemble: true,
};

// Bits 7 and 8 and everything from 13 up are set, 1 and 2 are clear
const RESERVED_BITS = 0xffff_f0c0;

function isSet(p: number, bit: number): boolean {
  return (p & (1 << (bit - 1))) !== 0;
}

export function parsePermissions(p: number): Permissions {
  const result: Permissions = { ...DEFAULT_PERMISSIONS };

  for (const key of PERMISSION_KEYS) {
    result[key] = isSet(p, PERMISSION_BITS[key]);
  }

  return result;
}

/**
 * Build a /P value. Permissions left out are granted.
 */
export function encodePermissions(permissions: Partial<Permissions> = {}): number {
  const merged: Permissions = { ...DEFAULT_PERMISSIONS, ...permissions };
  let p = RESERVED_BITS;

  for (const key of PERMISSION_KEYS) {
    if (merged[key]) {
      p |= 1 << (PERMISSION_BITS[key] - 1);
    }
  }

  return p | 0;
}
