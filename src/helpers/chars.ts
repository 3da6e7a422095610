/**
 * Byte values and character classes of PDF syntax (ISO 32000-1, 7.2.2).
 */

export const TAB = 0x09;
export const LF = 0x0a;
export const FF = 0x0c;
export const CR = 0x0d;
export const SPACE = 0x20;

export const CHAR_HASH = 0x23; // #
export const PERCENT = 0x25; // %
export const PARENTHESIS_OPEN = 0x28; // (
export const PARENTHESIS_CLOSE = 0x29; // )
export const CHAR_PLUS = 0x2b; // +
export const CHAR_MINUS = 0x2d; // -
export const CHAR_PERIOD = 0x2e; // .
export const SLASH = 0x2f; // /
export const DIGIT_0 = 0x30;
export const DIGIT_9 = 0x39;
export const ANGLE_BRACKET_OPEN = 0x3c; // <
export const ANGLE_BRACKET_CLOSE = 0x3e; // >
export const SQUARE_BRACKET_OPEN = 0x5b; // [
export const BACKSLASH = 0x5c; // \
export const SQUARE_BRACKET_CLOSE = 0x5d; // ]

/** Keeps the low byte of a value. */
export const SINGLE_BYTE_MASK = 0xff;

export type CharClass = "regular" | "whitespace" | "delimiter";

const CHAR_CLASSES: CharClass[] = Array.from({ length: 256 }, () => "regular");

for (const byte of [0x00, TAB, LF, FF, CR, SPACE]) {
  CHAR_CLASSES[byte] = "whitespace";
}

for (const char of "()<>[]{}/%") {
  CHAR_CLASSES[char.charCodeAt(0)] = "delimiter";
}

// -1 marks a nibble that is not a hex digit
const HEX_VALUES = new Int8Array(256).fill(-1);

for (let nibble = 0; nibble < 16; nibble++) {
  HEX_VALUES["0123456789abcdef".charCodeAt(nibble)] = nibble;
  HEX_VALUES["0123456789ABCDEF".charCodeAt(nibble)] = nibble;
}

/**
 * Class of a byte, or undefined for -1 (end of input).
 */
export function charClass(byte: number): CharClass | undefined {
  return byte >= 0 && byte < 256 ? CHAR_CLASSES[byte] : undefined;
}

export function isWhitespace(byte: number): boolean {
  return charClass(byte) === "whitespace";
}

export function isDelimiter(byte: number): boolean {
  return charClass(byte) === "delimiter";
}

/**
 * Neither whitespace nor a delimiter. False at the end of input.
 */
export function isRegularChar(byte: number): boolean {
  return charClass(byte) === "regular";
}

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_9;
}

/**
 * Value of a hex digit (0-15), or -1.
 */
export function hexValue(byte: number): number {
  return byte >= 0 && byte < 256 ? HEX_VALUES[byte] : -1;
}

export function isHexDigit(byte: number): boolean {
  return hexValue(byte) !== -1;
}
