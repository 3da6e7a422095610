/**
 * PDF string encoding utilities.
 *
 * Text strings in a PDF are either UTF-16BE with a byte order mark, UTF-8
 * with a byte order mark (PDF 2.0) or PDFDocEncoding, a superset of Latin-1
 * that replaces some control and C1 positions with typographic characters.
 */

import { bytesToHex as toHex } from "@noble/hashes/utils.js";
import { ByteWriter } from "#src/io/byte-writer";
import { BACKSLASH, PARENTHESIS_CLOSE, PARENTHESIS_OPEN } from "./chars";
import pdfDocEncoding from "./pdf-doc-encoding.json";

/** Byte -> code point. */
const PDF_DOC_TO_UNICODE: readonly number[] = pdfDocEncoding;

/** Code point -> byte, for every code point PDFDocEncoding can represent. */
const UNICODE_TO_PDF_DOC = new Map<number, number>(
  PDF_DOC_TO_UNICODE.map((codePoint, byte) => [codePoint, byte]),
);

const needsEscape = (byte: number) =>
  byte === BACKSLASH || byte === PARENTHESIS_OPEN || byte === PARENTHESIS_CLOSE;

/**
 * Backslash-escape `\`, `(` and `)` for a literal string. Other bytes pass
 * through; input without any of the three comes back as is.
 */
export function escapeLiteralString(bytes: Uint8Array): Uint8Array {
  if (!bytes.some(needsEscape)) {
    return bytes;
  }

  const out = new ByteWriter({ initialSize: bytes.length + 8 });

  for (const byte of bytes) {
    if (needsEscape(byte)) {
      out.writeByte(BACKSLASH);
    }

    out.writeByte(byte);
  }

  return out.toBytes();
}

/**
 * `bytesToHex(new Uint8Array([0xab, 1]), "upper")` is `"AB01"`.
 */
export function bytesToHex(bytes: Uint8Array, letterCase: "lower" | "upper" = "lower"): string {
  const hex = toHex(bytes);

  return letterCase === "upper" ? hex.toUpperCase() : hex;
}

/**
 * Convert a hex string to bytes.
 *
 * Whitespace is ignored. Odd-length strings are padded with trailing 0.
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s/g, "");
  const padded = clean.length % 2 === 1 ? `${clean}0` : clean;

  const bytes = new Uint8Array(padded.length / 2);

  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

/**
 * Map each byte to the character with the same code (Latin-1).
 */
export function bytesToLatin1(bytes: Uint8Array): string {
  let result = "";

  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }

  return result;
}

/**
 * Inverse of {@link bytesToLatin1}. Characters above U+00FF keep their low
 * byte, so only pass ASCII or Latin-1 text.
 */
export function latin1ToBytes(text: string): Uint8Array {
  return Uint8Array.from(text, char => char.charCodeAt(0) & 0xff);
}

/**
 * Decode PDFDocEncoded bytes.
 */
function decodePdfDocEncoding(bytes: Uint8Array): string {
  let result = "";

  for (const byte of bytes) {
    result += String.fromCodePoint(PDF_DOC_TO_UNICODE[byte] ?? byte);
  }

  return result;
}

/**
 * Encode text as PDFDocEncoding, or return `null` when some character has
 * no PDFDocEncoding byte.
 */
export function encodePdfDocEncoding(text: string): Uint8Array | null {
  const bytes: number[] = [];

  for (const char of text) {
    const byte = UNICODE_TO_PDF_DOC.get(char.codePointAt(0) ?? -1);

    if (byte === undefined) {
      return null;
    }

    bytes.push(byte);
  }

  return new Uint8Array(bytes);
}

/**
 * Encode text as UTF-16BE with a leading byte order mark.
 */
function encodeUtf16BE(text: string): Uint8Array {
  const bytes = new Uint8Array(2 + text.length * 2);

  bytes[0] = 0xfe;
  bytes[1] = 0xff;

  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);

    bytes[2 + i * 2] = unit >> 8;
    bytes[3 + i * 2] = unit & 0xff;
  }

  return bytes;
}

/**
 * Decode a PDF text string: UTF-16BE or UTF-8 when the matching byte order
 * mark is present, PDFDocEncoding otherwise.
 */
export function decodeTextString(bytes: Uint8Array): string {
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    let result = "";

    for (let i = 2; i + 1 < bytes.length; i += 2) {
      result += String.fromCharCode((bytes[i] << 8) | bytes[i + 1]);
    }

    return result;
  }

  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return new TextDecoder("utf-8").decode(bytes.subarray(3));
  }

  return decodePdfDocEncoding(bytes);
}

/**
 * Encode a PDF text string: PDFDocEncoding when every character fits,
 * UTF-16BE with a byte order mark otherwise.
 */
export function encodeTextString(text: string): Uint8Array {
  return encodePdfDocEncoding(text) ?? encodeUtf16BE(text);
}
