import { CHAR_HASH, charClass } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Delimiters and # are written as #xx, as is anything outside printable
// ASCII (33-126)
function needsEscape(byte: number): boolean {
  return byte < 33 || byte > 126 || byte === CHAR_HASH || charClass(byte) !== "regular";
}

/**
 * Escape a PDF name (without its leading slash) for serialization.
 */
export function escapeName(name: string): string {
  const bytes = new TextEncoder().encode(name);

  let result = "";

  for (const byte of bytes) {
    if (needsEscape(byte)) {
      result += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

/**
 * Strip the leading slash from a name key, if present: `"/Type"` and
 * `"Type"` both name the key `Type`.
 */
export function normalizeNameKey(key: string): string {
  return key.startsWith("/") ? key.slice(1) : key;
}

/**
 * PDF name object.
 *
 * In PDF: `/Type`, `/Page`, `/Length`
 *
 * `value` does NOT include the leading `/`.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  constructor(readonly value: string) {}

  /**
   * Create a name; a leading `/` is accepted and dropped.
   */
  static of(name: string): PdfName {
    return new PdfName(normalizeNameKey(name));
  }

  clone(): PdfName {
    return new PdfName(this.value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`/${escapeName(this.value)}`);
  }
}
