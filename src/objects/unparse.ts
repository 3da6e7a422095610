/**
 * Human-readable PDF syntax for objects.
 *
 * Unlike `toBytes()`, which produces file syntax, this produces a compact
 * single-line form: `[ 1 2 3 ]`, `<< /A 1 /B 2 >>`. Strings are written as
 * literals unless they look binary; in `"binary"` mode every string is
 * written as lowercase hex.
 */

import { bytesToHex, bytesToLatin1 } from "#src/helpers/strings";
import { escapeName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

export type UnparseMode = "display" | "binary";

const LITERAL_ESCAPES = new Map<number, string>([
  [0x0a, "\\n"],
  [0x0d, "\\r"],
  [0x09, "\\t"],
  [0x08, "\\b"],
  [0x0c, "\\f"],
  [0x28, "\\("],
  [0x29, "\\)"],
  [0x5c, "\\\\"],
]);

/**
 * Decide whether string bytes print better as hex: any control character
 * other than the five with a named escape, or more than 20% of the bytes
 * outside ASCII.
 */
export function shouldUseHex(bytes: Uint8Array): boolean {
  let nonAscii = 0;

  for (const byte of bytes) {
    if (byte > 126) {
      nonAscii++;
    } else if (byte < 32 && !LITERAL_ESCAPES.has(byte)) {
      return true;
    }
  }

  return nonAscii * 5 > bytes.length;
}

/**
 * Literal string body with every non-printable byte escaped, so the result
 * is plain ASCII.
 */
export function escapeLiteralForDisplay(bytes: Uint8Array): string {
  let result = "";

  for (const byte of bytes) {
    const named = LITERAL_ESCAPES.get(byte);

    if (named !== undefined) {
      result += named;
    } else if (byte < 32 || byte > 126) {
      result += `\\${byte.toString(8).padStart(3, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

export function unparseString(bytes: Uint8Array, mode: UnparseMode): string {
  if (mode === "binary" || shouldUseHex(bytes)) {
    return `<${bytesToHex(bytes)}>`;
  }

  return `(${escapeLiteralForDisplay(bytes)})`;
}

export function unparseObject(obj: PdfObject, mode: UnparseMode = "display"): string {
  switch (obj.type) {
    case "null":
    case "reserved":
      return "null";
    case "bool":
      return obj.value ? "true" : "false";
    case "number":
      return obj.text;
    case "name":
      return `/${escapeName(obj.value)}`;
    case "string":
      return unparseString(obj.bytes, mode);
    case "ref":
      return obj.toString();
    case "array": {
      let result = "[ ";

      for (const item of obj) {
        result += `${unparseObject(item, mode)} `;
      }

      return `${result}]`;
    }
    case "dict": {
      let result = "<< ";

      for (const [key, value] of obj) {
        result += `/${escapeName(key)} ${unparseObject(value, mode)} `;
      }

      return `${result}>>`;
    }
    case "stream":
      return unparseObject(obj.dict, mode);
    case "operator":
      return obj.value;
    case "inline-image":
      return bytesToLatin1(obj.data);
  }
}
