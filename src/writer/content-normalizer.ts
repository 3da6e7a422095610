import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import { unparseObject } from "#src/objects/unparse";
import { parseContentStream } from "#src/parser/content-stream-parser";

/**
 * Lay out content-stream tokens one space apart, with a newline after
 * every operator: `BT/F1 12 Tf` becomes `BT\n/F1 12 Tf\n`.
 */
export function formatContentTokens(tokens: readonly PdfObject[]): Uint8Array {
  const out = new ByteWriter();
  let lineStart = true;

  for (const token of tokens) {
    if (!lineStart) {
      out.writeAscii(" ");
    }

    if (token.type === "inline-image") {
      out.writeBytes(token.data);
    } else {
      out.writeAscii(unparseObject(token));
    }

    lineStart = token.type === "operator";

    if (lineStart) {
      out.writeAscii("\n");
    }
  }

  return out.toBytes();
}

/**
 * Re-tokenize decoded content and lay it out with {@link formatContentTokens}.
 *
 * @throws {ObjectParseError} if the content cannot be tokenized
 */
export function normalizeContent(content: Uint8Array): Uint8Array {
  return formatContentTokens(parseContentStream(content));
}
