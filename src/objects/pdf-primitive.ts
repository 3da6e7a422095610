/**
 * Interface shared by every value class of the object graph.
 *
 * Each class knows its own serialized form (`toBytes`, used by the writer)
 * and how to deep-copy itself (`clone`, used when a direct value is stored
 * in a second place). References are the only values `clone` returns as is.
 */

import type { ByteWriter } from "#src/io/byte-writer";

export interface PdfPrimitive {
  /**
   * The type discriminator for this object.
   */
  readonly type: string;

  /**
   * Write this object's PDF byte representation to the given ByteWriter.
   * Called recursively for nested objects.
   */
  toBytes(writer: ByteWriter): void;

  clone(): PdfPrimitive;
}
