import { concatBytes } from "@noble/hashes/utils.js";
import { latin1ToBytes } from "#src/helpers/strings";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";

/** Objects per generated object stream */
export const MAX_OBJECTS_PER_STREAM = 100;

/**
 * Pack objects into one `/Type /ObjStm` stream.
 *
 * The data starts with `objNum offset` pairs, offsets counted from /First,
 * followed by the objects separated by newlines.
 */
export function buildObjectStream(
  members: ReadonlyArray<readonly [number, PdfObject]>,
  compress: boolean,
): PdfStream {
  const body = new ByteWriter();
  const index: string[] = [];

  for (const [objectNumber, value] of members) {
    index.push(`${objectNumber} ${body.position}`);
    value.toBytes(body);
    body.writeAscii("\n");
  }

  const header = latin1ToBytes(`${index.join(" ")}\n`);
  const data = concatBytes(header, body.toBytes());

  const stream = PdfStream.fromDict({
    Type: PdfName.of("ObjStm"),
    N: PdfNumber.of(members.length),
    First: PdfNumber.of(header.length),
  });

  if (compress) {
    stream.setRawData(FilterPipeline.encode(data, { name: "FlateDecode" }));
    stream.dict.set("Filter", PdfName.of("FlateDecode"));
  } else {
    stream.setRawData(data);
  }

  return stream;
}

/**
 * Split a list into chunks of at most {@link MAX_OBJECTS_PER_STREAM}.
 */
export function chunkForObjectStreams<T>(items: readonly T[]): T[][] {
  const chunks: T[][] = [];

  for (let i = 0; i < items.length; i += MAX_OBJECTS_PER_STREAM) {
    chunks.push(items.slice(i, i + MAX_OBJECTS_PER_STREAM));
  }

  return chunks;
}
