import { DecodeError } from "#src/errors";
import type { DecodeLevel, Filter } from "./filter";

/**
 * Placeholder for the image codecs (DCTDecode, JPXDecode, CCITTFaxDecode,
 * JBIG2Decode).
 *
 * The data of such streams is passed through untouched at every level
 * below `all`, which is what registering the name achieves. Actually
 * decoding the image is out of scope.
 */
export class ImageCodecFilter implements Filter {
  readonly level: DecodeLevel = "all";

  constructor(readonly name: string) {}

  decode(_data: Uint8Array): Uint8Array {
    throw new DecodeError(this.name, "Image codec is not supported");
  }
}
