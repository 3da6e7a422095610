import { deflate, inflate } from "pako";

import { DecodeError } from "#src/errors";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { DecodeLevel, Filter } from "./filter";
import { applyPredictor } from "./predictor";

/**
 * FlateDecode filter - zlib/deflate compression, through pako.
 *
 * Supports Predictor parameter for PNG/TIFF prediction algorithms.
 */
export class FlateFilter implements Filter {
  readonly name = "FlateDecode";
  readonly level: DecodeLevel = "generalized";

  decode(data: Uint8Array, params?: PdfDict): Uint8Array {
    let decompressed: Uint8Array | undefined;

    try {
      // pako.inflate handles the zlib header and checksum
      decompressed = inflate(data);
    } catch (error) {
      // pako throws plain strings as well as Errors
      const reason = error instanceof Error ? error.message : String(error);

      throw new DecodeError(this.name, reason, { cause: error });
    }

    // Truncated input yields no result instead of an error
    if (decompressed === undefined) {
      throw new DecodeError(this.name, "Unexpected end of compressed data");
    }

    if (params) {
      return applyPredictor(decompressed, params, this.name);
    }

    return decompressed;
  }

  encode(data: Uint8Array): Uint8Array {
    return deflate(data);
  }
}
