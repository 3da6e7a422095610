import { DecodeError } from "#src/errors";
import { BitReader } from "#src/io/bit-reader";
import { ByteWriter } from "#src/io/byte-writer";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { DecodeLevel, Filter } from "./filter";
import { applyPredictor } from "./predictor";

const CLEAR_TABLE = 256;
const END_OF_DATA = 257;
const FIRST_ENTRY = 258;
const MAX_CODES = 4096;
const MAX_WIDTH = 12;

/**
 * LZWDecode, with 9 to 12 bit codes. /EarlyChange 1 (the default) widens
 * codes one entry before the table needs it.
 *
 * Table entries above 255 are stored as a prefix code plus a final byte;
 * decoding a code walks the prefixes back to a single byte.
 *
 * Decode-only: the writer compresses with Flate.
 */
export class LZWFilter implements Filter {
  readonly name = "LZWDecode";
  readonly level: DecodeLevel = "generalized";

  decode(data: Uint8Array, params?: PdfDict): Uint8Array {
    const earlyChange = params?.getNumber("EarlyChange")?.value === 0 ? 0 : 1;
    const decoded = this.expand(new BitReader(data), earlyChange);

    return params ? applyPredictor(decoded, params, this.name) : decoded;
  }

  private expand(codes: BitReader, earlyChange: number): Uint8Array {
    const prefix = new Int16Array(MAX_CODES).fill(-1);
    const suffix = new Uint8Array(MAX_CODES);
    const lengths = new Uint16Array(MAX_CODES);
    const entry = new Uint8Array(MAX_CODES);
    const out = new ByteWriter();

    for (let code = 0; code < 256; code++) {
      suffix[code] = code;
      lengths[code] = 1;
    }

    // Spell `code` into `entry`, returning its length
    const spell = (code: number): number => {
      const length = lengths[code];

      for (let i = length - 1, c = code; i >= 0; i--, c = prefix[c]) {
        entry[i] = suffix[c];
      }

      return length;
    };

    let next = FIRST_ENTRY;
    let width = 9;
    let previous = -1;

    while (true) {
      const code = codes.readBits(width);

      // Data that ends without an EOD code keeps what was decoded
      if (code === null || code === END_OF_DATA) {
        break;
      }

      if (code === CLEAR_TABLE) {
        next = FIRST_ENTRY;
        width = 9;
        previous = -1;
        continue;
      }

      let length: number;

      if (code < next && (code < 256 || code >= FIRST_ENTRY)) {
        length = spell(code);
      } else if (code === next && previous !== -1) {
        // The entry being defined: the previous one plus its own first byte
        length = spell(previous);
        entry[length++] = entry[0];
      } else {
        throw new DecodeError(this.name, `Invalid code ${code}`);
      }

      out.writeBytes(entry.subarray(0, length));

      if (previous !== -1 && next < MAX_CODES) {
        prefix[next] = previous;
        suffix[next] = entry[0];
        lengths[next] = lengths[previous] + 1;
        next++;

        if (next + earlyChange >= 2 ** width && width < MAX_WIDTH) {
          width++;
        }
      }

      previous = code;
    }

    return out.toBytes();
  }
}
