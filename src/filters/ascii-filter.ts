import { DecodeError } from "#src/errors";
import { isWhitespace } from "#src/helpers/chars";
import { ByteWriter } from "#src/io/byte-writer";
import type { DecodeLevel, Filter } from "./filter";

/**
 * Decode loop shared by the ASCII text codecs.
 *
 * Whitespace is skipped and the text ends at the end-of-data marker, or at
 * the end of input when the marker is missing or cut short. Every other
 * byte goes to `digit` along with a per-call state, so filter instances can
 * be shared by the pipeline.
 */
export abstract class AsciiFilter<State> implements Filter {
  abstract readonly name: string;
  readonly level: DecodeLevel = "generalized";

  /** End-of-data marker, e.g. `~>` */
  protected abstract readonly eod: string;

  protected abstract createState(): State;

  /**
   * Consume one significant byte. `offset` is its index in the input, for
   * error messages.
   */
  protected abstract digit(state: State, byte: number, offset: number, out: ByteWriter): void;

  /** Write what is left of an incomplete group. */
  protected abstract flush(state: State, out: ByteWriter): void;

  abstract encode(data: Uint8Array): Uint8Array;

  decode(data: Uint8Array): Uint8Array {
    const out = new ByteWriter();
    const state = this.createState();

    for (let i = 0; i < data.length; i++) {
      const byte = data[i];

      if (isWhitespace(byte)) {
        continue;
      }

      if (this.isAtEod(data, i)) {
        break;
      }

      this.digit(state, byte, i, out);
    }

    this.flush(state, out);

    return out.toBytes();
  }

  protected fail(message: string, offset: number): never {
    throw new DecodeError(this.name, `${message} at offset ${offset}`);
  }

  private isAtEod(data: Uint8Array, offset: number): boolean {
    for (let k = 0; k < this.eod.length && offset + k < data.length; k++) {
      if (data[offset + k] !== this.eod.charCodeAt(k)) {
        return false;
      }
    }

    return true;
  }
}
