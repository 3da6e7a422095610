import { hexValue } from "#src/helpers/chars";
import { bytesToHex } from "#src/helpers/strings";
import { ByteWriter } from "#src/io/byte-writer";
import { AsciiFilter } from "./ascii-filter";

interface HexState {
  /** First nibble of an unfinished pair, or -1 */
  high: number;
}

/**
 * ASCIIHexDecode: two hex digits per byte, terminated by `>`.
 */
export class ASCIIHexFilter extends AsciiFilter<HexState> {
  readonly name = "ASCIIHexDecode";
  protected readonly eod = ">";

  protected createState(): HexState {
    return { high: -1 };
  }

  protected digit(state: HexState, byte: number, offset: number, out: ByteWriter): void {
    const nibble = hexValue(byte);

    if (nibble === -1) {
      this.fail(`Invalid hex digit 0x${byte.toString(16)}`, offset);
    }

    if (state.high === -1) {
      state.high = nibble;

      return;
    }

    out.writeByte((state.high << 4) | nibble);
    state.high = -1;
  }

  // An odd final digit is followed by an implied 0
  protected flush(state: HexState, out: ByteWriter): void {
    if (state.high !== -1) {
      out.writeByte(state.high << 4);
    }
  }

  encode(data: Uint8Array): Uint8Array {
    const out = new ByteWriter();

    out.writeAscii(bytesToHex(data, "upper"));
    out.writeAscii(this.eod);

    return out.toBytes();
  }
}
