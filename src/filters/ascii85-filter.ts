import { SINGLE_BYTE_MASK } from "#src/helpers/chars";
import { ByteWriter } from "#src/io/byte-writer";
import { AsciiFilter } from "./ascii-filter";

const FIRST_DIGIT = 0x21; // !
const LAST_DIGIT = 0x75; // u
const ZERO_GROUP = 0x7a; // z

interface Base85State {
  value: number;
  count: number;
}

/**
 * Write the top `count` bytes of a 32-bit group, most significant first.
 */
function writeGroup(out: ByteWriter, value: number, count: number): void {
  for (let i = 0; i < count; i++) {
    out.writeByte(Math.floor(value / 2 ** (24 - i * 8)) & SINGLE_BYTE_MASK);
  }
}

/**
 * ASCII85Decode: five base-85 digits (`!` to `u`) per four bytes, `z` for
 * a group of zeros, terminated by `~>`.
 */
export class ASCII85Filter extends AsciiFilter<Base85State> {
  readonly name = "ASCII85Decode";
  protected readonly eod = "~>";

  protected createState(): Base85State {
    return { value: 0, count: 0 };
  }

  protected digit(state: Base85State, byte: number, offset: number, out: ByteWriter): void {
    if (byte === ZERO_GROUP) {
      if (state.count !== 0) {
        this.fail("'z' inside a group", offset);
      }

      writeGroup(out, 0, 4);

      return;
    }

    if (byte < FIRST_DIGIT || byte > LAST_DIGIT) {
      this.fail(`Invalid character 0x${byte.toString(16)}`, offset);
    }

    state.value = state.value * 85 + (byte - FIRST_DIGIT);
    state.count++;

    if (state.count < 5) {
      return;
    }

    if (state.value > 0xffffffff) {
      this.fail("Group exceeds 32 bits", offset);
    }

    writeGroup(out, state.value, 4);
    state.value = 0;
    state.count = 0;
  }

  // A final group of n digits is padded with `u` and yields n - 1 bytes.
  // A single leftover digit carries no data.
  protected flush(state: Base85State, out: ByteWriter): void {
    if (state.count < 2) {
      return;
    }

    let value = state.value;

    for (let i = state.count; i < 5; i++) {
      value = value * 85 + (LAST_DIGIT - FIRST_DIGIT);
    }

    writeGroup(out, value, state.count - 1);
  }

  encode(data: Uint8Array): Uint8Array {
    const out = new ByteWriter();
    const digits = new Uint8Array(5);

    for (let i = 0; i < data.length; i += 4) {
      const group = data.subarray(i, i + 4);
      let value = 0;

      for (let k = 0; k < 4; k++) {
        value = value * 256 + (k < group.length ? group[k] : 0);
      }

      if (value === 0 && group.length === 4) {
        out.writeByte(ZERO_GROUP);
        continue;
      }

      for (let k = 4; k >= 0; k--) {
        digits[k] = (value % 85) + FIRST_DIGIT;
        value = Math.floor(value / 85);
      }

      out.writeBytes(digits.subarray(0, group.length + 1));
    }

    out.writeAscii(this.eod);

    return out.toBytes();
  }
}
