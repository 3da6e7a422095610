import type { DecodeLevel, Filter } from "./filter";

/**
 * RunLengthDecode filter.
 *
 * A length byte `n` is followed by:
 * - 0-127: `n + 1` literal bytes
 * - 129-255: one byte, repeated `257 - n` times
 * - 128: end of data
 */
export class RunLengthFilter implements Filter {
  readonly name = "RunLengthDecode";
  readonly level: DecodeLevel = "specialized";

  private static readonly EOD = 128;

  decode(data: Uint8Array): Uint8Array {
    const result: number[] = [];
    let i = 0;

    while (i < data.length) {
      const length = data[i++];

      if (length === RunLengthFilter.EOD) {
        break;
      }

      if (length < RunLengthFilter.EOD) {
        // Truncated literal runs keep what is there
        const end = Math.min(i + length + 1, data.length);

        for (; i < end; i++) {
          result.push(data[i]);
        }

        continue;
      }

      if (i >= data.length) {
        break;
      }

      const byte = data[i++];

      for (let n = 0; n < 257 - length; n++) {
        result.push(byte);
      }
    }

    return new Uint8Array(result);
  }

  encode(data: Uint8Array): Uint8Array {
    const result: number[] = [];
    let i = 0;

    while (i < data.length) {
      let run = 1;

      while (i + run < data.length && run < 128 && data[i + run] === data[i]) {
        run++;
      }

      if (run > 1) {
        result.push(257 - run, data[i]);
        i += run;
        continue;
      }

      // Literal run: up to the next repeat
      const start = i;

      while (
        i < data.length &&
        i - start < 128 &&
        !(i + 1 < data.length && data[i + 1] === data[i])
      ) {
        i++;
      }

      if (i === start) {
        i++;
      }

      result.push(i - start - 1, ...data.subarray(start, i));
    }

    result.push(RunLengthFilter.EOD);

    return new Uint8Array(result);
  }
}
