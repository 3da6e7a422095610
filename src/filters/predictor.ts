import { DecodeError } from "#src/errors";
import type { PdfDict } from "#src/objects/pdf-dict";

/**
 * Row geometry from a filter's /DecodeParms.
 */
export interface PredictorParams {
  /** 1: none, 2: TIFF, 10-15: PNG */
  predictor: number;
  bytesPerPixel: number;
  bytesPerRow: number;
  bitsPerComponent: number;
}

export function readPredictorParams(params: PdfDict): PredictorParams {
  const predictor = params.getNumber("Predictor")?.value ?? 1;
  const columns = params.getNumber("Columns")?.value ?? 1;
  const colors = params.getNumber("Colors")?.value ?? 1;
  const bitsPerComponent = params.getNumber("BitsPerComponent")?.value ?? 8;

  return {
    predictor,
    bytesPerPixel: Math.max(1, Math.floor((colors * bitsPerComponent + 7) / 8)),
    bytesPerRow: Math.floor((columns * colors * bitsPerComponent + 7) / 8),
    bitsPerComponent,
  };
}

/**
 * Reverse the predictor named in a filter's parameters.
 *
 * Predictors are used in PDF streams (images, xref streams) to improve
 * compression by encoding differences between neighbouring bytes rather
 * than absolute values.
 *
 * @param data - Decompressed data with prediction applied
 * @param params - Filter parameters containing predictor settings
 * @param filterName - Filter reported in errors
 * @returns Data with prediction reversed
 */
export function applyPredictor(data: Uint8Array, params: PdfDict, filterName: string): Uint8Array {
  const geometry = readPredictorParams(params);

  if (geometry.predictor === 1) {
    return data;
  }

  if (geometry.bytesPerRow <= 0) {
    throw new DecodeError(filterName, "Predictor row width must be positive");
  }

  if (geometry.predictor === 2) {
    return decodeTiffPredictor(data, geometry);
  }

  if (geometry.predictor >= 10 && geometry.predictor <= 15) {
    return decodePngPredictor(data, geometry.bytesPerRow, geometry.bytesPerPixel);
  }

  throw new DecodeError(filterName, `Unknown predictor value: ${geometry.predictor}`);
}

/**
 * Apply the PNG Up predictor (every row tagged with filter type 2). Used
 * for xref stream data, whose rows differ little from one to the next.
 */
export function encodePngUp(data: Uint8Array, bytesPerRow: number): Uint8Array {
  const rows = Math.ceil(data.length / bytesPerRow);
  const output = new Uint8Array(rows * (bytesPerRow + 1));

  for (let row = 0; row < rows; row++) {
    const out = row * (bytesPerRow + 1);

    output[out] = 2;

    for (let col = 0; col < bytesPerRow; col++) {
      const pos = row * bytesPerRow + col;
      const current = data[pos] ?? 0;
      const above = row > 0 ? data[pos - bytesPerRow] : 0;

      output[out + 1 + col] = (current - above) & 0xff;
    }
  }

  return output;
}

/**
 * TIFF Predictor 2 (horizontal differencing): each sample is stored as the
 * difference from the previous sample in the same row.
 */
function decodeTiffPredictor(data: Uint8Array, geometry: PredictorParams): Uint8Array {
  const { bytesPerRow, bytesPerPixel, bitsPerComponent } = geometry;
  const rows = Math.floor(data.length / bytesPerRow);
  const output = new Uint8Array(data.length);

  for (let row = 0; row < rows; row++) {
    const rowStart = row * bytesPerRow;

    if (bitsPerComponent === 16) {
      for (let col = 0; col < bytesPerRow; col += 2) {
        const pos = rowStart + col;

        if (col < bytesPerPixel) {
          output[pos] = data[pos];
          output[pos + 1] = data[pos + 1];
          continue;
        }

        const prev = (output[pos - bytesPerPixel] << 8) | output[pos - bytesPerPixel + 1];
        const curr = (data[pos] << 8) | data[pos + 1];
        const sum = (prev + curr) & 0xffff;

        output[pos] = sum >> 8;
        output[pos + 1] = sum & 0xff;
      }

      continue;
    }

    // 8-bit components; smaller depths are treated the same way
    for (let col = 0; col < bytesPerRow; col++) {
      const pos = rowStart + col;

      output[pos] = col < bytesPerPixel ? data[pos] : (data[pos] + output[pos - bytesPerPixel]) & 0xff;
    }
  }

  return output;
}

/**
 * PNG predictors: each row starts with a filter type byte.
 *
 * - 0: None
 * - 1: Sub (add left)
 * - 2: Up (add above)
 * - 3: Average (add mean of left and above)
 * - 4: Paeth (add whichever of left, above, upper-left is closest)
 *
 * Unknown row types are copied as None.
 */
function decodePngPredictor(data: Uint8Array, bytesPerRow: number, bytesPerPixel: number): Uint8Array {
  const inputRowSize = bytesPerRow + 1;
  const rows = Math.floor(data.length / inputRowSize);
  const output = new Uint8Array(rows * bytesPerRow);

  let prevRow = new Uint8Array(bytesPerRow);

  for (let row = 0; row < rows; row++) {
    const inputOffset = row * inputRowSize;
    const filterType = data[inputOffset];
    const input = data.subarray(inputOffset + 1, inputOffset + 1 + bytesPerRow);
    const out = output.subarray(row * bytesPerRow, (row + 1) * bytesPerRow);

    for (let i = 0; i < bytesPerRow; i++) {
      const left = i >= bytesPerPixel ? out[i - bytesPerPixel] : 0;
      const up = prevRow[i];
      const upLeft = i >= bytesPerPixel ? prevRow[i - bytesPerPixel] : 0;

      let predicted: number;

      switch (filterType) {
        case 1:
          predicted = left;
          break;
        case 2:
          predicted = up;
          break;
        case 3:
          predicted = Math.floor((left + up) / 2);
          break;
        case 4:
          predicted = paethPredictor(left, up, upLeft);
          break;
        default:
          predicted = 0;
      }

      out[i] = (input[i] + predicted) & 0xff;
    }

    prevRow = out;
  }

  return output;
}

/**
 * Returns the value (a, b, or c) that is closest to p = a + b - c.
 * Ties prefer a, then b.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);

  if (pa <= pb && pa <= pc) {
    return a;
  }

  if (pb <= pc) {
    return b;
  }

  return c;
}
