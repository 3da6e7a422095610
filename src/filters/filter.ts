import type { PdfDict } from "#src/objects/pdf-dict";

/**
 * How far stream data is decoded.
 *
 * - `none`: never decode
 * - `generalized`: general-purpose codecs (Flate, LZW, ASCIIHex, ASCII85)
 * - `specialized`: also the lossless special-purpose RunLength codec
 * - `all`: also image codecs (DCT, JPX, CCITTFax, JBIG2)
 */
export type DecodeLevel = "none" | "generalized" | "specialized" | "all";

export const DECODE_LEVELS: readonly DecodeLevel[] = ["none", "generalized", "specialized", "all"];

/**
 * True when `level` reaches at least `required`.
 */
export function isLevelAtLeast(level: DecodeLevel, required: DecodeLevel): boolean {
  return DECODE_LEVELS.indexOf(level) >= DECODE_LEVELS.indexOf(required);
}

/**
 * One entry of a stream's filter chain.
 */
export interface FilterSpec {
  name: string;
  params?: PdfDict;
}

/**
 * A stream codec.
 *
 * `decode` throws `DecodeError` on corrupt input. Filters without `encode`
 * are decode-only.
 */
export interface Filter {
  readonly name: string;
  /** Lowest decode level at which this filter is applied. */
  readonly level: DecodeLevel;
  decode(data: Uint8Array, params?: PdfDict): Uint8Array;
  encode?(data: Uint8Array, params?: PdfDict): Uint8Array;
}
