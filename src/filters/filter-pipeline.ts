/** biome-ignore-all lint/complexity/noStaticOnlyClass: utility class */

import { DecodeError } from "#src/errors";
import { ASCIIHexFilter } from "./ascii-hex-filter";
import { ASCII85Filter } from "./ascii85-filter";
import { type DecodeLevel, type Filter, type FilterSpec, isLevelAtLeast } from "./filter";
import { FlateFilter } from "./flate-filter";
import { ImageCodecFilter } from "./image-codec-filter";
import { LZWFilter } from "./lzw-filter";
import { RunLengthFilter } from "./run-length-filter";

/**
 * Registry and executor for PDF stream filters.
 *
 * Handles filter chaining - when a stream has multiple filters,
 * they are applied in sequence: first filter's output becomes
 * second filter's input.
 *
 * @example
 * ```typescript
 * // Decode a FlateDecode stream
 * const decoded = FilterPipeline.decode(data, { name: "FlateDecode" });
 *
 * // Decode a chain: first ASCII85, then Flate
 * const decoded = FilterPipeline.decode(data, [
 *   { name: "ASCII85Decode" },
 *   { name: "FlateDecode" },
 * ]);
 * ```
 */
export class FilterPipeline {
  private static filters = new Map<string, Filter>();

  /**
   * Register a filter implementation.
   */
  static register(filter: Filter): void {
    FilterPipeline.filters.set(filter.name, filter);
  }

  static hasFilter(name: string): boolean {
    return FilterPipeline.filters.has(name);
  }

  static getFilter(name: string): Filter | undefined {
    return FilterPipeline.filters.get(name);
  }

  /**
   * Check whether every filter of a chain is known and applied at `level`.
   * An empty chain is decodable at any level.
   */
  static canDecode(filters: FilterSpec[], level: DecodeLevel): boolean {
    if (filters.length === 0) {
      return true;
    }

    if (level === "none") {
      return false;
    }

    return filters.every(spec => {
      const filter = FilterPipeline.filters.get(spec.name);

      return filter !== undefined && isLevelAtLeast(level, filter.level);
    });
  }

  /**
   * Decode data through a whole chain of filters, whatever their level.
   *
   * Filters are applied in order: /Filter [/ASCII85Decode /FlateDecode]
   * means decode ASCII85 first, then decompress with Flate.
   *
   * @throws {DecodeError} if a filter is unknown or fails
   */
  static decode(data: Uint8Array, filters: FilterSpec | FilterSpec[]): Uint8Array {
    const filterList = Array.isArray(filters) ? filters : [filters];

    let result = data;

    for (const spec of filterList) {
      result = FilterPipeline.require(spec.name).decode(result, spec.params);
    }

    return result;
  }

  /**
   * Decode data only as far as `level` allows.
   *
   * Decoding is all or nothing: when a known filter of the chain needs a
   * higher level, the data comes back unchanged.
   *
   * @throws {DecodeError} if a filter is unknown, or the chain is decodable
   *   at this level but a filter fails
   */
  static decodeAtLevel(data: Uint8Array, filters: FilterSpec[], level: DecodeLevel): Uint8Array {
    if (filters.length === 0 || level === "none") {
      return data;
    }

    for (const spec of filters) {
      const filter = FilterPipeline.require(spec.name);

      if (!isLevelAtLeast(level, filter.level)) {
        return data;
      }
    }

    return FilterPipeline.decode(data, filters);
  }

  /**
   * Encode data through a chain of filters.
   *
   * Filters are applied in REVERSE order compared to decoding.
   *
   * @throws {DecodeError} if a filter is unknown or cannot encode
   */
  static encode(data: Uint8Array, filters: FilterSpec | FilterSpec[]): Uint8Array {
    const filterList = Array.isArray(filters) ? filters : [filters];

    let result = data;

    for (const spec of [...filterList].reverse()) {
      const filter = FilterPipeline.require(spec.name);

      if (!filter.encode) {
        throw new DecodeError(spec.name, "Encoding is not supported");
      }

      result = filter.encode(result, spec.params);
    }

    return result;
  }

  /**
   * Clear all registered filters.
   * Mainly useful for testing.
   */
  static clear(): void {
    FilterPipeline.filters.clear();
  }

  /**
   * Restore the built-in filter set.
   */
  static registerDefaults(): void {
    FilterPipeline.register(new FlateFilter());
    FilterPipeline.register(new LZWFilter());
    FilterPipeline.register(new ASCIIHexFilter());
    FilterPipeline.register(new ASCII85Filter());
    FilterPipeline.register(new RunLengthFilter());

    for (const name of ["DCTDecode", "JPXDecode", "CCITTFaxDecode", "JBIG2Decode"]) {
      FilterPipeline.register(new ImageCodecFilter(name));
    }
  }

  private static require(name: string): Filter {
    const filter = FilterPipeline.filters.get(name);

    if (!filter) {
      throw new DecodeError(name, "Unknown filter");
    }

    return filter;
  }
}

FilterPipeline.registerDefaults();
