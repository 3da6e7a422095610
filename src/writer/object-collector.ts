/**
 * Choosing and renumbering the objects a full rewrite writes.
 *
 * Objects are collected depth first from the trailer, so the output is
 * numbered 1..n in the order objects are first reached. Everything else
 * (cross-reference streams, object streams, the old encryption dictionary,
 * unreachable objects) is dropped unless asked for.
 */

import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNull } from "#src/objects/pdf-null";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef, type RefResolver } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";

/**
 * Trailer keys that describe the file being read rather than the document.
 * The writer produces its own values (or none) for them.
 */
export const FILE_STRUCTURE_KEYS: ReadonlySet<string> = new Set([
  "Size",
  "Prev",
  "XRefStm",
  "Encrypt",
  "ID",
  // Present when the trailer is an xref stream dictionary
  "Type",
  "W",
  "Index",
  "Length",
  "Filter",
  "DecodeParms",
]);

const STREAM_SKIP_KEYS: ReadonlySet<string> = new Set(["Length"]);

/**
 * References held by a value, in order. Stream /Length is skipped: the
 * writer recomputes it.
 */
export function directRefs(value: PdfObject, skipKeys?: ReadonlySet<string>): PdfRef[] {
  const refs: PdfRef[] = [];

  const walk = (item: PdfObject, skip?: ReadonlySet<string>): void => {
    switch (item.type) {
      case "ref":
        refs.push(item);
        break;

      case "array":
        for (const child of item) {
          walk(child);
        }
        break;

      case "dict":
        for (const [key, child] of item) {
          if (!skip?.has(key)) {
            walk(child);
          }
        }
        break;

      case "stream":
        walk(item.dict, STREAM_SKIP_KEYS);
        break;
    }
  };

  walk(value, skipKeys);

  return refs;
}

/**
 * Depth-first collector. `visit` may be called repeatedly; every slot is
 * listed once, in the order it was first reached.
 */
export class ObjectCollector {
  readonly order: PdfRef[] = [];

  private readonly seen = new Set<PdfRef>();
  private readonly collected = new Set<PdfRef>();

  constructor(
    private readonly resolve: RefResolver,
    /** Slots never written, even when referenced */
    private readonly exclude: (ref: PdfRef, value: PdfObject) => boolean = () => false,
  ) {}

  /**
   * Collect everything reachable from a value.
   */
  visitValue(value: PdfObject, skipKeys?: ReadonlySet<string>): void {
    const stack = directRefs(value, skipKeys).reverse();

    while (stack.length > 0) {
      const ref = stack.pop();

      if (ref === undefined || this.seen.has(ref)) {
        continue;
      }

      this.seen.add(ref);

      const target = this.resolve(ref);

      // Dangling references are written as null
      if (target === null || this.exclude(ref, target)) {
        continue;
      }

      this.order.push(ref);
      this.collected.add(ref);
      stack.push(...directRefs(target).reverse());
    }
  }

  visit(ref: PdfRef): void {
    this.visitValue(ref);
  }

  has(ref: PdfRef): boolean {
    return this.collected.has(ref);
  }
}

/**
 * Deep copy of `value` with every reference replaced through `numbers`.
 * References without a new number become null. Stream data is shared, not
 * copied.
 */
export function renumber(value: PdfObject, numbers: ReadonlyMap<PdfRef, PdfRef>): PdfObject {
  switch (value.type) {
    case "ref":
      return numbers.get(value) ?? new PdfNull();

    case "array":
      return new PdfArray(value.toArray().map(item => renumber(item, numbers)));

    case "dict":
      return renumberDict(value, numbers);

    case "stream":
      return new PdfStream(renumberDict(value.dict, numbers), value.data);

    default:
      return value.clone();
  }
}

function renumberDict(dict: PdfDict, numbers: ReadonlyMap<PdfRef, PdfRef>): PdfDict {
  const result = new PdfDict();

  for (const [key, item] of dict) {
    result.set(key, renumber(item, numbers));
  }

  return result;
}

/**
 * Number collected slots 1..n in order, generation 0.
 */
export function sequentialNumbers(order: readonly PdfRef[], first = 1): Map<PdfRef, PdfRef> {
  const numbers = new Map<PdfRef, PdfRef>();

  order.forEach((ref, i) => {
    numbers.set(ref, PdfRef.of(first + i, 0));
  });

  return numbers;
}
