/**
 * Object registry: the indirect-object storage of one document.
 *
 * Maps each `(object number, generation)` slot to its value. Slots of a
 * parsed file are read through the resolver on first access and cached;
 * slots created afterwards get fresh object numbers.
 */

import type { PdfObject } from "#src/objects/pdf-object";
import { PdfReserved } from "#src/objects/pdf-placeholder";
import { PdfRef, type RefResolver } from "#src/objects/pdf-ref";
import type { XRefEntry } from "#src/parser/xref-parser";

/**
 * Registry for the indirect objects of a document.
 *
 * Responsibilities:
 * - Map refs to objects (loaded and new)
 * - Resolve refs of the parsed file lazily via the resolver callback
 * - Assign sequential object numbers to new objects
 * - Track reserved slots until they are replaced
 * - Collect warnings
 */
export class ObjectRegistry {
  /** Objects read from the file, null for slots that could not be read */
  private loaded = new Map<PdfRef, PdfObject | null>();

  /** Objects created in this session */
  private newObjects = new Map<PdfRef, PdfObject>();

  /** In-use slots listed by the cross-reference data */
  private readonly known: PdfRef[] = [];

  private _nextObjNum: number;

  private resolver: RefResolver | null = null;

  /** Warnings collected during operations */
  readonly warnings: string[];

  /**
   * @param xref - cross-reference entries of a parsed file
   * @param warnings - array to collect warnings in, shared with the parser
   */
  constructor(xref?: Map<number, XRefEntry>, warnings: string[] = []) {
    this.warnings = warnings;

    let maxObjNum = 0;

    for (const [objectNumber, entry] of xref ?? []) {
      maxObjNum = Math.max(maxObjNum, objectNumber);

      if (entry.type === "uncompressed") {
        this.known.push(PdfRef.of(objectNumber, entry.generation));
      } else if (entry.type === "compressed") {
        this.known.push(PdfRef.of(objectNumber, 0));
      }
    }

    // 0 is the head of the free list
    this._nextObjNum = maxObjNum + 1;
  }

  setResolver(resolver: RefResolver): void {
    this.resolver = resolver;
  }

  /**
   * The object number the next new object will get.
   */
  get nextObjectNumber(): number {
    return this._nextObjNum;
  }

  /**
   * Highest object number in use or allocated.
   */
  get maxObjectNumber(): number {
    return this._nextObjNum - 1;
  }

  /**
   * Store a new object under a fresh object number, generation 0.
   */
  register(obj: PdfObject): PdfRef {
    const ref = PdfRef.of(this._nextObjNum++, 0);

    this.newObjects.set(ref, obj);

    return ref;
  }

  /**
   * Allocate a slot holding a {@link PdfReserved} placeholder.
   */
  reserve(): PdfRef {
    return this.register(new PdfReserved());
  }

  /**
   * Fill a reserved slot. Returns false when the slot does not hold a
   * reservation.
   */
  replaceReserved(ref: PdfRef, obj: PdfObject): boolean {
    if (this.resolve(ref)?.type !== "reserved") {
      return false;
    }

    this.loaded.delete(ref);
    this.newObjects.set(ref, obj);

    return true;
  }

  /**
   * Resolve a reference. Objects from the file are read once and cached;
   * null for free, missing and unreadable slots.
   */
  resolve(ref: PdfRef): PdfObject | null {
    const created = this.newObjects.get(ref);

    if (created !== undefined) {
      return created;
    }

    if (this.loaded.has(ref)) {
      return this.loaded.get(ref) ?? null;
    }

    if (this.resolver === null) {
      return null;
    }

    const obj = this.resolver(ref);

    this.loaded.set(ref, obj);

    return obj;
  }

  /**
   * Check whether a slot holds an object, reading it if needed.
   */
  has(ref: PdfRef): boolean {
    return this.resolve(ref) !== null;
  }

  isNew(ref: PdfRef): boolean {
    return this.newObjects.has(ref);
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  /**
   * Every readable slot, file objects first, each group by object number.
   * Reads all file objects that were not accessed yet.
   */
  *entries(): IterableIterator<[PdfRef, PdfObject]> {
    const sorted = [...this.known].sort((a, b) => a.objectNumber - b.objectNumber);

    for (const ref of sorted) {
      if (this.newObjects.has(ref)) {
        continue;
      }

      const obj = this.resolve(ref);

      if (obj !== null) {
        yield [ref, obj];
      }
    }

    yield* this.newObjects;
  }

  /**
   * Drop every object. The registry resolves nothing afterwards.
   */
  clear(): void {
    this.loaded.clear();
    this.newObjects.clear();
    this.known.length = 0;
    this.resolver = null;
  }
}
