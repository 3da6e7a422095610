import { ForeignHandleError, TypeMismatchError } from "#src/errors";
import { decodeTextString } from "#src/helpers/strings";
import { PdfNull } from "#src/objects/pdf-null";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfUninitialized } from "#src/objects/pdf-placeholder";
import type { PdfRef } from "#src/objects/pdf-ref";
import { type UnparseMode, unparseObject } from "#src/objects/unparse";
import type { PDFContext } from "./pdf-context";
import type { PDFDocument } from "./pdf-document";

/**
 * Type tag of a handle's target.
 */
export type ObjectType =
  | "uninitialized"
  | "reserved"
  | "null"
  | "boolean"
  | "integer"
  | "real"
  | "string"
  | "name"
  | "array"
  | "dictionary"
  | "stream"
  | "operator"
  | "inline-image";

/**
 * The storage slot a handle points at: an entry of the document's object
 * table, or a node held directly inside some container.
 */
export type HandleTarget =
  | { kind: "indirect"; ref: PdfRef }
  | { kind: "direct"; node: PdfObject | PdfUninitialized };

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;

// Stands in for the value of a slot that no longer (or never) existed
const DANGLING = new PdfNull();

// Ordering keys for direct nodes, assigned on first comparison
const nodeOrder = new WeakMap<object, number>();
let nextNodeOrder = 1;

function orderOf(node: object): number {
  let order = nodeOrder.get(node);

  if (order === undefined) {
    order = nextNodeOrder++;
    nodeOrder.set(node, order);
  }

  return order;
}

function typeOf(value: PdfObject | PdfUninitialized): ObjectType {
  switch (value.type) {
    case "bool":
      return "boolean";
    case "number":
      return value.isInteger() ? "integer" : "real";
    case "dict":
      return "dictionary";
    case "ref":
      // Slots never hold bare references
      return "null";
    default:
      return value.type;
  }
}

/**
 * A reference to one node of a document's object graph.
 *
 * Handles are cheap views: they hold the document context and the slot, and
 * read the value on every call. Mutating the value behind an indirect
 * handle is visible through every handle of the same slot.
 *
 * @example
 * ```typescript
 * const doc = PDFDocument.empty();
 * const n = doc.newInteger(42);
 *
 * n.getType(); // "integer"
 * n.asInteger(); // 42
 * n.makeIndirect().toString(); // "3 0 R"
 * ```
 */
export class PDFHandle {
  /**
   * @internal Use the document's constructors and accessors.
   */
  constructor(
    readonly context: PDFContext,
    readonly target: HandleTarget,
  ) {}

  /**
   * The current value of the slot. A dangling reference reads as null.
   *
   * @internal
   */
  value(): PdfObject | PdfUninitialized {
    this.context.assertOpen();

    if (this.target.kind === "direct") {
      return this.target.node;
    }

    return this.context.registry.resolve(this.target.ref) ?? DANGLING;
  }

  /**
   * The value as a graph node.
   *
   * @internal
   * @throws {TypeMismatchError} for uninitialized handles
   */
  node(): PdfObject {
    const value = this.value();

    if (value instanceof PdfUninitialized) {
      throw new TypeMismatchError("an initialized object", "uninitialized");
    }

    return value;
  }

  getDocument(): PDFDocument {
    this.context.assertOpen();

    return this.context.document;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Type queries
  // ─────────────────────────────────────────────────────────────────────────────

  getType(): ObjectType {
    return typeOf(this.value());
  }

  isBool(): boolean {
    return this.getType() === "boolean";
  }

  isInteger(): boolean {
    return this.getType() === "integer";
  }

  isReal(): boolean {
    return this.getType() === "real";
  }

  isNumber(): boolean {
    const type = this.getType();

    return type === "integer" || type === "real";
  }

  isName(): boolean {
    return this.getType() === "name";
  }

  isString(): boolean {
    return this.getType() === "string";
  }

  isArray(): boolean {
    return this.getType() === "array";
  }

  isDictionary(): boolean {
    return this.getType() === "dictionary";
  }

  isStream(): boolean {
    return this.getType() === "stream";
  }

  isNull(): boolean {
    return this.getType() === "null";
  }

  isOperator(): boolean {
    return this.getType() === "operator";
  }

  isInlineImage(): boolean {
    return this.getType() === "inline-image";
  }

  isReserved(): boolean {
    return this.getType() === "reserved";
  }

  isInitialized(): boolean {
    return this.getType() !== "uninitialized";
  }

  /**
   * True for booleans, numbers, strings and names.
   */
  isScalar(): boolean {
    switch (this.getType()) {
      case "boolean":
      case "integer":
      case "real":
      case "string":
      case "name":
        return true;
      default:
        return false;
    }
  }

  isIndirect(): boolean {
    this.context.assertOpen();

    return this.target.kind === "indirect";
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Identity
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Object number of an indirect handle, 0 for direct ones.
   */
  getObjectNumber(): number {
    this.context.assertOpen();

    return this.target.kind === "indirect" ? this.target.ref.objectNumber : 0;
  }

  getId(): number {
    return this.getObjectNumber();
  }

  /**
   * Generation of an indirect handle, 0 for direct ones.
   */
  getGeneration(): number {
    this.context.assertOpen();

    return this.target.kind === "indirect" ? this.target.ref.generation : 0;
  }

  /**
   * True when both handles point at the same slot.
   */
  equals(other: PDFHandle): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Total order over slots, consistent with {@link equals}: by document,
   * indirect before direct, then by object number and generation.
   */
  compare(other: PDFHandle): number {
    if (this.context !== other.context) {
      return this.context.serial - other.context.serial;
    }

    const a = this.target;
    const b = other.target;

    if (a.kind === "indirect") {
      if (b.kind !== "indirect") {
        return -1;
      }

      return a.ref.objectNumber - b.ref.objectNumber || a.ref.generation - b.ref.generation;
    }

    if (b.kind === "indirect") {
      return 1;
    }

    return orderOf(a.node) - orderOf(b.node);
  }

  /**
   * An indirect handle returns a handle to the same slot. A direct handle
   * returns a deep copy of its node; indirect children stay references.
   */
  clone(): PDFHandle {
    const value = this.value();

    if (this.target.kind === "indirect") {
      return new PDFHandle(this.context, this.target);
    }

    const copy = value instanceof PdfUninitialized ? new PdfUninitialized() : value.clone();

    return new PDFHandle(this.context, { kind: "direct", node: copy });
  }

  /**
   * Store a copy of this value as a new indirect object (next unused object
   * number, generation 0) and return a handle to it. Already indirect
   * handles return a handle to their own slot.
   *
   * @throws {TypeMismatchError} for uninitialized handles
   */
  makeIndirect(): PDFHandle {
    const node = this.node();

    if (this.target.kind === "indirect") {
      return new PDFHandle(this.context, this.target);
    }

    const ref = this.context.register(node.clone());

    return new PDFHandle(this.context, { kind: "indirect", ref });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Scalar accessors
  // ─────────────────────────────────────────────────────────────────────────────

  asBool(): boolean {
    const value = this.value();

    if (value.type !== "bool") {
      throw this.mismatch("boolean");
    }

    return value.value;
  }

  /**
   * Integer value. Integers beyond 2^53 lose precision; use
   * {@link asBigInt} for those.
   */
  asInteger(): number {
    const value = this.value();

    if (value.type !== "number" || !value.isInteger()) {
      throw this.mismatch("integer");
    }

    return value.value;
  }

  /**
   * Exact integer value, also beyond 2^53.
   */
  asBigInt(): bigint {
    const value = this.value();

    if (value.type !== "number" || !value.isInteger()) {
      throw this.mismatch("integer");
    }

    return value.toBigInt();
  }

  /**
   * Integer value clamped to the signed 32-bit range. Clamping records a
   * warning on the document.
   */
  asInt32(): number {
    const value = this.asInteger();

    if (value < INT32_MIN || value > INT32_MAX) {
      const clamped = value < INT32_MIN ? INT32_MIN : INT32_MAX;

      this.context.addWarning(`Integer ${value} does not fit in 32 bits, using ${clamped}`);

      return clamped;
    }

    return value;
  }

  /**
   * Decimal text of a real, or of an integer.
   */
  asReal(): string {
    const value = this.value();

    if (value.type !== "number") {
      throw this.mismatch("real");
    }

    return value.text;
  }

  /**
   * Numeric value of an integer or real.
   */
  asNumber(): number {
    const value = this.value();

    if (value.type !== "number") {
      throw this.mismatch("number");
    }

    return value.value;
  }

  /**
   * Name with its leading slash, e.g. `"/Type"`.
   */
  asName(): string {
    const value = this.value();

    if (value.type !== "name") {
      throw this.mismatch("name");
    }

    return `/${value.value}`;
  }

  /**
   * Text of a string: UTF-16BE or UTF-8 when it starts with the matching
   * byte order mark, PDFDocEncoding otherwise.
   */
  asString(): string {
    return decodeTextString(this.asBinaryString());
  }

  /**
   * The string's raw bytes.
   */
  asBinaryString(): Uint8Array {
    const value = this.value();

    if (value.type !== "string") {
      throw this.mismatch("string");
    }

    return value.bytes;
  }

  /**
   * Keyword of a content-stream operator.
   */
  asOperator(): string {
    const value = this.value();

    if (value.type !== "operator") {
      throw this.mismatch("operator");
    }

    return value.value;
  }

  /**
   * Raw data of an inline image.
   */
  asInlineImage(): Uint8Array {
    const value = this.value();

    if (value.type !== "inline-image") {
      throw this.mismatch("inline-image");
    }

    return value.data;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Printing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Printable PDF syntax. Indirect handles print as their reference,
   * `"12 0 R"`.
   *
   * @throws {TypeMismatchError} for uninitialized handles
   */
  toString(): string {
    return this.unparse("display");
  }

  /**
   * Like {@link toString}, with every string written as lowercase hex.
   */
  toBinary(): string {
    return this.unparse("binary");
  }

  private unparse(mode: UnparseMode): string {
    const node = this.node();

    if (this.target.kind === "indirect") {
      return this.target.ref.toString();
    }

    return unparseObject(node, mode);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Helpers for views
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Handle for a value read out of a container: references become indirect
   * handles, anything else a direct handle on the very node.
   */
  protected child(value: PdfObject): PDFHandle {
    if (value.type === "ref") {
      return new PDFHandle(this.context, { kind: "indirect", ref: value });
    }

    return new PDFHandle(this.context, { kind: "direct", node: value });
  }

  /**
   * What a container stores for `handle`: its reference when indirect, a
   * deep copy of its node when direct. Streams cannot be direct objects, so
   * a direct stream is copied into a new indirect object and referenced.
   *
   * @throws {DocumentClosedError} if either document is closed
   * @throws {ForeignHandleError} if `handle` belongs to another document
   * @throws {TypeMismatchError} if `handle` is uninitialized
   */
  protected storable(handle: PDFHandle): PdfObject {
    this.context.assertOpen();
    handle.context.assertOpen();

    if (handle.context !== this.context) {
      throw new ForeignHandleError();
    }

    const node = handle.node();

    if (handle.target.kind === "indirect") {
      return handle.target.ref;
    }

    if (node.type === "stream") {
      return this.context.register(node.clone());
    }

    return node.clone();
  }

  protected mismatch(expected: string): TypeMismatchError {
    return new TypeMismatchError(expected, this.getType());
  }
}
