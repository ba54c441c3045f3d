import { Double, Int32, Long, deserialize, onDemand, serialize, type Document } from "bson";

export type WireKind = "document" | "array";

/** Values the builder accepts: the BSON types the converter writes. */
export type WireElement = null | boolean | string | Int32 | Long | Double | WireDocument;

/** One element read back from a WireDocument, typed by its wire tag. */
export type WireField =
  | { key: string; type: "null"; value: null }
  | { key: string; type: "bool"; value: boolean }
  | { key: string; type: "int32"; value: number }
  | { key: string; type: "int64"; value: bigint }
  | { key: string; type: "double"; value: number }
  | { key: string; type: "string"; value: string }
  | { key: string; type: "document" | "array"; value: WireDocument }
  | { key: string; type: "unsupported"; value: unknown; bsonType: string };

// Fields live in a Map: a plain object would move integer-like keys to the front.
type Fields = Map<string, unknown>;
type Tree =
  | { readonly kind: "document"; readonly fields: Fields }
  | { readonly kind: "array"; readonly items: readonly unknown[] };

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const BSON_DOCUMENT = 0x03;
const BSON_ARRAY = 0x04;

const utf8 = new TextDecoder();

function isPlainObject(value: object): value is { [key: string]: unknown } {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Copy plain objects, Maps and arrays into the internal tree (BSON leaves are shared). */
function snapshotValue(value: unknown): unknown {
  if (typeof value !== "object" || value === null) return value;
  if (Array.isArray(value)) return Object.freeze(value.map(snapshotValue));
  if (value instanceof Map) {
    const fields: Fields = new Map();
    for (const [key, item] of value) fields.set(String(key), snapshotValue(item));
    return fields;
  }
  if (isPlainObject(value)) return snapshotFields(value);
  return value;
}

function snapshotFields(source: { [key: string]: unknown }): Fields {
  const fields: Fields = new Map();
  for (const [key, item] of Object.entries(source)) fields.set(key, snapshotValue(item));
  return fields;
}

/**
 * Rebuild a deserialized document with the field order of its bytes. `start` is the offset
 * of the document's length prefix.
 */
function orderedFields(source: { [key: string]: unknown }, bytes: Uint8Array, start: number): Fields {
  const fields: Fields = new Map();
  for (const [type, nameOffset, nameLength, offset] of onDemand.parseToElements(bytes, start)) {
    const key = utf8.decode(bytes.subarray(nameOffset, nameOffset + nameLength));
    fields.set(key, orderedValue(source[key], type, bytes, offset));
  }
  return fields;
}

function orderedValue(value: unknown, type: number, bytes: Uint8Array, offset: number): unknown {
  if (type === BSON_DOCUMENT && typeof value === "object" && value !== null && isPlainObject(value)) {
    return orderedFields(value, bytes, offset);
  }
  if (type === BSON_ARRAY && Array.isArray(value)) {
    const items: unknown[] = [];
    for (const [itemType, , , itemOffset] of onDemand.parseToElements(bytes, offset)) {
      items.push(orderedValue(value[items.length], itemType, bytes, itemOffset));
    }
    return Object.freeze(items);
  }
  return value;
}

function toPlainTree(value: unknown): unknown {
  if (value instanceof Map) {
    const out: Document = {};
    for (const [key, item] of value) out[String(key)] = toPlainTree(item);
    return out;
  }
  if (Array.isArray(value)) return value.map(toPlainTree);
  return value;
}

function bsonTypeName(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null && "_bsontype" in value) {
    const tag: unknown = value._bsontype;
    if (typeof tag === "string") return tag;
  }
  return typeof value;
}

function readField(key: string, value: unknown): WireField {
  if (value === null) return { key, type: "null", value: null };
  switch (typeof value) {
    case "boolean":
      return { key, type: "bool", value };
    case "string":
      return { key, type: "string", value };
    case "bigint":
      return { key, type: "int64", value };
    case "number":
      // promoted values (e.g. documents handed over by a JavaScript driver)
      if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
        return { key, type: "int32", value };
      }
      return { key, type: "double", value };
    default:
      break;
  }
  if (value instanceof Int32) return { key, type: "int32", value: value.value };
  if (value instanceof Double) return { key, type: "double", value: value.value };
  if (value instanceof Long) return { key, type: "int64", value: value.toBigInt() };
  if (Array.isArray(value)) {
    return { key, type: "array", value: new WireDocument({ kind: "array", items: value }) };
  }
  if (value instanceof Map) {
    return { key, type: "document", value: new WireDocument({ kind: "document", fields: value }) };
  }
  return { key, type: "unsupported", value, bsonType: bsonTypeName(value) };
}

/**
 * Immutable BSON document or array. Built through WireDocumentBuilder, or read from BSON
 * bytes / a BSON Document tree handed back by a driver. Field order is kept as written.
 */
export class WireDocument {
  /** @internal use the builder or the static factories */
  constructor(private readonly tree: Tree) {}

  static builder(kind: WireKind = "document"): WireDocumentBuilder {
    return new WireDocumentBuilder(kind);
  }

  static empty(): WireDocument {
    return new WireDocument({ kind: "document", fields: new Map() });
  }

  static fromBytes(bytes: Uint8Array): WireDocument {
    const document: Document = deserialize(bytes, {
      promoteValues: false,
      promoteLongs: false,
      promoteBuffers: false,
      bsonRegExp: true,
    });
    return new WireDocument({ kind: "document", fields: orderedFields(document, bytes, 0) });
  }

  /**
   * Snapshot a driver's document. A plain object yields its keys in JavaScript property
   * order; pass a Map (at any depth) to keep integer-like keys where they are.
   */
  static fromDocument(document: Document): WireDocument {
    const fields = snapshotValue(document);
    return new WireDocument({
      kind: "document",
      fields: fields instanceof Map ? fields : new Map(),
    });
  }

  get kind(): WireKind {
    return this.tree.kind;
  }

  get size(): number {
    const tree = this.tree;
    return tree.kind === "array" ? tree.items.length : tree.fields.size;
  }

  *entries(): IterableIterator<WireField> {
    const tree = this.tree;
    if (tree.kind === "array") {
      for (let i = 0; i < tree.items.length; i++) yield readField(String(i), tree.items[i]);
      return;
    }
    for (const [key, value] of tree.fields) yield readField(key, value);
  }

  get(key: string): WireField | undefined {
    const tree = this.tree;
    if (tree.kind === "array") {
      const index = Number(key);
      if (!Number.isInteger(index) || String(index) !== key) return undefined;
      if (index < 0 || index >= tree.items.length) return undefined;
      return readField(key, tree.items[index]);
    }
    if (!tree.fields.has(key)) return undefined;
    return readField(key, tree.fields.get(key));
  }

  /** True when the keys are exactly "0", "1", … in stored order. Empty documents are not arrays. */
  couldBeArray(): boolean {
    const tree = this.tree;
    if (tree.kind === "array") return tree.items.length > 0;
    let index = 0;
    for (const key of tree.fields.keys()) {
      if (key !== String(index)) return false;
      index++;
    }
    return index > 0;
  }

  /** The tree as a plain BSON Document; arrays are keyed "0", "1", … at the top level. */
  toDocument(): Document {
    const tree = this.tree;
    const out: Document = {};
    if (tree.kind === "array") {
      tree.items.forEach((item, index) => {
        out[String(index)] = toPlainTree(item);
      });
    } else {
      for (const [key, value] of tree.fields) out[key] = toPlainTree(value);
    }
    return out;
  }

  toBytes(): Uint8Array {
    const tree = this.tree;
    if (tree.kind === "document") return serialize(tree.fields);
    const fields: Fields = new Map();
    tree.items.forEach((item, index) => fields.set(String(index), item));
    return serialize(fields);
  }

  /** @internal the stored tree, for embedding into a parent builder */
  get raw(): unknown {
    const tree = this.tree;
    return tree.kind === "array" ? tree.items : tree.fields;
  }
}

/** One-pass builder: append fields (documents) or elements (arrays), then finish. */
export class WireDocumentBuilder {
  private readonly fields: Fields = new Map();
  private readonly items: unknown[] = [];
  private finished = false;

  constructor(readonly kind: WireKind = "document") {}

  append(key: string, element: WireElement): this {
    this.assertOpen();
    if (this.kind !== "document") throw new Error("append() requires a document builder");
    this.fields.set(key, element instanceof WireDocument ? element.raw : element);
    return this;
  }

  push(element: WireElement): this {
    this.assertOpen();
    if (this.kind !== "array") throw new Error("push() requires an array builder");
    this.items.push(element instanceof WireDocument ? element.raw : element);
    return this;
  }

  finish(): WireDocument {
    this.assertOpen();
    this.finished = true;
    if (this.kind === "array") {
      return new WireDocument({ kind: "array", items: Object.freeze(this.items) });
    }
    return new WireDocument({ kind: "document", fields: this.fields });
  }

  private assertOpen(): void {
    if (this.finished) throw new Error("WireDocumentBuilder already finished");
  }
}
