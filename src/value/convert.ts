import { Double, Int32, Long } from "bson";
import { ConversionError } from "../shared/errors.js";
import { WireDocument, type WireElement, type WireField } from "./wire.js";
import {
  Value,
  childPath,
  unsupported,
  type ConversionOptions,
  type MappingValue,
  type SequenceValue,
} from "./value.js";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function encodeElement(value: Value, path: string, options: ConversionOptions): WireElement {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
      return value.value;
    case "int":
      if (value.value >= INT32_MIN && value.value <= INT32_MAX) return new Int32(value.value);
      return Long.fromNumber(value.value);
    case "double":
      return new Double(value.value);
    case "string":
      return value.value;
    case "sequence":
      return encodeSequence(value, path, options);
    case "mapping":
      return encodeMapping(value, path, options);
  }
}

function encodeSequence(value: SequenceValue, path: string, options: ConversionOptions): WireDocument {
  const builder = WireDocument.builder("array");
  value.items.forEach((item, index) => {
    builder.push(encodeElement(item, childPath(path, index), options));
  });
  return builder.finish();
}

function encodeMapping(value: MappingValue, path: string, options: ConversionOptions): WireDocument {
  const builder = WireDocument.builder("document");
  for (const [key, item] of value.entries) {
    builder.append(key, encodeElement(item, childPath(path, key), options));
  }
  return builder.finish();
}

/**
 * Encode a Mapping (or Sequence) into a WireDocument. A scalar at the top level yields an
 * empty document, or ConversionError in strict mode.
 */
export function encode(value: Value, options: ConversionOptions = {}): WireDocument {
  switch (value.kind) {
    case "mapping":
      return encodeMapping(value, "", options);
    case "sequence":
      return encodeSequence(value, "", options);
    default:
      if (options.strict) {
        throw new ConversionError("", `Cannot encode a ${value.kind} value as a document`);
      }
      return WireDocument.empty();
  }
}

function decodeField(field: WireField, path: string, options: ConversionOptions): Value | undefined {
  switch (field.type) {
    case "null":
      return Value.null();
    case "bool":
      return Value.bool(field.value);
    case "int32":
      return Value.int(field.value);
    case "int64":
      if (
        field.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        field.value <= BigInt(Number.MAX_SAFE_INTEGER)
      ) {
        return Value.int(Number(field.value));
      }
      return unsupported(path, "int64 outside the safe integer range", options);
    case "double":
      return Value.double(field.value);
    case "string":
      return Value.string(field.value);
    case "array":
      return decodeSequence(field.value, path, options);
    case "document":
      return decodeComposite(field.value, path, options);
    case "unsupported":
      return unsupported(path, field.bsonType, options);
  }
}

function decodeSequence(doc: WireDocument, path: string, options: ConversionOptions): SequenceValue {
  const items: Value[] = [];
  let index = 0;
  for (const field of doc.entries()) {
    const item = decodeField(field, childPath(path, index), options);
    if (item) items.push(item);
    index++;
  }
  return Value.sequence(items);
}

function decodeComposite(doc: WireDocument, path: string, options: ConversionOptions): Value {
  if (doc.kind === "array" || doc.couldBeArray()) return decodeSequence(doc, path, options);
  const entries: [string, Value][] = [];
  for (const field of doc.entries()) {
    const item = decodeField(field, childPath(path, field.key), options);
    if (item) entries.push([field.key, item]);
  }
  return Value.mapping(entries);
}

/**
 * Decode a WireDocument. Documents whose keys are "0", "1", … decode to a Sequence,
 * everything else to a Mapping.
 */
export function decode(doc: WireDocument, options: ConversionOptions = {}): Value {
  return decodeComposite(doc, "", options);
}
