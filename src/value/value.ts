import { ConversionError } from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";

const valueBrand: unique symbol = Symbol("docbridge.value");

interface Tagged {
  readonly [valueBrand]: true;
}

export interface NullValue extends Tagged {
  readonly kind: "null";
}

export interface BoolValue extends Tagged {
  readonly kind: "bool";
  readonly value: boolean;
}

export interface IntValue extends Tagged {
  readonly kind: "int";
  readonly value: number;
}

export interface DoubleValue extends Tagged {
  readonly kind: "double";
  readonly value: number;
}

export interface StringValue extends Tagged {
  readonly kind: "string";
  readonly value: string;
}

export interface SequenceValue extends Tagged {
  readonly kind: "sequence";
  readonly items: readonly Value[];
}

export interface MappingValue extends Tagged {
  readonly kind: "mapping";
  readonly entries: ReadonlyMap<string, Value>;
}

/** Dynamic value used at the API boundary, independent of the wire format. */
export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | DoubleValue
  | StringValue
  | SequenceValue
  | MappingValue;

export type ValueKind = Value["kind"];

/**
 * Document-shaped input: a plain object, or a tagged mapping (or sequence, for legacy
 * callers). Fields that fromPlain cannot convert follow the unsupported-type policy.
 */
export type DocumentInput = Value | { readonly [key: string]: unknown };

export interface ConversionOptions {
  /** Fail with ConversionError on unsupported data instead of dropping it. */
  strict?: boolean;
}

const NULL: NullValue = Object.freeze({ [valueBrand]: true, kind: "null" } as const);

export const Value = {
  null(): NullValue {
    return NULL;
  },

  bool(value: boolean): BoolValue {
    return Object.freeze({ [valueBrand]: true, kind: "bool", value } as const);
  },

  int(value: number): IntValue {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`Int value must be a safe integer, got ${value}`);
    }
    return Object.freeze({ [valueBrand]: true, kind: "int", value } as const);
  },

  double(value: number): DoubleValue {
    return Object.freeze({ [valueBrand]: true, kind: "double", value } as const);
  },

  string(value: string): StringValue {
    return Object.freeze({ [valueBrand]: true, kind: "string", value } as const);
  },

  sequence(items: Iterable<Value>): SequenceValue {
    return Object.freeze({
      [valueBrand]: true,
      kind: "sequence",
      items: Object.freeze([...items]),
    } as const);
  },

  /** Later duplicates of a key replace earlier ones; the first position is kept. */
  mapping(entries: Iterable<readonly [string, Value]>): MappingValue {
    const map: ReadonlyMap<string, Value> = new Map(entries);
    return Object.freeze({ [valueBrand]: true, kind: "mapping", entries: map } as const);
  },
};

export function isValue(input: unknown): input is Value {
  return typeof input === "object" && input !== null && valueBrand in input;
}

function isPlainObject(input: object): input is { readonly [key: string]: unknown } {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

function describeType(input: unknown): string {
  if (input === null) return "null";
  if (typeof input !== "object") return typeof input;
  const ctor: unknown = input.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}

/**
 * Report an unsupported element. Strict mode throws; lenient mode logs and returns undefined
 * so the caller drops the element.
 */
export function unsupported(path: string, what: string, options: ConversionOptions): undefined {
  if (options.strict) throw new ConversionError(path, `Unsupported ${what}`);
  getLogger().debug({ path, type: what }, "dropping unsupported value");
  return undefined;
}

export function childPath(parent: string, key: string | number): string {
  if (typeof key === "number") return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
}

function convertPlain(input: unknown, path: string, options: ConversionOptions): Value | undefined {
  if (isValue(input)) return input;
  if (input === null) return NULL;
  switch (typeof input) {
    case "boolean":
      return Value.bool(input);
    case "number":
      return Number.isSafeInteger(input) ? Value.int(input) : Value.double(input);
    case "string":
      return Value.string(input);
    case "object":
      break;
    default:
      return unsupported(path, typeof input, options);
  }

  if (Array.isArray(input)) {
    const items: Value[] = [];
    input.forEach((item: unknown, index) => {
      const converted = convertPlain(item, childPath(path, index), options);
      if (converted) items.push(converted);
    });
    return Value.sequence(items);
  }
  if (!isPlainObject(input)) return unsupported(path, describeType(input), options);

  const entries: [string, Value][] = [];
  for (const [key, item] of Object.entries(input)) {
    const converted = convertPlain(item, childPath(path, key), options);
    if (converted) entries.push([key, converted]);
  }
  return Value.mapping(entries);
}

/**
 * Convert plain JavaScript data into a Value. Safe integers become Int, every other number
 * Double. Unsupported input (undefined, functions, Date and other class instances) is
 * dropped, or rejected in strict mode; at the top level a dropped input yields Null.
 */
export function fromPlain(input: unknown, options: ConversionOptions = {}): Value {
  return convertPlain(input, "", options) ?? NULL;
}

export type PlainOutput =
  | null
  | boolean
  | number
  | string
  | PlainOutput[]
  | { [key: string]: PlainOutput };

export function toPlain(value: Value): PlainOutput {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "int":
    case "double":
    case "string":
      return value.value;
    case "sequence":
      return value.items.map(toPlain);
    case "mapping": {
      const out: { [key: string]: PlainOutput } = {};
      for (const [key, item] of value.entries) out[key] = toPlain(item);
      return out;
    }
  }
}

/** Semantic equality: per-tag scalars, ordered sequences, key-order-insensitive mappings. */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "double":
      return b.kind === "double" && Object.is(a.value, b.value);
    case "sequence":
      return (
        b.kind === "sequence" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case "mapping": {
      if (b.kind !== "mapping" || a.entries.size !== b.entries.size) return false;
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (!other || !valuesEqual(item, other)) return false;
      }
      return true;
    }
  }
}
