import { describe, it, expect } from "vitest";
import { Long, ObjectId } from "bson";
import { decode, encode } from "../../src/value/convert.js";
import { Value, fromPlain, toPlain, valuesEqual } from "../../src/value/value.js";
import { WireDocument } from "../../src/value/wire.js";

describe("encode", () => {
  it("writes each kind with its wire type", () => {
    const doc = encode(
      Value.mapping([
        ["none", Value.null()],
        ["flag", Value.bool(true)],
        ["count", Value.int(7)],
        ["ratio", Value.double(2)],
        ["name", Value.string("ada")],
        ["tags", Value.sequence([Value.string("a")])],
        ["address", Value.mapping([["city", Value.string("Oslo")]])],
      ]),
    );
    expect([...doc.entries()].map((field) => [field.key, field.type])).toEqual([
      ["none", "null"],
      ["flag", "bool"],
      ["count", "int32"],
      ["ratio", "double"],
      ["name", "string"],
      ["tags", "array"],
      ["address", "document"],
    ]);
  });

  it("widens ints beyond 32 bits to int64", () => {
    const doc = encode(fromPlain({ big: 2 ** 40, small: -5 }));
    expect(doc.get("big")).toEqual({ key: "big", type: "int64", value: 1099511627776n });
    expect(doc.get("small")).toEqual({ key: "small", type: "int32", value: -5 });
  });

  it("encodes a top-level sequence as an array", () => {
    const doc = encode(fromPlain(["a", "b"]));
    expect(doc.kind).toBe("array");
    expect(doc.size).toBe(2);
  });

  it("turns a top-level scalar into an empty document", () => {
    const doc = encode(Value.string("lonely"));
    expect(doc.kind).toBe("document");
    expect(doc.size).toBe(0);
  });

  it("rejects a top-level scalar in strict mode", () => {
    expect(() => encode(Value.int(1), { strict: true })).toThrow(
      "Cannot encode a int value as a document",
    );
  });
});

describe("decode", () => {
  it("round-trips mappings through BSON bytes", () => {
    const samples = [
      fromPlain({ name: "ada", age: 36, ratio: 0.25, admin: false, boss: null }),
      fromPlain({ tags: ["x", "y"], empty: [], nested: { deep: { n: 1 } }, blank: {} }),
      Value.mapping([["whole", Value.double(3)], ["big", Value.int(-(2 ** 45))]]),
    ];
    for (const value of samples) {
      expect(valuesEqual(decode(encode(value)), value)).toBe(true);
      const fromBytes = WireDocument.fromBytes(encode(value).toBytes());
      expect(valuesEqual(decode(fromBytes), value)).toBe(true);
    }
  });

  it("decodes documents keyed 0..n-1 as sequences", () => {
    const value = decode(WireDocument.fromDocument({ "0": "a", "1": "b" }));
    expect(value.kind).toBe("sequence");
    expect(toPlain(value)).toEqual(["a", "b"]);

    const nested = decode(WireDocument.fromDocument({ pair: { "0": 1, "1": 2 } }));
    expect(toPlain(nested)).toEqual({ pair: [1, 2] });
  });

  it("decodes an empty document as an empty mapping", () => {
    const value = decode(WireDocument.empty());
    expect(value.kind).toBe("mapping");
    expect(toPlain(value)).toEqual({});
  });

  it("maps promoted numbers to int and double", () => {
    const value = decode(WireDocument.fromDocument({ n: 3, x: 3.5 }));
    expect(value.kind === "mapping" && value.entries.get("n")?.kind).toBe("int");
    expect(value.kind === "mapping" && value.entries.get("x")?.kind).toBe("double");
  });

  it("narrows int64 values that fit into a safe integer", () => {
    const value = decode(WireDocument.fromDocument({ big: Long.fromNumber(2 ** 40) }));
    expect(toPlain(value)).toEqual({ big: 1099511627776 });
  });

  it("drops unsupported elements in lenient mode", () => {
    const doc = WireDocument.fromDocument({
      a: 1,
      _id: new ObjectId("64b7f0c2a1b2c3d4e5f60718"),
      when: new Date(0),
      huge: Long.fromString("9007199254740993"),
      list: ["keep", new ObjectId("64b7f0c2a1b2c3d4e5f60719")],
    });
    expect(toPlain(decode(doc))).toEqual({ a: 1, list: ["keep"] });
  });

  it("fails on the first unsupported element in strict mode", () => {
    const doc = WireDocument.fromDocument({ a: 1, _id: new ObjectId("64b7f0c2a1b2c3d4e5f60718") });
    expect(() => decode(doc, { strict: true })).toThrow("Unsupported ObjectId at _id");

    const huge = WireDocument.fromDocument({ n: Long.fromString("9007199254740993") });
    expect(() => decode(huge, { strict: true })).toThrow(
      "Unsupported int64 outside the safe integer range at n",
    );
  });
});

describe("field order", () => {
  const keys = (doc: WireDocument) => [...doc.entries()].map((field) => field.key);

  it("keeps integer-like keys where they were written", () => {
    const value = Value.mapping([
      ["1", Value.string("a")],
      ["0", Value.string("b")],
    ]);
    const doc = encode(value);
    expect(keys(doc)).toEqual(["1", "0"]);
    expect(doc.couldBeArray()).toBe(false);

    const decoded = decode(doc);
    expect(decoded.kind).toBe("mapping");
    expect(valuesEqual(decoded, value)).toBe(true);

    const fromBytes = decode(WireDocument.fromBytes(doc.toBytes()));
    expect(fromBytes.kind === "mapping" && [...fromBytes.entries.keys()]).toEqual(["1", "0"]);
  });

  it("keeps mixed keys in insertion order on the wire", () => {
    const doc = encode(
      Value.mapping([
        ["name", Value.string("ada")],
        ["2024", Value.int(3)],
        ["nested", Value.mapping([["b", Value.null()], ["10", Value.bool(true)]])],
      ]),
    );
    expect(keys(doc)).toEqual(["name", "2024", "nested"]);

    const back = WireDocument.fromBytes(doc.toBytes());
    expect(keys(back)).toEqual(["name", "2024", "nested"]);
    const nested = back.get("nested");
    expect(nested?.type === "document" && keys(nested.value)).toEqual(["b", "10"]);
  });
});
