import { describe, it, expect } from "vitest";
import { Double, Int32, Long, ObjectId, serialize } from "bson";
import { WireDocument } from "../../src/value/wire.js";

describe("WireDocumentBuilder", () => {
  it("appends typed fields to a document", () => {
    const doc = WireDocument.builder()
      .append("n", new Int32(5))
      .append("ratio", new Double(0.5))
      .append("name", "ada")
      .append("gone", null)
      .finish();

    expect(doc.kind).toBe("document");
    expect(doc.size).toBe(4);
    expect(doc.get("n")).toEqual({ key: "n", type: "int32", value: 5 });
    expect(doc.get("ratio")).toEqual({ key: "ratio", type: "double", value: 0.5 });
    expect(doc.get("name")).toEqual({ key: "name", type: "string", value: "ada" });
    expect(doc.get("gone")).toEqual({ key: "gone", type: "null", value: null });
    expect(doc.get("missing")).toBeUndefined();
  });

  it("pushes elements to an array", () => {
    const doc = WireDocument.builder("array").push("a").push(new Int32(2)).finish();
    expect(doc.kind).toBe("array");
    expect([...doc.entries()].map((field) => [field.key, field.type])).toEqual([
      ["0", "string"],
      ["1", "int32"],
    ]);
  });

  it("refuses to be used after finish", () => {
    const builder = WireDocument.builder();
    builder.finish();
    expect(() => builder.append("a", "b")).toThrow("WireDocumentBuilder already finished");
    expect(() => builder.finish()).toThrow("WireDocumentBuilder already finished");
  });

  it("keeps documents and arrays apart", () => {
    expect(() => WireDocument.builder().push("x")).toThrow("push() requires an array builder");
    expect(() => WireDocument.builder("array").append("k", "x")).toThrow(
      "append() requires a document builder",
    );
  });

  it("embeds finished documents", () => {
    const inner = WireDocument.builder().append("city", "Oslo").finish();
    const outer = WireDocument.builder().append("address", inner).finish();
    const field = outer.get("address");
    expect(field?.type).toBe("document");
    if (field?.type !== "document") return;
    expect(field.value.get("city")?.value).toBe("Oslo");
  });
});

describe("WireDocument", () => {
  it("reads BSON bytes with their wire types", () => {
    const bytes = serialize({
      small: new Int32(1),
      ratio: 2.5,
      big: Long.fromString("5000000000"),
      name: "x",
      list: [1, 2],
      nested: { flag: true },
    });
    const doc = WireDocument.fromBytes(bytes);

    expect(doc.get("small")).toEqual({ key: "small", type: "int32", value: 1 });
    expect(doc.get("ratio")).toEqual({ key: "ratio", type: "double", value: 2.5 });
    expect(doc.get("big")).toEqual({ key: "big", type: "int64", value: 5000000000n });
    expect(doc.get("list")?.type).toBe("array");
    expect(doc.get("nested")?.type).toBe("document");
  });

  it("classifies promoted numbers", () => {
    const doc = WireDocument.fromDocument({ count: 3, mean: 3.5, huge: 2 ** 40 });
    expect(doc.get("count")?.type).toBe("int32");
    expect(doc.get("mean")?.type).toBe("double");
    expect(doc.get("huge")?.type).toBe("double");
  });

  it("marks other BSON types as unsupported", () => {
    const doc = WireDocument.fromDocument({ _id: new ObjectId("64b7f0c2a1b2c3d4e5f60718") });
    expect(doc.get("_id")).toMatchObject({ type: "unsupported", bsonType: "ObjectId" });
  });

  it("snapshots the source document", () => {
    const source = { a: 1, inner: { b: 2 } };
    const doc = WireDocument.fromDocument(source);
    source.a = 10;
    source.inner.b = 20;
    expect(doc.get("a")?.value).toBe(1);
    expect(doc.toDocument()).toEqual({ a: 1, inner: { b: 2 } });
  });

  it("detects array-shaped keys", () => {
    expect(WireDocument.fromDocument({ "0": "a", "1": "b" }).couldBeArray()).toBe(true);
    expect(WireDocument.fromDocument({ "1": "a" }).couldBeArray()).toBe(false);
    expect(WireDocument.fromDocument({ "0": "a", "2": "b" }).couldBeArray()).toBe(false);
    expect(WireDocument.empty().couldBeArray()).toBe(false);
    expect(WireDocument.builder("array").finish().couldBeArray()).toBe(false);
  });

  it("serializes arrays with positional keys", () => {
    const array = WireDocument.builder("array").push("a").push(new Int32(2)).finish();
    const back = WireDocument.fromBytes(array.toBytes());
    expect(back.kind).toBe("document");
    expect(back.couldBeArray()).toBe(true);
    expect(back.get("1")).toEqual({ key: "1", type: "int32", value: 2 });
  });
});

describe("WireDocument field order", () => {
  const keys = (doc: WireDocument) => [...doc.entries()].map((field) => field.key);

  it("reads the key order of the bytes", () => {
    const bytes = serialize(
      new Map<string, unknown>([
        ["1", "a"],
        ["0", "b"],
        ["list", [new Map([["2", "x"], ["1", "y"]])]],
      ]),
    );
    const doc = WireDocument.fromBytes(bytes);

    expect(keys(doc)).toEqual(["1", "0", "list"]);
    expect(doc.couldBeArray()).toBe(false);
    const list = doc.get("list");
    const first = list?.type === "array" ? list.value.get("0") : undefined;
    expect(first?.type === "document" && keys(first.value)).toEqual(["2", "1"]);
  });

  it("keeps the order of a Map handed over by a driver", () => {
    const doc = WireDocument.fromDocument(new Map([["1", "a"], ["0", "b"]]));
    expect(keys(doc)).toEqual(["1", "0"]);
    expect(doc.toDocument()).toEqual({ "0": "b", "1": "a" });
  });
});
