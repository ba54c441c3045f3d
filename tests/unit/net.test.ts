import { describe, it, expect } from "vitest";
import { AddressError } from "../../src/shared/errors.js";
import { formatAddress, parseAddress } from "../../src/shared/net.js";

describe("parseAddress", () => {
  it("uses the default port for a bare host", () => {
    expect(parseAddress("db.local")).toEqual({ host: "db.local", port: 27017 });
    expect(parseAddress("  db.local  ")).toEqual({ host: "db.local", port: 27017 });
  });

  it("parses host:port", () => {
    expect(parseAddress("127.0.0.1:27018")).toEqual({ host: "127.0.0.1", port: 27018 });
  });

  it("parses bracketed IPv6 hosts", () => {
    expect(parseAddress("[::1]")).toEqual({ host: "::1", port: 27017 });
    expect(parseAddress("[fe80::1]:27019")).toEqual({ host: "fe80::1", port: 27019 });
  });

  it("rejects malformed addresses", () => {
    expect(() => parseAddress("")).toThrow('Invalid address "": host is empty');
    expect(() => parseAddress(":27017")).toThrow('Invalid address ":27017": host is empty');
    expect(() => parseAddress("db:abc")).toThrow('Invalid address "db:abc": port "abc" is not a number');
    expect(() => parseAddress("db:0")).toThrow('Invalid address "db:0": port 0 is out of range');
    expect(() => parseAddress("db:70000")).toThrow("port 70000 is out of range");
    expect(() => parseAddress("::1")).toThrow("IPv6 hosts must be written in brackets");
    expect(() => parseAddress("[::1")).toThrow("missing closing bracket");
    expect(() => parseAddress("[::1]x")).toThrow("unexpected characters after host");
  });

  it("throws AddressError with the offending input", () => {
    let caught: unknown;
    try {
      parseAddress("db:-1");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AddressError);
    expect(caught).toMatchObject({ code: "INVALID_ADDRESS", address: "db:-1" });
  });
});

describe("formatAddress", () => {
  it("brackets IPv6 hosts", () => {
    expect(formatAddress({ host: "db.local", port: 27017 })).toBe("db.local:27017");
    expect(formatAddress({ host: "::1", port: 27018 })).toBe("[::1]:27018");
  });
});
