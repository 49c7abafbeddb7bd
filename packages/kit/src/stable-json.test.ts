import { describe, it, expect } from "vitest";
import { stableStringify } from "./stable-json.js";

describe("stableStringify", () => {
  it("sorts keys at every depth", () => {
    const text = stableStringify({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: "x" } });
    expect(text).toBe('{"a":{"c":"x","d":[2,{"y":0,"z":1}]},"b":1}');
  });

  it("serializes equal objects built in different orders identically", () => {
    expect(stableStringify({ short: 10, long: 40 })).toBe(stableStringify({ long: 40, short: 10 }));
  });

  it("drops undefined properties", () => {
    expect(stableStringify({ a: undefined, b: null })).toBe('{"b":null}');
  });

  it("supports indentation", () => {
    expect(stableStringify({ b: 1, a: 2 }, 2)).toBe('{\n  "a": 2,\n  "b": 1\n}');
  });
});
