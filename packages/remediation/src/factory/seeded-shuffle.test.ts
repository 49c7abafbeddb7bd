import { describe, it, expect } from "vitest";
import { seededShuffle } from "./seeded-shuffle.js";

describe("seededShuffle", () => {
  const items = Array.from({ length: 20 }, (_, i) => i);

  it("is a permutation of its input", () => {
    expect(seededShuffle(items, "alpha").sort((a, b) => a - b)).toEqual(items);
  });

  it("returns the same order for the same seed", () => {
    expect(seededShuffle(items, "alpha")).toEqual(seededShuffle(items, "alpha"));
  });

  it("returns a different order for a different seed", () => {
    expect(seededShuffle(items, "alpha")).not.toEqual(seededShuffle(items, "beta"));
  });

  it("leaves its input untouched", () => {
    const copy = [...items];
    seededShuffle(items, "alpha");
    expect(items).toEqual(copy);
  });
});
