import { describe, it, expect } from "vitest";
import { z, ZodError } from "zod";
import { safeJsonParse } from "./safe-json.js";

const schema = z.object({ id: z.number(), tags: z.array(z.string()).default([]) });

describe("safeJsonParse", () => {
  it("parses and applies schema defaults", () => {
    expect(safeJsonParse('{"id":7}', { schema })).toEqual({ id: 7, tags: [] });
  });

  it("throws SyntaxError on malformed JSON", () => {
    expect(() => safeJsonParse("{not json", { schema })).toThrow(SyntaxError);
  });

  it("throws ZodError when the shape does not match", () => {
    expect(() => safeJsonParse('{"id":"7"}', { schema })).toThrow(ZodError);
  });
});
