import type { ZodType, ZodTypeDef } from "zod";

/**
 * Parse JSON and validate the result against a Zod schema.
 *
 * @throws {SyntaxError} If the text is not valid JSON
 * @throws {ZodError} If schema validation fails
 */
export function safeJsonParse<T>(raw: string, opts: { schema: ZodType<T, ZodTypeDef, unknown> }): T {
  const parsed: unknown = JSON.parse(raw);
  return opts.schema.parse(parsed);
}
