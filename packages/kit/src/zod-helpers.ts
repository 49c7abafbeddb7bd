import type { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** One-line description of a failed parse, prefixed with what was being parsed. */
export function describeZodError(label: string, error: z.ZodError): string {
  return `${label} is invalid: ${formatZodErrors(error).join("; ")}`;
}
