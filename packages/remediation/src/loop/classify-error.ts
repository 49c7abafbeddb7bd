export type ErrorClass = "timeout" | "network" | "transient" | "unknown";

const ERROR_PATTERNS: [RegExp, ErrorClass][] = [
  [/timeout|timed out|ETIMEDOUT/i, "timeout"],
  [/ECONNREFUSED|ECONNRESET|EAI_AGAIN|ENOTFOUND|fetch failed/i, "network"],
  [/ENOENT|EBUSY|SQLITE_BUSY|spawn.*failed|child.*process/i, "transient"],
];

/**
 * Classifies an error message into a known category.
 * Only attached to log lines; retry decisions ignore it.
 */
export function classifyError(message: string): ErrorClass {
  for (const [pattern, errorClass] of ERROR_PATTERNS) {
    if (pattern.test(message)) return errorClass;
  }
  return "unknown";
}
