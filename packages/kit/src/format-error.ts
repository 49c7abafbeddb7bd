/** Message plus stack trace, for storing next to a failed job or run. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    const stack = err.stack ?? "";
    const head = `${err.name}: ${err.message}`;
    return stack.startsWith(head) ? stack : `${head}\n${stack}`.trimEnd();
  }
  return String(err);
}
