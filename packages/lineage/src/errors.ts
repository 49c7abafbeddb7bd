/**
 * Raised for any failure inside the lineage store: driver errors, constraint
 * violations and broken lineage invariants. Callers treat it as fatal.
 */
export class PersistenceFailure extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = "PersistenceFailure";
    this.operation = operation;
  }
}
