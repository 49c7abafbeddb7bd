/** The validator raised or timed out. The run it belonged to is already closed as failed. */
export class ValidationFailure extends Error {
  readonly runId: number;

  constructor(runId: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationFailure";
    this.runId = runId;
  }
}
