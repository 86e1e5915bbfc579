/**
 * Raised for problems with the run's inputs (unreadable or malformed patient,
 * trial or prior-output files). These stop the run before any trial is evaluated.
 */
export class InputError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "InputError";
  }
}
