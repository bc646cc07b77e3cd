/**
 * ExperimentDtoValidationError
 *
 * Thrown when an incoming experiment request does not match the expected DTO contract.
 * Issues are kept structured so the HTTP error handler can return them as-is.
 */
export class ExperimentDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ExperimentDtoValidationError';
    this.issues = issues;
  }
}
