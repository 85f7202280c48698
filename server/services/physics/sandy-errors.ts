export class SandyValidationError extends Error {
  status: number;
  readonly missing: string[];
  constructor(message: string, missing: string[] = [], status = 400) {
    super(message);
    this.status = status;
    this.missing = missing;
    this.name = "SandyValidationError";
  }
}

export class SandyInsufficientDataError extends Error {
  status: number;
  constructor(public readonly sampleCount: number, status = 422) {
    super(`at least 2 samples are required to form a gate product slope (got ${sampleCount})`);
    this.status = status;
    this.name = "SandyInsufficientDataError";
  }
}
