/**
 * The two failures tag-scout reports to callers. Everything else (bad
 * fields, empty windows, empty results) resolves to data.
 */

/** A stage or query ran before the data it reads was built */
export class DataNotReadyError extends Error {
  readonly code = "DATA_NOT_READY" as const;

  constructor(message: string) {
    super(message);
    this.name = "DataNotReadyError";
  }
}

/** A recommendation request failed validation at the query boundary */
export class InvalidRequestError extends Error {
  readonly code = "INVALID_REQUEST" as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid recommendation request: ${issues.join("; ")}`);
    this.name = "InvalidRequestError";
    this.issues = issues;
  }
}

export type TagScoutError = DataNotReadyError | InvalidRequestError;

export function isTagScoutError(error: unknown): error is TagScoutError {
  return error instanceof DataNotReadyError || error instanceof InvalidRequestError;
}
