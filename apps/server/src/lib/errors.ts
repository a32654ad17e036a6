import { failureStatus, type LibraryFailure } from "./failures";
import type { Result } from "./result";

export class HttpError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.details = details;
  }
}

export const fromFailure = (failure: LibraryFailure): HttpError =>
  new HttpError(failureStatus[failure.kind], failure.message, failure.details);

export const unwrapOrThrow = <T>(result: Result<T, LibraryFailure>): T => {
  if (!result.ok) {
    throw fromFailure(result.error);
  }
  return result.value;
};
