import { NameConflictError, VmNotFoundError, VmmBaseError } from "../errors/vmmErrors.js";

export class HttpError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

/**
 * Status for a failure raised by the lifecycle layer, or null when the error is not one
 * of ours. Configuration problems are the caller's; everything else is the host's.
 */
export function statusForVmmError(err: unknown): number | null {
  if (!(err instanceof VmmBaseError)) return null;
  if (err instanceof VmNotFoundError) return 404;
  if (err instanceof NameConflictError) return 409;
  return err.kind === "configuration" ? 400 : 500;
}
