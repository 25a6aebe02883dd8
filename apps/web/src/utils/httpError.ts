export type HttpErrorCode =
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL_ERROR";

/**
 * Expected failure raised by services; the error handler maps it to `status`
 * and shows `message` to the shopper.
 */
export class HttpError extends Error {
  status: number;
  code: HttpErrorCode;

  constructor(status: number, code: HttpErrorCode, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
  }
}

export function notFound(message: string) {
  return new HttpError(404, "NOT_FOUND", message);
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}
