/**
 * Error taxonomy shared by the services and the HTTP layer. Each error knows the
 * status code it answers with; `expose` decides whether its message is safe to
 * return to the caller verbatim.
 */
export abstract class AppError extends Error {
  public abstract readonly statusCode: number;
  public readonly expose: boolean = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad client input. */
export class InvalidRequestError extends AppError {
  public readonly statusCode = 400;
}

/** The engine rejected the URL or produced nothing usable. */
export class ExtractionError extends AppError {
  public readonly statusCode = 400;
}

/** The cookie source could not produce a session cookie. */
export class CookieGenerationError extends AppError {
  public readonly statusCode = 500;
}

export class TimeoutError extends AppError {
  public readonly statusCode = 504;
}

export class InternalError extends AppError {
  public readonly statusCode = 500;
  public readonly expose = false;
}

export const toAppError = (error: unknown): AppError => {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { cause: error });
};
