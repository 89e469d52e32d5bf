export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

export const errorStatus = (err: unknown) =>
  err instanceof HttpError ? err.status : 500;

export const errorMessage = (err: unknown, fallback = "Server error") =>
  err instanceof Error && err.message ? err.message : fallback;
