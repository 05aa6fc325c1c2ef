export type AppErrorStatus = 400 | 404 | 503;

export class AppError extends Error {
  constructor(
    public statusCode: AppErrorStatus,
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export const createNotFoundError = (resource: string) =>
  new AppError(404, `${resource} not found`, 'NOT_FOUND');

export const createBadRequestError = (message: string) =>
  new AppError(400, message, 'BAD_REQUEST');

export const createServiceUnavailableError = (service: string, reason: string) =>
  new AppError(503, `${service} is not available: ${reason}`, 'SERVICE_UNAVAILABLE');

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Reported when the caller's signal aborts a core operation. */
export const REQUEST_CANCELLED = 'Request was cancelled.';
