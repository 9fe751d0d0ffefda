export class AppError extends Error {
  public constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ThrottledError extends AppError {
  public constructor(
    code: string,
    message: string,
    public readonly retryAfterSeconds: number,
    details?: Record<string, unknown>
  ) {
    super(429, code, message, { ...details, retryAfterSeconds });
    this.name = 'ThrottledError';
  }
}

export function unauthorized(message: string): AppError {
  return new AppError(401, 'UNAUTHORIZED', message);
}

export function storageUnavailable(cause: unknown): AppError {
  const error = new AppError(503, 'STORAGE_UNAVAILABLE', 'Backing store is unavailable.');
  error.cause = cause;
  return error;
}

/** Runs a repository call, surfacing any failure as STORAGE_UNAVAILABLE. */
export async function guardStorage<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    throw storageUnavailable(error);
  }
}
