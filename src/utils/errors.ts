// This module provides a typed application error that the transport maps into JSON-RPC envelopes and HTTP statuses.

export type AppErrorCode =
  | 'unauthorized'
  | 'method_not_found'
  | 'timeout'
  | 'invalid_config'
  | 'not_found'
  | 'internal_error';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: AppErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This helper normalizes unknown failures into an AppError while keeping the original message as detail text.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', String(error));
}
