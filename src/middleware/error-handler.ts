import type { Request, Response, NextFunction } from 'express';
import { ErrorCodes, type ErrorCode } from './error-codes.js';
import { getErrorMessage } from '../utils/error-utils.js';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: { code: err.code, message: err.message } });
    return;
  }
  if (isJsonSyntaxError(err)) {
    res.status(400).json({ error: { code: ErrorCodes.INVALID_JSON, message: 'Invalid JSON' } });
    return;
  }
  console.error(`[HTTP] ${req.method} ${req.originalUrl} failed (requestId=${req.requestId ?? '-'}):`, getErrorMessage(err));
  res.status(500).json({ error: { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal Server Error' } });
}
