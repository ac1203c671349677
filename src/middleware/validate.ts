import type { Request, Response, NextFunction } from 'express';
import type { z } from 'zod';
import { AppError } from './error-handler.js';
import { ErrorCodes } from './error-codes.js';

function firstErrorMessage(schemaError: z.ZodError): string {
  const first = schemaError.issues[0];
  return first ? first.message : 'Validation failed';
}

/** Parses `value` or throws a 400 carrying the first issue's message. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new AppError(400, ErrorCodes.INVALID_INPUT, firstErrorMessage(result.error));
  }
  return result.data;
}

/** Replaces `req.body` with the parsed value, so handlers see trimmed and defaulted fields. */
export function validateBody(schema: z.ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    req.body = parseInput(schema, req.body);
    next();
  };
}
