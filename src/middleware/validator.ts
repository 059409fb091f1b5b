import type { Request } from 'express';
import type { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)).join(', ');
}

function parseWith<T extends z.ZodType>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate the request body against a zod schema.
 * Throws ValidationError, which the error handler turns into a 400.
 */
export function parseBody<T extends z.ZodType>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.body);
}

export function parseQuery<T extends z.ZodType>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.query);
}

export function parseParams<T extends z.ZodType>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.params);
}
