import type { Request, Response, NextFunction } from 'express';
import { AppError, toErrorMessage } from '../utils/errors.js';
import { sendError } from '../utils/response.js';
import { logger } from '../config/logger.js';

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error(`[API] ${req.method} ${req.originalUrl}: ${error.message}`);
    }
    sendError(res, error.message, error.statusCode, error.code);
    return;
  }

  if (error instanceof SyntaxError && 'body' in error) {
    sendError(res, 'Malformed JSON body', 400, 'VALIDATION_ERROR');
    return;
  }

  logger.error(`[API] Unhandled error on ${req.method} ${req.originalUrl}: ${toErrorMessage(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  sendError(res, 'Internal server error', 500, 'INTERNAL_ERROR');
}
