import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { sendError } from '../utils/response.js';

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimiterOptions {
  windowMs?: number;
  maxRequests?: number;
  now?: () => number;
}

/**
 * Simple in-memory API rate limiter, keyed by client IP.
 * Each limiter owns its buckets.
 */
export function createRateLimiter(options: RateLimiterOptions = {}): RequestHandler {
  const windowMs = options.windowMs ?? 60_000;
  const maxRequests = options.maxRequests ?? 120;
  const now = options.now ?? Date.now;
  const buckets = new Map<string, RateLimitBucket>();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const current = now();

    const bucket = buckets.get(key);

    if (!bucket || current >= bucket.resetAt) {
      buckets.set(key, { count: 1, resetAt: current + windowMs });
      next();
      return;
    }

    if (bucket.count >= maxRequests) {
      const retryAfter = Math.ceil((bucket.resetAt - current) / 1000);
      res.setHeader('Retry-After', String(retryAfter));
      sendError(res, 'Too many requests', 429, 'RATE_LIMITED');
      return;
    }

    bucket.count++;
    next();
  };
}
