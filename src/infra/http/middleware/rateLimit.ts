import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

const RATE_LIMITED = {
  code: 'RATE_LIMITED',
  message: 'Too many requests, please try again later.',
};

/**
 * General API rate limiter, per client IP.
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter(perMinute: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    message: RATE_LIMITED,
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for the email/password endpoints (10 requests per minute per IP).
 */
export function createPasswordRateLimiter(perMinute = 10): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    message: { ...RATE_LIMITED, message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
