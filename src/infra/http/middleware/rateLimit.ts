import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (60 requests per minute per IP).
 * Uses in-memory store (resets on server restart). One per app instance.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter rate limiter for the login endpoint (10 requests per minute per IP).
 */
export function createLoginRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    max: 10,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
