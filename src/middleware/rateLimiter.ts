/**
 * Shared Rate Limiters
 */
import rateLimit from 'express-rate-limit';

export const computeLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 30, // 30 computations per minute per IP
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many circle requests, please try again later' },
});

export const publicReadLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 60, // 60 requests per minute per IP
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later' },
});
