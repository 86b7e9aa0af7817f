/**
 * Rate Limiting Middleware
 *
 * - Global: 300 requests/min, GET requests skipped
 * - Stage triggers: 30 requests/min, since each can fan out to many provider calls
 */
import rateLimit from 'express-rate-limit';

export const globalLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 300,
  message: {
    responseStatus: 'error',
    message: 'Too many requests, please try again later',
    data: null,
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.method === 'GET',
});

export const generationLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 30,
  message: {
    responseStatus: 'error',
    message: 'Generation rate limit exceeded, please slow down',
    data: null,
  },
  standardHeaders: true,
  legacyHeaders: false,
});
