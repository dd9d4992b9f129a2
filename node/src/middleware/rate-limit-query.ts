// node/src/middleware/rate-limit-query.ts — limiter for the ask endpoint
import rateLimit from 'express-rate-limit';

export const askRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
});
