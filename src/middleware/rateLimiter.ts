import rateLimit from 'express-rate-limit';
import { ErrorCode } from '../utils/appError.js';

/**
 * - Login: 5/min
 * - API: 200/min (counter staff work in bursts at intake and pickup)
 */

export const authLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 5,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMITED,
      message: 'Too many login attempts. Please try again in 1 minute.',
    },
  },
});

export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 200,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMITED,
      message: 'Too many requests. Please slow down.',
    },
  },
});
