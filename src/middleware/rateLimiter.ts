import rateLimit from 'express-rate-limit';
import { ErrorCode } from '../utils/appError.js';

// API: 100/min per client
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
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
