import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { config } from '../config/env';

interface RateLimitOptions {
  windowMs: number;
  max: number;
}

// General API rate limiting
export const createGeneralRateLimit = (options: RateLimitOptions = config.rateLimit): RateLimitRequestHandler =>
  rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    message: {
      success: false,
      error: {
        kind: 'RateLimitError',
        code: 'RATE_LIMITED',
        message: 'Too many requests from this IP, please try again later',
      },
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

// Ballot submission and decoding (guessing secrets or codes)
export const createVotingRateLimit = (options: RateLimitOptions = config.rateLimit): RateLimitRequestHandler =>
  rateLimit({
    windowMs: options.windowMs,
    limit: Math.max(1, Math.floor(options.max / 10)),
    message: {
      success: false,
      error: {
        kind: 'RateLimitError',
        code: 'RATE_LIMITED',
        message: 'Too many voting requests, please slow down',
      },
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
