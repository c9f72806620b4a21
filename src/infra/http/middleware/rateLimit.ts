import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

export interface RateLimitSettings {
  perMinute: number;
  loginPerMinute: number;
}

export interface RateLimiters {
  api: RequestHandler;
  login: RequestHandler;
}

/**
 * General and login limiters. Uses the in-memory store (resets on server
 * restart); each call gets its own counters.
 */
export function createRateLimiters(settings: RateLimitSettings): RateLimiters {
  const api = rateLimit({
    windowMs: 60 * 1000,
    max: settings.perMinute,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  // No user is known before login, so key on the client address
  const login = rateLimit({
    windowMs: 60 * 1000,
    max: settings.loginPerMinute,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many login attempts, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });

  return { api, login };
}
