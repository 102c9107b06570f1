import { NextFunction, Request, Response } from 'express';

import { getSupabase } from '../services/supabase.js';

export interface AuthenticatedRequest extends Request {
  userId?: string;
  userEmail?: string;
}

/**
 * Authentication middleware that validates Supabase access tokens
 * Expects Authorization header: Bearer <access_token>
 */
export async function authMiddleware(
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
) {
  // Skip auth for health check
  if (req.path === '/health') {
    return next();
  }

  // Skip auth for tools list (read-only)
  if (req.path === '/mcp/tools' && req.method === 'GET') {
    return next();
  }

  const authHeader = req.headers.authorization;
  if (!authHeader) {
    return res.status(401).json({
      error: 'Unauthorized',
      message: 'Missing Authorization header. Expected: Bearer <access_token>',
    });
  }

  const [scheme, token] = authHeader.split(' ');
  if (scheme !== 'Bearer' || !token) {
    return res.status(401).json({
      error: 'Unauthorized',
      message: 'Invalid Authorization header format. Expected: Bearer <access_token>',
    });
  }

  try {
    const { data: { user }, error } = await getSupabase().auth.getUser(token);

    if (error || !user) throw new Error(error?.message ?? 'Invalid token');

    req.userId = user.id;
    req.userEmail = user.email;

    next();
  } catch (err) {
    console.error('[HTTP] Authentication failed:', err instanceof Error ? err.message : err);
    return res.status(401).json({
      error: 'Unauthorized',
      message: 'Invalid or expired token',
    });
  }
}

export interface RateLimitOptions {
  /** Requests allowed per window */
  limit: number;
  windowMs?: number;
}

/**
 * Rate limiting per user (simple in-memory implementation)
 */
export function createRateLimitMiddleware({ limit, windowMs = 60_000 }: RateLimitOptions) {
  const rateLimitMap = new Map<string, { count: number; resetTime: number }>();

  // Clean up expired entries; unref so the timer never keeps the process alive
  setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of rateLimitMap.entries()) {
      if (now > entry.resetTime) {
        rateLimitMap.delete(key);
      }
    }
  }, windowMs).unref();

  return function rateLimitMiddleware(req: AuthenticatedRequest, res: Response, next: NextFunction) {
    if (req.path === '/health') {
      return next();
    }

    const key = req.userId || req.ip || 'anonymous';
    const now = Date.now();

    let entry = rateLimitMap.get(key);
    if (!entry || now > entry.resetTime) {
      entry = { count: 0, resetTime: now + windowMs };
      rateLimitMap.set(key, entry);
    }

    entry.count++;

    if (entry.count > limit) {
      return res.status(429).json({
        error: 'Too Many Requests',
        message: 'Rate limit exceeded. Please try again later.',
        retryAfter: Math.ceil((entry.resetTime - now) / 1000),
      });
    }

    res.setHeader('X-RateLimit-Limit', limit.toString());
    res.setHeader('X-RateLimit-Remaining', (limit - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetTime / 1000).toString());

    next();
  };
}

/**
 * CORS middleware for browser access
 */
export function createCorsMiddleware(allowedOrigins: string[]) {
  return function corsMiddleware(req: Request, res: Response, next: NextFunction) {
    const origin = req.headers.origin;

    if (allowedOrigins.includes('*') || (origin && allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin || '*');
    }

    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      return res.status(204).end();
    }

    next();
  };
}
