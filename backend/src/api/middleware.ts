import cors from 'cors';
import helmet from 'helmet';
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Security headers. The API only serves JSON, so the policy is locked down.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

/**
 * CORS: the configured frontend in any environment; otherwise any origin in
 * production and the Vite dev server locally
 */
export function createCorsMiddleware(frontendUrl: string | undefined, nodeEnv: string): RequestHandler {
  return cors({
    origin: frontendUrl || (nodeEnv === 'production' ? true : 'http://localhost:5173'),
    credentials: true,
  });
}

export function createChatRateLimiter(requestsPerMinute: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: requestsPerMinute,
    message: { error: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * 4xx status carried by an HttpError or by a body-parser failure (malformed
 * JSON, oversized body), else null
 */
function clientErrorStatus(err: unknown): number | null {
  const status =
    err instanceof HttpError
      ? err.status
      : typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : null;
  return status !== null && status >= 400 && status < 500 ? status : null;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    res.status(clientStatus).json({ error: err instanceof HttpError ? err.message : 'Invalid request body' });
    return;
  }

  console.error('Error:', err);

  const status = err instanceof HttpError ? err.status : 500;
  res.status(status).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
  });
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
