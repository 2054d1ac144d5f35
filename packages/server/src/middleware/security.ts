import type { NextFunction, Request, RequestHandler, Response } from "express";
import rateLimit from "express-rate-limit";

/**
 * Rate limiter for API endpoints
 * @param limit Requests per minute per IP
 */
export const createRateLimiter = (limit: number): RequestHandler =>
  rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit,
    message: {
      success: false,
      error: "Too many requests. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

/**
 * Security headers middleware
 */
export const securityHeaders = (_req: Request, res: Response, next: NextFunction) => {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  next();
};

/**
 * Combined security middleware
 */
export const securityMiddleware = (rateLimitPerMinute = 30): RequestHandler[] => [
  securityHeaders,
  createRateLimiter(rateLimitPerMinute),
];
