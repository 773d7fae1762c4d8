import rateLimit from "express-rate-limit";
import { Request, Response } from "express";

// Extend Express Request type to include rateLimit info
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      rateLimit?: {
        limit: number;
        current: number;
        remaining: number;
        resetTime?: Date | number;
      };
    }
  }
}

/**
 * 429 handler reporting seconds until the window resets
 */
const rateLimitHandler =
  (message: string, defaultRetryAfter: number) => (req: Request, res: Response) => {
    const resetTime = req.rateLimit?.resetTime;
    const retryAfter = resetTime
      ? Math.ceil(
          (typeof resetTime === "number" ? resetTime : resetTime.getTime()) / 1000 -
            Date.now() / 1000,
        )
      : defaultRetryAfter;

    res.status(429).json({
      success: false,
      error: "Too Many Requests",
      message,
      retryAfter,
    });
  };

/**
 * General API Rate Limiter
 * Applies to all /api/* routes
 * 100 requests per 15 minutes per IP
 */
export const generalApiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  handler: rateLimitHandler("Rate limit exceeded. Please try again later.", 900),
  skip: (req) => req.path === "/health" || req.path.startsWith("/health/"),
});

/**
 * Deposit / Withdrawal Rate Limiter
 * 10 requests per 1 minute per IP
 */
export const transactionLimiter = rateLimit({
  windowMs: 1 * 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  handler: rateLimitHandler("Too many transactions, please slow down", 60),
});

/**
 * Admin Rate Limiter
 * Applies to /api/admin/* routes
 * 200 requests per 15 minutes per IP
 */
export const adminLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 200,
  standardHeaders: true,
  legacyHeaders: false,
  handler: rateLimitHandler("Rate limit exceeded. Please try again later.", 900),
});
