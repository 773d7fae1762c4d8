import { Request, Response, NextFunction } from "express";
import {
  trackRequestDuration,
  trackRequestCount,
} from "../lib/monitoring/metrics.js";

/**
 * Route template for the metric label, so /api/pools/a and /api/pools/b
 * share one series
 */
function routeLabel(req: Request): string {
  const path: unknown = req.route?.path;
  return typeof path === "string" ? `${req.baseUrl}${path}` : "unmatched";
}

/**
 * Middleware to track HTTP request metrics
 */
export const requestMetrics = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const start = Date.now();

  res.on("finish", () => {
    const duration = Date.now() - start;
    const route = routeLabel(req);

    trackRequestCount(req.method, route, res.statusCode);
    trackRequestDuration(req.method, route, duration);
  });

  next();
};
