import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { config } from "../../config/index.js";
import type { AdminActor, AdminPermission } from "../../types/pool.types.js";
import { sanitizeId } from "../utils/sanitize.js";
import { createActor, hasPermission, isAdminPermission } from "./permissions.js";

// Extend Express Request type to include admin info
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      admin?: AdminActor;
    }
  }
}

/**
 * Read the actor out of a verified token payload. Unknown permission names
 * are dropped.
 */
export function actorFromPayload(payload: string | jwt.JwtPayload): AdminActor | null {
  if (typeof payload === "string" || typeof payload.sub !== "string") {
    return null;
  }
  const claimed: unknown = payload.permissions;
  const permissions = Array.isArray(claimed) ? claimed.filter(isAdminPermission) : [];
  return createActor(payload.sub, permissions);
}

export function generateAdminToken(
  adminId: string,
  permissions: AdminPermission[],
  secret: string = config.jwtSecret,
  expiresIn: number = 12 * 60 * 60,
): string {
  return jwt.sign({ permissions }, secret, { subject: adminId, expiresIn });
}

/**
 * Admin Authentication Middleware
 * Verifies the bearer token and attaches the actor to the request
 */
export const adminMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith("Bearer ")) {
    res.status(401).json({
      success: false,
      error: "Unauthorized",
      message: "Authentication required",
    });
    return;
  }

  let actor: AdminActor | null;
  try {
    actor = actorFromPayload(jwt.verify(authHeader.substring(7), config.jwtSecret));
  } catch {
    res.status(401).json({ success: false, error: "Invalid or expired token." });
    return;
  }

  if (!actor) {
    res.status(401).json({ success: false, error: "Token has no subject" });
    return;
  }

  req.admin = actor;
  next();
};

/**
 * Reject the request unless the admin holds `permission`. Mount after
 * adminMiddleware.
 */
export const requireAdminPermission =
  (permission: AdminPermission) =>
  (req: Request, res: Response, next: NextFunction): void => {
    if (!req.admin || !hasPermission(req.admin, permission)) {
      console.warn("🚫 Admin permission denied", {
        adminId: sanitizeId(req.admin?.id),
        permission,
        path: req.path,
      });
      res.status(403).json({
        success: false,
        error: "Forbidden",
        message: `The ${permission} permission is required`,
      });
      return;
    }
    next();
  };
