/**
 * Authentication middleware.
 *
 * - `requireMember`   — verifies the Bearer token issued by the chat gateway
 *                       and attaches `req.member` ({ scopeId, subjectId }).
 * - `requireAdminKey` — requires the X-Admin-Key header to match ADMIN_API_KEY.
 *
 * Member tokens are HS256 JWTs whose payload carries `serverId` and
 * `memberId`.
 */

import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { env } from "../config/env";
import { AppError } from "../errors";
import type { SubjectKey } from "../services/achievements";

function extractToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) {
    return null;
  }
  return header.slice(7);
}

/**
 * Verify a member token and return the subject it names.
 * Returns null when the token is invalid, expired or lacks the ids.
 */
function verifyMemberToken(token: string): SubjectKey | null {
  try {
    const decoded = jwt.verify(token, env.JWT_SECRET);
    if (typeof decoded === "string") {
      return null;
    }
    const { serverId, memberId } = decoded;
    if (typeof serverId !== "string" || typeof memberId !== "string" || !serverId || !memberId) {
      return null;
    }
    return { scopeId: serverId, subjectId: memberId };
  } catch {
    return null;
  }
}

/** Sign a member token (used by the gateway and by tests). */
function signMemberToken(serverId: string, memberId: string, expiresInSeconds = 3600): string {
  return jwt.sign({ serverId, memberId }, env.JWT_SECRET, { expiresIn: expiresInSeconds });
}

function requireMember(req: Request, res: Response, next: NextFunction): void {
  const token = extractToken(req);

  if (!token) {
    res.status(401).json({
      error: { message: "Unauthorized", code: "AUTH_REQUIRED" },
    });
    return;
  }

  const member = verifyMemberToken(token);

  if (!member) {
    res.status(401).json({
      error: { message: "Unauthorized", code: "INVALID_TOKEN" },
    });
    return;
  }

  req.member = member;
  next();
}

/** The member attached by requireMember; throws when the route is not guarded. */
function memberOf(req: Request): SubjectKey {
  if (!req.member) {
    throw new AppError("Unauthorized", 401, "AUTH_REQUIRED");
  }
  return req.member;
}

function requireAdminKey(req: Request, res: Response, next: NextFunction): void {
  const key = req.headers["x-admin-key"];

  if (!env.ADMIN_API_KEY) {
    res.status(403).json({
      error: { message: "Admin access is not configured", code: "ADMIN_NOT_CONFIGURED" },
    });
    return;
  }

  if (typeof key !== "string" || key !== env.ADMIN_API_KEY) {
    res.status(401).json({
      error: { message: "Invalid admin key", code: "INVALID_ADMIN_KEY" },
    });
    return;
  }

  next();
}

export { requireMember, requireAdminKey, memberOf, signMemberToken, verifyMemberToken };
