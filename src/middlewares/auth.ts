import type { Request, Response, NextFunction } from "express";

import { verifyAccess } from "../modules/auth/tokens.js";
import { UnauthorizedError } from "../utils/errors.js";

export type AuthContext = { userId: string; jti: string };

declare global {
  namespace Express {
    interface Locals {
      auth?: AuthContext;
      requestId?: string;
    }
  }
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const hdr = req.get("authorization");
  if (!hdr || !hdr.startsWith("Bearer ")) {
    return next(new UnauthorizedError());
  }
  const token = hdr.slice("Bearer ".length).trim();

  try {
    // verifyAccess enforces iss/aud/alg/exp and type === 'access'
    const claims = verifyAccess(token);
    res.locals.auth = { userId: claims.sub, jti: claims.jti };
  } catch {
    return next(new UnauthorizedError("Invalid or expired token."));
  }
  next();
}

export function getAuth(res: Response): AuthContext {
  const ctx = res.locals.auth;
  if (!ctx) throw new Error("Auth context missing (requireAuth not applied)");
  return ctx;
}
