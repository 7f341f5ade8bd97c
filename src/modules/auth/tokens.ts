/** JWT helpers: sign/verify short-lived access tokens. */
import { randomUUID } from "crypto";

import jwt from "jsonwebtoken";

import { env } from "../../config/env.js";

export type AccessClaims = {
  sub: string; // user id
  type: "access";
  jti: string;
};

export function signAccessToken(input: { sub: string; jti?: string }): string {
  return jwt.sign({ type: "access" }, env.JWT_SECRET, {
    algorithm: "HS256",
    subject: input.sub,
    expiresIn: env.JWT_ACCESS_TTL_SECONDS,
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
    jwtid: input.jti ?? randomUUID(),
  });
}

export function verifyAccess(token: string): AccessClaims {
  const decoded = jwt.verify(token, env.JWT_SECRET, {
    algorithms: ["HS256"],
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
  });
  if (
    typeof decoded === "string" ||
    decoded.type !== "access" ||
    typeof decoded.sub !== "string" ||
    typeof decoded.jti !== "string"
  ) {
    throw Object.assign(new Error("Invalid token type"), { code: "INVALID_TOKEN" });
  }
  return { sub: decoded.sub, type: "access", jti: decoded.jti };
}
