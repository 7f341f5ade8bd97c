// src/utils/ids.ts
/** Correlation ids: reuse a well-formed inbound x-request-id (from a proxy), otherwise mint one. */

import { randomUUID } from "crypto";

import type { RequestHandler } from "express";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const requestId: RequestHandler = (req, res, next) => {
  const inbound = req.get("x-request-id");
  const id = inbound && UUID_RE.test(inbound) ? inbound : randomUUID();
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};
