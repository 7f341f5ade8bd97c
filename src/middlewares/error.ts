// src/middlewares/error.ts
/** Single error sink: typed HttpErrors keep their status/message, everything else is a bare 500. */
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { logger } from "../config/logger.js";
import { HttpError } from "../utils/errors.js";

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const requestId = res.locals.requestId;

  if (err instanceof ZodError) {
    const details = err.flatten();
    logger.warn("Validation error", { requestId, details });
    res.status(400).json({ error: "Invalid request.", details });
    return;
  }

  // express.json() parse failures carry status 400 and type "entity.parse.failed"
  if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
    res.status(400).json({ error: "Malformed JSON body." });
    return;
  }

  if (err instanceof HttpError) {
    logger.log(err.status >= 500 ? "error" : "warn", err.message, {
      requestId,
      status: err.status,
      code: err.code,
      path: req.originalUrl,
    });
    const body = err.details === undefined ? { error: err.message } : { error: err.message, details: err.details };
    res.status(err.status).json(body);
    return;
  }

  // always log stack if present; never echo internals to the client
  logger.error(err instanceof Error ? err.message : "Unhandled error", {
    requestId,
    status: 500,
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({ error: "Internal server error." });
};
