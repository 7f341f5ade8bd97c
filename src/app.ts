// src/app.ts
/** Express app wiring: security (helmet), CORS allowlist, parsers, logging, rate limit, routes, 404 + error. */
import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";

import { corsOrigins, env } from "./config/env.js";
import { httpLogStream } from "./config/logger.js";
import { errorHandler } from "./middlewares/error.js";
import { notFound } from "./middlewares/notFound.js";
import { rateLimit, type RateLimitOptions } from "./middlewares/rateLimit.js";
import { createApiRouter, createHealthRouter, type HealthChecks, type Services } from "./routes.js";
import { requestId } from "./utils/ids.js";
import type { KeyValueStore } from "./utils/idempotency.js";

export type AppDeps = {
  services: Services;
  /** Backs X-Idempotency-Key replay on payment initiation */
  idempotency?: KeyValueStore;
  healthChecks?: HealthChecks;
  rateLimit?: RateLimitOptions;
};

export function createApp(deps: AppDeps) {
  const app = express();

  // security + parsing
  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  // request id first
  app.use(requestId);

  // CORS allowlist
  app.use(
    cors({
      origin(origin, cb) {
        if (!origin) return cb(null, true); // allow same-origin/local tools
        if (corsOrigins.includes(origin)) return cb(null, true);
        return cb(new Error("CORS not allowed"), false);
      },
      credentials: true,
    })
  );

  // dev http logs
  if (env.NODE_ENV !== "production") {
    app.use(morgan("tiny", { stream: httpLogStream }));
  }

  // basic rate limit
  app.use(rateLimit(deps.rateLimit));

  app.use("/", createHealthRouter(deps.healthChecks ?? {}));
  app.use("/api", createApiRouter(deps.services, deps.idempotency));

  // 404 + error
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
