// src/index.ts
/** Boot file: creates HTTP server, starts listening, and handles graceful shutdown. */

import http from "http";

import { createApp } from "./app.js";
import { connectMongo, closeMongo } from "./config/db.js";
import { chapaSecretKey, env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { pingRedis, closeRedis } from "./config/redis.js";
import { buildContainer } from "./container.js";

const server = http.createServer(createApp(buildContainer()));

process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", { err });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { reason });
});

const start = async () => {
  try {
    // ensure data deps are up before listening
    await connectMongo();
    const redis = await pingRedis();
    if (redis.status === "error") {
      logger.warn("redis.unavailable", { message: redis.message });
    }
    if (!chapaSecretKey()) {
      logger.warn("payments.not_configured", { missing: "CHAPA_SECRET_KEY" });
    }

    server.listen(env.PORT, () => {
      logger.info(`Travel API listening on :${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (err) {
    logger.error("Startup failed", {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  }
};

const shutdown = (signal: NodeJS.Signals) => {
  logger.warn(`Received ${signal}, shutting down...`);
  void Promise.allSettled([closeMongo(), closeRedis()]).finally(() => {
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
    setTimeout(() => {
      logger.error("Forced shutdown");
      process.exit(1);
    }, 10_000).unref();
  });
};

const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
signals.forEach((sig) => process.on(sig, () => shutdown(sig)));

void start();
