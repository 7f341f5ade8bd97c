// src/routes.ts
/** API surface: feature routers under /api, plus health endpoints at the root. */
import { Router } from "express";

import type { DepStatus } from "./config/db.js";
import { createAuthRouter } from "./modules/auth/routes.js";
import type { AuthService } from "./modules/auth/service.js";
import { createBookingsRouter } from "./modules/bookings/routes.js";
import type { BookingsService } from "./modules/bookings/service.js";
import { createListingsRouter } from "./modules/listings/routes.js";
import type { ListingsService } from "./modules/listings/service.js";
import { createNotificationsRouter } from "./modules/notifications/routes.js";
import type { NotificationsService } from "./modules/notifications/service.js";
import { createPaymentsRouter } from "./modules/payments/routes.js";
import type { PaymentCoordinator } from "./modules/payments/service.js";
import { createReviewsRouter } from "./modules/reviews/routes.js";
import type { ReviewsService } from "./modules/reviews/service.js";
import { createUsersRouter } from "./modules/users/routes.js";
import type { UsersService } from "./modules/users/service.js";
import { asyncHandler, jsonOk } from "./utils/http.js";
import type { KeyValueStore } from "./utils/idempotency.js";

export type Services = {
  auth: AuthService;
  users: UsersService;
  listings: ListingsService;
  reviews: ReviewsService;
  bookings: BookingsService;
  payments: PaymentCoordinator;
  notifications: NotificationsService;
};

export type HealthChecks = Record<string, () => Promise<DepStatus>>;

export function createApiRouter(services: Services, idempotency?: KeyValueStore) {
  const router = Router();

  router.use("/auth", createAuthRouter(services.auth));
  router.use("/", createUsersRouter(services.users)); // GET /me
  router.use("/listings", createListingsRouter({ listings: services.listings, reviews: services.reviews }));
  router.use("/reviews", createReviewsRouter(services.reviews));
  router.use("/bookings", createBookingsRouter(services.bookings));
  router.use(
    "/payments",
    createPaymentsRouter({ payments: services.payments, users: services.users, idempotency })
  );
  router.use("/notifications", createNotificationsRouter(services.notifications));

  return router;
}

export function createHealthRouter(checks: HealthChecks) {
  const router = Router();

  // Basic health (no deps)
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const uptime = process.uptime();
      const version = process.env.npm_package_version || "0.0.0";
      jsonOk(res, { status: "ok", uptime, version });
    })
  );

  // Dependencies health (actual pings)
  router.get(
    "/health/deps",
    asyncHandler(async (_req, res) => {
      const names = Object.keys(checks);
      const results = await Promise.all(names.map((name) => checks[name]()));

      const statuses: Record<string, DepStatus["status"]> = {};
      const details: Record<string, string | undefined> = {};
      let failing = false;
      names.forEach((name, i) => {
        statuses[name] = results[i].status;
        if (results[i].status === "error") {
          failing = true;
          details[name] = results[i].message;
        }
      });
      jsonOk(res, failing ? { ...statuses, details } : statuses, failing ? 503 : 200);
    })
  );

  return router;
}
