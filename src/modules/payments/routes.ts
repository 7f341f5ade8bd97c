import { Router } from "express";
import { z } from "zod";

import type { PaymentCoordinator } from "./service.js";
import { key } from "../../config/redis.js";
import { getAuth, requireAuth } from "../../middlewares/auth.js";
import { NotFoundError } from "../../utils/errors.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { getOrSetIdempotent, type KeyValueStore } from "../../utils/idempotency.js";
import type { UsersService } from "../users/service.js";

const BookingIdParam = z.object({ bookingId: z.string().regex(/^[0-9a-f]{24}$/i) });

/** A malformed booking id names no booking: 404 like any other absent one. */
function bookingIdOf(params: unknown): string {
  const parsed = BookingIdParam.safeParse(params);
  if (!parsed.success) throw new NotFoundError();
  return parsed.data.bookingId;
}

const IDEMPOTENCY_TTL_SECS = 24 * 60 * 60;

export function createPaymentsRouter(deps: {
  payments: PaymentCoordinator;
  users: UsersService;
  /** When absent, X-Idempotency-Key is ignored */
  idempotency?: KeyValueStore;
}) {
  const router = Router();
  const { payments, users, idempotency } = deps;

  // POST /payments/initiate/:bookingId/ -> { checkout_url, transaction_id }
  router.post(
    "/initiate/:bookingId",
    requireAuth,
    asyncHandler(async (req, res) => {
      const bookingId = bookingIdOf(req.params);
      const { userId } = getAuth(res);

      const run = async () => {
        const profile = await users.getProfile(userId);
        return { status: 200, body: await payments.initiate(bookingId, profile) };
      };

      const idempHeader = String(req.get("X-Idempotency-Key") || "").trim();
      if (idempHeader && idempotency) {
        const cacheKey = key("idemp", "payments", "initiate", userId, bookingId, idempHeader);
        const { value, replay } = await getOrSetIdempotent(idempotency, cacheKey, IDEMPOTENCY_TTL_SECS, run);
        if (replay) res.setHeader("Idempotent-Replay", "true");
        return res.status(value.status).json(value.body);
      }

      const { status, body } = await run();
      return jsonOk(res, body, status);
    })
  );

  // GET /payments/verify/:bookingId/ -> { status }
  router.get(
    "/verify/:bookingId",
    requireAuth,
    asyncHandler(async (req, res) => {
      const bookingId = bookingIdOf(req.params);
      jsonOk(res, await payments.verify(bookingId, { userId: getAuth(res).userId }));
    })
  );

  return router;
}
