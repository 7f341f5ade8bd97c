import { Router } from "express";

import { BookingCreateSchema, BookingListQuery, BookingPatchSchema, BookingReplaceSchema } from "./schemas.js";
import { toPublicBooking, type BookingsService } from "./service.js";
import { getAuth, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam } from "../../utils/query.js";

/** Every route is owner-scoped: another user's booking answers 404. */
export function createBookingsRouter(bookings: BookingsService) {
  const router = Router();
  router.use(requireAuth);

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const q = BookingListQuery.parse(req.query);
      const page = await bookings.list(
        { userId: getAuth(res).userId },
        { status: q.status, listingId: q.listing, sort: q.ordering, page: q.page, limit: q.limit }
      );
      jsonOk(res, { ...page, items: page.items.map(toPublicBooking) });
    })
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const input = BookingCreateSchema.parse(req.body);
      const booking = await bookings.create({ userId: getAuth(res).userId }, input);
      jsonOk(res, toPublicBooking(booking), 201);
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      jsonOk(res, toPublicBooking(await bookings.get({ userId: getAuth(res).userId }, id)));
    })
  );

  router.put(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const input = BookingReplaceSchema.parse(req.body);
      jsonOk(res, toPublicBooking(await bookings.update({ userId: getAuth(res).userId }, id, input)));
    })
  );

  router.patch(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const input = BookingPatchSchema.parse(req.body);
      jsonOk(res, toPublicBooking(await bookings.update({ userId: getAuth(res).userId }, id, input)));
    })
  );

  // POST /bookings/:id/complete (checkout)
  router.post(
    "/:id/complete",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      jsonOk(res, toPublicBooking(await bookings.complete({ userId: getAuth(res).userId }, id)));
    })
  );

  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      await bookings.delete({ userId: getAuth(res).userId }, id);
      res.status(204).end();
    })
  );

  return router;
}
