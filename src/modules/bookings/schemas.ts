import { z } from "zod";

import { BOOKING_STATUSES } from "../../domain/enums.js";
import { orderingParam, PageQuery } from "../../utils/query.js";

const objectId = z.string().regex(/^[0-9a-f]{24}$/i, "Invalid id");

/** Accepts "2025-03-01" or a full ISO timestamp */
const stayDate = z.coerce.date();

export const BookingCreateSchema = z
  .object({ listing: objectId, checkIn: stayDate, checkOut: stayDate })
  .refine((b) => b.checkOut > b.checkIn, { message: "checkOut must be after checkIn", path: ["checkOut"] });

/** Owners may move dates or cancel; every other status change belongs to the payment flow. */
export const BookingPatchSchema = z.object({
  checkIn: stayDate.optional(),
  checkOut: stayDate.optional(),
  status: z.literal("cancelled").optional(),
});

/** PUT: both dates required */
export const BookingReplaceSchema = BookingPatchSchema.extend({ checkIn: stayDate, checkOut: stayDate });

export const BookingListQuery = PageQuery.extend({
  status: z.enum(BOOKING_STATUSES).optional(),
  listing: objectId.optional(),
  ordering: orderingParam({ createdAt: "createdAt", checkIn: "checkIn" } as const, "-createdAt"),
});

export type BookingCreateInput = z.infer<typeof BookingCreateSchema>;
export type BookingPatchInput = z.infer<typeof BookingPatchSchema>;
