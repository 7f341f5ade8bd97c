/** Domain enums (string unions keep JSON clean and easy to index) */

export const LISTING_TYPES = [
  "hotel",
  "apartment",
  "house",
  "villa",
  "resort",
  "hostel",
  "cabin",
] as const;
export type ListingType = (typeof LISTING_TYPES)[number];

/** Booking lifecycle: confirmed once its payment completes */
export const BOOKING_STATUSES = ["pending", "confirmed", "cancelled", "completed"] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

/** Local payment state; `completed` and `failed` are terminal */
export const PAYMENT_STATUSES = ["pending", "completed", "failed"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const TERMINAL_PAYMENT_STATUSES: ReadonlySet<PaymentStatus> = new Set(["completed", "failed"]);
