import type { BookingPatch, BookingQuery, BookingRecord, BookingStore } from "./store.js";
import type { BookingCreateInput, BookingPatchInput } from "./schemas.js";
import { logger } from "../../config/logger.js";
import { fromCents, timesCents } from "../../domain/money.js";
import { dayBucket, nightsBetween, toUtcMidnight } from "../../utils/dates.js";
import { NotFoundError, ValidationError } from "../../utils/errors.js";
import type { Page } from "../../utils/query.js";
import type { ListingRecord, ListingStore } from "../listings/store.js";
import type { PaymentStore } from "../payments/store.js";
import { authorize, type Caller } from "../policy/policy.js";

/** Nightly price times nights; throws when the stay is empty. */
export function stayTotalCents(listing: ListingRecord, checkIn: Date, checkOut: Date): number {
  const nights = nightsBetween(checkIn, checkOut);
  if (nights < 1) {
    throw new ValidationError("checkOut must be after checkIn.", {
      fieldErrors: { checkOut: ["checkOut must be after checkIn"] },
    });
  }
  return timesCents(listing.priceCents, nights);
}

export class BookingsService {
  constructor(
    private readonly bookings: BookingStore,
    private readonly listings: ListingStore,
    private readonly payments: PaymentStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  list(caller: Caller, q: Omit<BookingQuery, "userId">): Promise<Page<BookingRecord>> {
    return this.bookings.list({ ...q, userId: caller.userId });
  }

  async get(caller: Caller, id: string): Promise<BookingRecord> {
    const booking = await this.bookings.findById(id);
    if (!booking) throw new NotFoundError();
    authorize(caller, "read", { kind: "booking", userId: booking.userId });
    return booking;
  }

  async create(caller: Caller, input: BookingCreateInput): Promise<BookingRecord> {
    const listing = await this.listings.findById(input.listing);
    if (!listing || !listing.isActive) {
      throw new ValidationError("Invalid listing.", { fieldErrors: { listing: ["Listing does not exist."] } });
    }
    const checkIn = toUtcMidnight(input.checkIn);
    const checkOut = toUtcMidnight(input.checkOut);

    const booking = await this.bookings.create({
      userId: caller.userId,
      listingId: listing.id,
      checkIn,
      checkOut,
      totalPriceCents: stayTotalCents(listing, checkIn, checkOut),
    });
    logger.info("bookings.created", {
      bookingId: booking.id,
      listingId: listing.id,
      userId: caller.userId,
      totalPriceCents: booking.totalPriceCents,
    });
    return booking;
  }

  async update(caller: Caller, id: string, input: BookingPatchInput): Promise<BookingRecord> {
    const booking = await this.bookings.findById(id);
    if (!booking) throw new NotFoundError();
    authorize(caller, "update", { kind: "booking", userId: booking.userId });

    const patch: BookingPatch = {};

    if (input.checkIn !== undefined || input.checkOut !== undefined) {
      if (booking.status !== "pending") {
        throw new ValidationError("Only pending bookings can change dates.");
      }
      // the payment row keeps the amount sent to the gateway; moving dates would desync it
      if (await this.payments.findByBooking(booking.id)) {
        throw new ValidationError("Dates cannot change once payment has been initiated.");
      }
      const listing = await this.listings.findById(booking.listingId);
      if (!listing) throw new ValidationError("The booked listing no longer exists.");

      const checkIn = toUtcMidnight(input.checkIn ?? booking.checkIn);
      const checkOut = toUtcMidnight(input.checkOut ?? booking.checkOut);
      patch.checkIn = checkIn;
      patch.checkOut = checkOut;
      patch.totalPriceCents = stayTotalCents(listing, checkIn, checkOut);
    }

    if (input.status === "cancelled" && booking.status !== "cancelled") {
      if (booking.status === "completed") {
        throw new ValidationError("Completed bookings cannot be cancelled.");
      }
      patch.status = "cancelled";
    }

    const updated = await this.bookings.update(id, patch);
    if (!updated) throw new NotFoundError();
    if (patch.status === "cancelled") {
      logger.info("bookings.cancelled", { bookingId: id, userId: caller.userId });
    }
    return updated;
  }

  /** Checkout: a confirmed stay becomes completed once its check-out day has arrived. */
  async complete(caller: Caller, id: string): Promise<BookingRecord> {
    const booking = await this.bookings.findById(id);
    if (!booking) throw new NotFoundError();
    authorize(caller, "update", { kind: "booking", userId: booking.userId });

    if (booking.status === "completed") return booking;
    if (booking.status !== "confirmed") {
      throw new ValidationError("Only confirmed bookings can be completed.");
    }
    if (toUtcMidnight(this.now()) < booking.checkOut) {
      throw new ValidationError("The stay has not reached its check-out date.");
    }

    const updated = await this.bookings.update(id, { status: "completed" });
    if (!updated) throw new NotFoundError();
    logger.info("bookings.completed", { bookingId: id, userId: caller.userId });
    return updated;
  }

  /** Hard delete; the booking's payment record goes with it. */
  async delete(caller: Caller, id: string): Promise<void> {
    const booking = await this.bookings.findById(id);
    if (!booking) throw new NotFoundError();
    authorize(caller, "delete", { kind: "booking", userId: booking.userId });

    await this.payments.deleteByBooking(id);
    await this.bookings.delete(id);
    logger.info("bookings.deleted", { bookingId: id, userId: caller.userId });
  }
}

export function toPublicBooking(b: BookingRecord) {
  return {
    id: b.id,
    user: b.userId,
    listing: b.listingId,
    checkIn: dayBucket(b.checkIn),
    checkOut: dayBucket(b.checkOut),
    totalPrice: fromCents(b.totalPriceCents),
    status: b.status,
    createdAt: b.createdAt,
    updatedAt: b.updatedAt,
  };
}
