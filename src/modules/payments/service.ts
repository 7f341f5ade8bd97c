// src/modules/payments/service.ts
/**
 * Payment coordinator: hosted-checkout handshake with the gateway plus the local status machine.
 *   pending -> completed | failed   (both terminal)
 * The service never holds funds; it records what the gateway reports against one booking.
 */
import type { PaymentGateway } from "./gateway.js";
import type { PaymentRecord, PaymentStore } from "./store.js";
import { logger } from "../../config/logger.js";
import { TERMINAL_PAYMENT_STATUSES, type PaymentStatus } from "../../domain/enums.js";
import { toDecimalString } from "../../domain/money.js";
import { ConfigurationError, GatewayError, NotFoundError, ValidationError } from "../../utils/errors.js";
import type { BookingRecord, BookingStore } from "../bookings/store.js";
import { authorize, type Caller } from "../policy/policy.js";
import type { CallerProfile } from "../users/service.js";

export const MISSING_SECRET_MESSAGE = "Chapa secret key not configured.";
export const INITIATE_FAILED_MESSAGE = "Failed to initiate payment.";
export const VERIFY_FAILED_MESSAGE = "Failed to verify payment.";

export type SettledPayment = {
  userId: string;
  bookingId: string;
  paymentId: string;
  transactionId: string;
  status: Extract<PaymentStatus, "completed" | "failed">;
};

/** Told about every transition into a terminal status. */
export interface PaymentNotifier {
  paymentSettled(event: SettledPayment): Promise<void>;
}

export type PaymentConfig = {
  /** Undefined means the gateway is unusable; each call fails with a 500 */
  secretKey?: string;
  currency: string;
  publicBaseUrl: string;
};

export type InitiateResult = { checkout_url: string; transaction_id: string };
export type VerifyResult = { status: PaymentStatus };

/** Gateway reference for a booking: unique per booking and traceable to its owner. */
export function transactionRef(bookingId: string, userId: string): string {
  return `booking_${bookingId}_${userId}`;
}

/** Maps the gateway's verify status onto ours; null leaves the stored status as is. */
function mapGatewayStatus(status: string): "completed" | "failed" | null {
  if (status === "success") return "completed";
  if (status === "failed") return "failed";
  return null;
}

export class PaymentCoordinator {
  private readonly bookings: BookingStore;
  private readonly payments: PaymentStore;
  private readonly gateway: PaymentGateway;
  private readonly notifier?: PaymentNotifier;
  private readonly config: PaymentConfig;

  constructor(deps: {
    bookings: BookingStore;
    payments: PaymentStore;
    gateway: PaymentGateway;
    notifier?: PaymentNotifier;
    config: PaymentConfig;
  }) {
    this.bookings = deps.bookings;
    this.payments = deps.payments;
    this.gateway = deps.gateway;
    this.notifier = deps.notifier;
    this.config = deps.config;
  }

  async initiate(bookingId: string, caller: CallerProfile): Promise<InitiateResult> {
    const booking = await this.ownedBooking(bookingId, { userId: caller.id });
    if (booking.status === "cancelled") {
      throw new ValidationError("Cancelled bookings cannot be paid.");
    }
    const secretKey = this.requireSecret();

    const sentRef = transactionRef(booking.id, caller.id);
    const result = await this.gateway.initialize(secretKey, {
      amount: toDecimalString(booking.totalPriceCents),
      currency: this.config.currency,
      email: caller.email,
      firstName: caller.firstName,
      lastName: caller.lastName,
      txRef: sentRef,
      returnUrl: `${this.config.publicBaseUrl.replace(/\/+$/, "")}/api/payments/verify/${booking.id}/`,
    });

    if (!result.ok) {
      logger.warn("payments.gateway_error", {
        op: "initialize",
        bookingId: booking.id,
        status: result.status,
        reason: result.reason,
      });
      throw new GatewayError(INITIATE_FAILED_MESSAGE);
    }

    const { payment, created } = await this.payments.getOrCreate({
      bookingId: booking.id,
      amountCents: booking.totalPriceCents,
      transactionId: result.data.txRef ?? sentRef,
    });
    logger.info("payments.initiated", {
      bookingId: booking.id,
      paymentId: payment.id,
      transactionId: payment.transactionId,
      created,
    });

    return { checkout_url: result.data.checkoutUrl, transaction_id: payment.transactionId };
  }

  async verify(bookingId: string, caller: Caller): Promise<VerifyResult> {
    const booking = await this.ownedBooking(bookingId, caller);
    const payment = await this.payments.findByBooking(booking.id);
    if (!payment) throw new NotFoundError();

    if (TERMINAL_PAYMENT_STATUSES.has(payment.status)) {
      return { status: payment.status };
    }
    const secretKey = this.requireSecret();

    const result = await this.gateway.verify(secretKey, payment.transactionId);
    if (!result.ok) {
      logger.warn("payments.gateway_error", {
        op: "verify",
        bookingId: booking.id,
        transactionId: payment.transactionId,
        status: result.status,
        reason: result.reason,
      });
      throw new GatewayError(VERIFY_FAILED_MESSAGE);
    }

    const next = mapGatewayStatus(result.data.status);
    if (!next) {
      logger.info("payments.verified", {
        bookingId: booking.id,
        paymentId: payment.id,
        gatewayStatus: result.data.status,
        status: payment.status,
      });
      return { status: payment.status };
    }

    const updated = await this.payments.updateStatus(payment.id, next);
    if (!updated) throw new NotFoundError();
    if (next === "completed" && booking.status === "pending") {
      await this.bookings.update(booking.id, { status: "confirmed" });
    }
    logger.info("payments.verified", {
      bookingId: booking.id,
      paymentId: payment.id,
      gatewayStatus: result.data.status,
      status: next,
    });

    await this.notify(booking, updated, next);
    return { status: next };
  }

  private async ownedBooking(bookingId: string, caller: Caller): Promise<BookingRecord> {
    const booking = await this.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError();
    authorize(caller, "read", { kind: "payment", bookingOwnerId: booking.userId });
    return booking;
  }

  private requireSecret(): string {
    if (!this.config.secretKey) throw new ConfigurationError(MISSING_SECRET_MESSAGE);
    return this.config.secretKey;
  }

  /** The status change is already stored; a notifier failure must not undo the response. */
  private async notify(booking: BookingRecord, payment: PaymentRecord, status: "completed" | "failed") {
    if (!this.notifier) return;
    try {
      await this.notifier.paymentSettled({
        userId: booking.userId,
        bookingId: booking.id,
        paymentId: payment.id,
        transactionId: payment.transactionId,
        status,
      });
    } catch (err) {
      logger.error("payments.notify_failed", {
        paymentId: payment.id,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
