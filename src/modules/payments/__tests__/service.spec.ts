import { fakeGateway, TEST_PAYMENT_CONFIG, buildStores, type FakeGateway, type TestStores } from "../../../__tests__/support/harness.js";
import { ConfigurationError, GatewayError, NotFoundError, ValidationError } from "../../../utils/errors.js";
import { NotificationsService } from "../../notifications/service.js";
import type { CallerProfile } from "../../users/service.js";
import { PaymentCoordinator, transactionRef, type PaymentConfig, type PaymentNotifier } from "../service.js";

describe("PaymentCoordinator", () => {
  let stores: TestStores;
  let gateway: FakeGateway;
  let guest: CallerProfile;
  let stranger: CallerProfile;
  let bookingId: string;

  const coordinator = (config: Partial<PaymentConfig> = {}, notifier?: PaymentNotifier) =>
    new PaymentCoordinator({
      bookings: stores.bookings,
      payments: stores.payments,
      gateway,
      notifier: notifier ?? new NotificationsService(stores.notifications),
      config: { ...TEST_PAYMENT_CONFIG, ...config },
    });

  const profile = async (name: string): Promise<CallerProfile> => {
    const u = await stores.users.create({
      email: `${name}@example.com`,
      firstName: name,
      lastName: "Tester",
      passwordHash: "unused",
    });
    return { id: u.id, email: u.email, firstName: u.firstName, lastName: u.lastName };
  };

  beforeEach(async () => {
    stores = buildStores();
    gateway = fakeGateway();
    guest = await profile("guest");
    stranger = await profile("stranger");
    const host = await profile("host");
    const listing = await stores.listings.create({
      title: "Lake cabin",
      description: "",
      location: "Bishoftu",
      listingType: "cabin",
      priceCents: 5000,
      createdBy: host.id,
    });
    const booking = await stores.bookings.create({
      userId: guest.id,
      listingId: listing.id,
      checkIn: new Date("2025-03-01T00:00:00Z"),
      checkOut: new Date("2025-03-03T00:00:00Z"),
      totalPriceCents: 10000,
    });
    bookingId = booking.id;
  });

  describe("initiate", () => {
    it("sends the booking total and stores a pending payment under the gateway reference", async () => {
      gateway.initialize.mockResolvedValue({ ok: true, data: { checkoutUrl: "https://pay/x", txRef: "T1" } });

      const out = await coordinator().initiate(bookingId, guest);

      expect(out).toEqual({ checkout_url: "https://pay/x", transaction_id: "T1" });
      expect(gateway.initialize).toHaveBeenCalledWith("test-secret", {
        amount: "100.00",
        currency: "ETB",
        email: "guest@example.com",
        firstName: "guest",
        lastName: "Tester",
        txRef: `booking_${bookingId}_${guest.id}`,
        returnUrl: `http://localhost:3001/api/payments/verify/${bookingId}/`,
      });
      const payment = await stores.payments.findByBooking(bookingId);
      expect(payment).toMatchObject({ amountCents: 10000, transactionId: "T1", status: "pending" });
    });

    it("falls back to the sent reference when the gateway omits tx_ref", async () => {
      gateway.initialize.mockResolvedValue({ ok: true, data: { checkoutUrl: "https://pay/y" } });

      const out = await coordinator().initiate(bookingId, guest);

      expect(out.transaction_id).toBe(transactionRef(bookingId, guest.id));
    });

    it("keeps the first payment when initiated twice", async () => {
      gateway.initialize
        .mockResolvedValueOnce({ ok: true, data: { checkoutUrl: "https://pay/1", txRef: "T1" } })
        .mockResolvedValueOnce({ ok: true, data: { checkoutUrl: "https://pay/2", txRef: "T2" } });

      await coordinator().initiate(bookingId, guest);
      const second = await coordinator().initiate(bookingId, guest);

      expect(second).toEqual({ checkout_url: "https://pay/2", transaction_id: "T1" });
      expect(stores.payments.rows.size).toBe(1);
    });

    it("writes nothing when the gateway fails", async () => {
      gateway.initialize.mockResolvedValue({ ok: false, status: 503, reason: "HTTP 503" });

      const err = await coordinator().initiate(bookingId, guest).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(GatewayError);
      expect(err).toMatchObject({ status: 400, message: "Failed to initiate payment." });
      expect(stores.payments.rows.size).toBe(0);
    });

    it("fails with a configuration error when no secret key is set", async () => {
      const err = await coordinator({ secretKey: undefined })
        .initiate(bookingId, guest)
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ status: 500, message: "Chapa secret key not configured." });
      expect(gateway.initialize).not.toHaveBeenCalled();
    });

    it("hides other users' bookings", async () => {
      await expect(coordinator().initiate(bookingId, stranger)).rejects.toBeInstanceOf(NotFoundError);
      expect(gateway.initialize).not.toHaveBeenCalled();
    });

    it("refuses a cancelled booking", async () => {
      await stores.bookings.update(bookingId, { status: "cancelled" });

      await expect(coordinator().initiate(bookingId, guest)).rejects.toBeInstanceOf(ValidationError);
      expect(gateway.initialize).not.toHaveBeenCalled();
    });
  });

  describe("verify", () => {
    let paymentId: string;

    beforeEach(async () => {
      const { payment } = await stores.payments.getOrCreate({ bookingId, amountCents: 10000, transactionId: "T1" });
      paymentId = payment.id;
    });

    it("completes the payment, confirms the booking and notifies the owner", async () => {
      gateway.verify.mockResolvedValue({ ok: true, data: { status: "success" } });

      const out = await coordinator().verify(bookingId, { userId: guest.id });

      expect(out).toEqual({ status: "completed" });
      expect(gateway.verify).toHaveBeenCalledWith("test-secret", "T1");
      expect((await stores.payments.findByBooking(bookingId))?.status).toBe("completed");
      expect((await stores.bookings.findById(bookingId))?.status).toBe("confirmed");

      const [note] = await stores.notifications.listForUser(guest.id, 10);
      expect(note).toMatchObject({
        type: "payment.completed",
        context: { bookingId, paymentId, transactionId: "T1" },
      });
    });

    it("marks the payment failed and leaves the booking pending", async () => {
      gateway.verify.mockResolvedValue({ ok: true, data: { status: "failed" } });

      await expect(coordinator().verify(bookingId, { userId: guest.id })).resolves.toEqual({ status: "failed" });
      expect((await stores.bookings.findById(bookingId))?.status).toBe("pending");
    });

    it("leaves the status unchanged for an unrecognised gateway status", async () => {
      gateway.verify.mockResolvedValue({ ok: true, data: { status: "pending" } });

      await expect(coordinator().verify(bookingId, { userId: guest.id })).resolves.toEqual({ status: "pending" });
      expect(stores.notifications.rows.size).toBe(0);
    });

    it("does not query the gateway again once the payment is terminal", async () => {
      await stores.payments.updateStatus(paymentId, "completed");

      const out = await coordinator({ secretKey: undefined }).verify(bookingId, { userId: guest.id });

      expect(out).toEqual({ status: "completed" });
      expect(gateway.verify).not.toHaveBeenCalled();
    });

    it("keeps the stored status when the secret key is missing", async () => {
      await expect(coordinator({ secretKey: undefined }).verify(bookingId, { userId: guest.id })).rejects.toBeInstanceOf(
        ConfigurationError
      );
      expect((await stores.payments.findByBooking(bookingId))?.status).toBe("pending");
    });

    it("persists nothing when the gateway fails", async () => {
      gateway.verify.mockResolvedValue({ ok: false, status: 0, reason: "ECONNRESET: socket hang up" });

      const err = await coordinator().verify(bookingId, { userId: guest.id }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(GatewayError);
      expect(err).toMatchObject({ message: "Failed to verify payment." });
      expect((await stores.payments.findByBooking(bookingId))?.status).toBe("pending");
    });

    it("is not found for another user or a booking without payment", async () => {
      await expect(coordinator().verify(bookingId, { userId: stranger.id })).rejects.toBeInstanceOf(NotFoundError);

      await stores.payments.deleteByBooking(bookingId);
      await expect(coordinator().verify(bookingId, { userId: guest.id })).rejects.toBeInstanceOf(NotFoundError);
      expect(gateway.verify).not.toHaveBeenCalled();
    });

    it("still answers when the notifier throws", async () => {
      gateway.verify.mockResolvedValue({ ok: true, data: { status: "success" } });
      const notifier: PaymentNotifier = { paymentSettled: jest.fn().mockRejectedValue(new Error("boom")) };

      await expect(coordinator({}, notifier).verify(bookingId, { userId: guest.id })).resolves.toEqual({
        status: "completed",
      });
    });
  });
});
