import { startTestApp, type TestApp } from "../../../__tests__/support/harness.js";

describe("payments routes", () => {
  let t: TestApp;
  let guestAuth: { Authorization: string };
  let bookingId: string;

  async function setup(app: TestApp) {
    const host = await app.signUp("host");
    const guest = await app.signUp("guest");
    const listing = await app.http.post(
      "/api/listings",
      { title: "Lake cabin", location: "Bishoftu", listingType: "cabin", price: 50 },
      { headers: host.auth }
    );
    const booking = await app.http.post(
      "/api/bookings",
      { listing: listing.data.id, checkIn: "2025-03-01", checkOut: "2025-03-03" },
      { headers: guest.auth }
    );
    return { guestAuth: guest.auth, bookingId: String(booking.data.id) };
  }

  beforeEach(async () => {
    t = await startTestApp();
    ({ guestAuth, bookingId } = await setup(t));
  });

  afterEach(async () => {
    await t.close();
  });

  it("initiates a checkout", async () => {
    t.gateway.initialize.mockResolvedValue({ ok: true, data: { checkoutUrl: "https://pay/x", txRef: "T1" } });

    const res = await t.http.post(`/api/payments/initiate/${bookingId}/`, {}, { headers: guestAuth });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ checkout_url: "https://pay/x", transaction_id: "T1" });
    expect(t.gateway.initialize.mock.calls[0][1].amount).toBe("100.00");
  });

  it("requires authentication", async () => {
    const res = await t.http.post(`/api/payments/initiate/${bookingId}/`, {});

    expect(res.status).toBe(401);
    expect(res.data).toEqual({ error: "Authentication credentials were not provided." });
  });

  it("replays the first response for a repeated idempotency key", async () => {
    t.gateway.initialize
      .mockResolvedValueOnce({ ok: true, data: { checkoutUrl: "https://pay/1", txRef: "T1" } })
      .mockResolvedValueOnce({ ok: true, data: { checkoutUrl: "https://pay/2", txRef: "T2" } });
    const headers = { ...guestAuth, "X-Idempotency-Key": "checkout-1" };

    const first = await t.http.post(`/api/payments/initiate/${bookingId}/`, {}, { headers });
    const second = await t.http.post(`/api/payments/initiate/${bookingId}/`, {}, { headers });

    expect(second.status).toBe(200);
    expect(second.data).toEqual(first.data);
    expect(second.headers["idempotent-replay"]).toBe("true");
    expect(t.gateway.initialize).toHaveBeenCalledTimes(1);
  });

  it("maps a gateway failure to 400", async () => {
    t.gateway.initialize.mockResolvedValue({ ok: false, status: 503, reason: "HTTP 503" });

    const res = await t.http.post(`/api/payments/initiate/${bookingId}/`, {}, { headers: guestAuth });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: "Failed to initiate payment." });
    expect(t.stores.payments.rows.size).toBe(0);
  });

  it("answers 404 for another user's booking", async () => {
    const other = await t.signUp("other");

    const res = await t.http.get(`/api/payments/verify/${bookingId}/`, { headers: other.auth });

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: "Not found." });
  });

  it("answers 404 for a booking id that is not an ObjectId", async () => {
    const initiate = await t.http.post("/api/payments/initiate/not-an-id/", {}, { headers: guestAuth });
    const verify = await t.http.get("/api/payments/verify/42/", { headers: guestAuth });

    expect(initiate.status).toBe(404);
    expect(initiate.data).toEqual({ error: "Not found." });
    expect(verify.status).toBe(404);
    expect(verify.data).toEqual({ error: "Not found." });
    expect(t.gateway.initialize).not.toHaveBeenCalled();
  });

  it("verifies a payment and leaves an unread notification", async () => {
    t.gateway.initialize.mockResolvedValue({ ok: true, data: { checkoutUrl: "https://pay/x", txRef: "T1" } });
    t.gateway.verify.mockResolvedValue({ ok: true, data: { status: "success" } });
    await t.http.post(`/api/payments/initiate/${bookingId}/`, {}, { headers: guestAuth });

    const verified = await t.http.get(`/api/payments/verify/${bookingId}/`, { headers: guestAuth });
    expect(verified.status).toBe(200);
    expect(verified.data).toEqual({ status: "completed" });

    const booking = await t.http.get(`/api/bookings/${bookingId}`, { headers: guestAuth });
    expect(booking.data.status).toBe("confirmed");

    const inbox = await t.http.get("/api/notifications", { headers: guestAuth });
    expect(inbox.data.unread).toBe(1);
    expect(inbox.data.items).toHaveLength(1);
    expect(inbox.data.items[0]).toMatchObject({ type: "payment.completed", readAt: null });

    const read = await t.http.post(`/api/notifications/${inbox.data.items[0].id}/read`, {}, { headers: guestAuth });
    expect(read.status).toBe(200);
    expect(read.data.readAt).not.toBeNull();

    const after = await t.http.get("/api/notifications", { headers: guestAuth });
    expect(after.data.unread).toBe(0);
  });
});

describe("payments routes without a secret key", () => {
  it("answers 500 with the configuration message", async () => {
    const t = await startTestApp({ payment: { secretKey: undefined } });
    try {
      const guest = await t.signUp("guest");
      const host = await t.signUp("host");
      const listing = await t.stores.listings.create({
        title: "Loft",
        description: "",
        location: "Addis Ababa",
        listingType: "apartment",
        priceCents: 2500,
        createdBy: host.user.id,
      });
      const booking = await t.stores.bookings.create({
        userId: guest.user.id,
        listingId: listing.id,
        checkIn: new Date("2025-05-01T00:00:00Z"),
        checkOut: new Date("2025-05-02T00:00:00Z"),
        totalPriceCents: 2500,
      });

      const res = await t.http.post(`/api/payments/initiate/${booking.id}/`, {}, { headers: guest.auth });

      expect(res.status).toBe(500);
      expect(res.data).toEqual({ error: "Chapa secret key not configured." });
      expect(t.gateway.initialize).not.toHaveBeenCalled();
    } finally {
      await t.close();
    }
  });
});
