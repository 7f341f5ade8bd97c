import { startTestApp, type TestApp } from "../../../__tests__/support/harness.js";

type Auth = { Authorization: string };

describe("reviews routes", () => {
  let t: TestApp;
  let alice: { user: { id: string }; auth: Auth };
  let bob: { user: { id: string }; auth: Auth };
  let listingId: string;

  beforeEach(async () => {
    t = await startTestApp();
    alice = await t.signUp("alice");
    bob = await t.signUp("bob");
    const listing = await t.stores.listings.create({
      title: "Lake Cabin",
      description: "",
      location: "Bishoftu",
      listingType: "cabin",
      priceCents: 5000,
      createdBy: alice.user.id,
    });
    listingId = listing.id;
  });

  afterEach(async () => {
    await t.close();
  });

  it("creates a review for the caller", async () => {
    const res = await t.http.post("/api/reviews", { listing: listingId, rating: 4, comment: "Quiet" }, { headers: bob.auth });

    expect(res.status).toBe(201);
    expect(res.data).toMatchObject({ listing: listingId, reviewer: bob.user.id, rating: 4, comment: "Quiet" });
  });

  it("rejects a second review of the same listing", async () => {
    await t.http.post("/api/reviews", { listing: listingId, rating: 4 }, { headers: bob.auth });
    const res = await t.http.post("/api/reviews", { listing: listingId, rating: 5 }, { headers: bob.auth });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: "You have already reviewed this listing" });
  });

  it("rejects a review of an inactive listing", async () => {
    await t.stores.listings.deactivate(listingId);

    const res = await t.http.post("/api/reviews", { listing: listingId, rating: 4 }, { headers: bob.auth });

    expect(res.status).toBe(400);
    expect(res.data.details.fieldErrors.listing).toEqual(["Listing does not exist."]);
  });

  it("filters and orders the public list", async () => {
    const other = await t.stores.listings.create({
      title: "Loft",
      description: "",
      location: "Addis Ababa",
      listingType: "apartment",
      priceCents: 9000,
      createdBy: alice.user.id,
    });
    await t.stores.reviews.create({ listingId, reviewerId: bob.user.id, rating: 3, comment: "" });
    await t.stores.reviews.create({ listingId, reviewerId: alice.user.id, rating: 5, comment: "" });
    await t.stores.reviews.create({ listingId: other.id, reviewerId: bob.user.id, rating: 5, comment: "" });

    const byListing = await t.http.get("/api/reviews", { params: { listing: listingId, ordering: "rating" } });
    const fives = await t.http.get("/api/reviews", { params: { rating: 5 } });

    expect(byListing.data.items.map((r: { rating: number }) => r.rating)).toEqual([3, 5]);
    expect(fives.data.items).toHaveLength(2);
    expect(fives.data.hasMore).toBe(false);
  });

  describe("mutation", () => {
    let reviewId: string;

    beforeEach(async () => {
      const res = await t.http.post("/api/reviews", { listing: listingId, rating: 2 }, { headers: bob.auth });
      reviewId = res.data.id;
    });

    it("is public to read", async () => {
      const res = await t.http.get(`/api/reviews/${reviewId}`);

      expect(res.status).toBe(200);
      expect(res.data.rating).toBe(2);
    });

    it("lets the reviewer update and delete", async () => {
      const patched = await t.http.patch(`/api/reviews/${reviewId}`, { rating: 3 }, { headers: bob.auth });
      expect(patched.status).toBe(200);
      expect(patched.data).toMatchObject({ rating: 3, comment: "" });

      const del = await t.http.delete(`/api/reviews/${reviewId}`, { headers: bob.auth });
      expect(del.status).toBe(204);
      expect((await t.http.get(`/api/reviews/${reviewId}`)).status).toBe(404);
    });

    it("hides the review from everyone else's mutations", async () => {
      const put = await t.http.put(`/api/reviews/${reviewId}`, { rating: 1 }, { headers: alice.auth });
      const del = await t.http.delete(`/api/reviews/${reviewId}`, { headers: alice.auth });

      expect(put.status).toBe(404);
      expect(put.data).toEqual({ error: "Not found." });
      expect(del.status).toBe(404);
      expect(t.stores.reviews.rows.get(reviewId)?.rating).toBe(2);
    });
  });
});
