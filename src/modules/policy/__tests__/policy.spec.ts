import { ForbiddenError, NotFoundError, UnauthorizedError } from "../../../utils/errors.js";
import { authorize, can, type Resource } from "../policy.js";

const owner = { userId: "owner" };
const other = { userId: "other" };

const listing: Resource = { kind: "listing", createdBy: "owner" };
const review: Resource = { kind: "review", reviewerId: "owner" };
const booking: Resource = { kind: "booking", userId: "owner" };
const payment: Resource = { kind: "payment", bookingOwnerId: "owner" };

describe("can", () => {
  it("lets anyone read listings and reviews", () => {
    expect(can(null, "read", listing)).toBe(true);
    expect(can(other, "read", review)).toBe(true);
  });

  it("keeps bookings and payments private to their owner", () => {
    expect(can(owner, "read", booking)).toBe(true);
    expect(can(other, "read", booking)).toBe(false);
    expect(can(null, "read", payment)).toBe(false);
    expect(can(owner, "read", payment)).toBe(true);
  });

  it("allows mutation by the owner only", () => {
    for (const resource of [listing, review, booking, payment]) {
      expect(can(owner, "update", resource)).toBe(true);
      expect(can(owner, "delete", resource)).toBe(true);
      expect(can(other, "update", resource)).toBe(false);
      expect(can(other, "delete", resource)).toBe(false);
    }
  });
});

describe("authorize", () => {
  it("passes silently when allowed", () => {
    expect(() => authorize(owner, "delete", booking)).not.toThrow();
  });

  it("answers 401 without a caller", () => {
    expect(() => authorize(null, "update", listing)).toThrow(UnauthorizedError);
  });

  it("answers 403 for someone else's listing", () => {
    expect(() => authorize(other, "update", listing)).toThrow(ForbiddenError);
  });

  it("answers 404 for someone else's review, booking or payment", () => {
    expect(() => authorize(other, "delete", review)).toThrow(NotFoundError);
    expect(() => authorize(other, "read", booking)).toThrow(NotFoundError);
    expect(() => authorize(other, "read", payment)).toThrow(NotFoundError);
  });
});
