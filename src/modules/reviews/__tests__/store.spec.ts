import mongoose from "mongoose";

import { ValidationError } from "../../../utils/errors.js";
import { Review } from "../model.js";
import { DUPLICATE_REVIEW_MESSAGE, MongoReviewStore } from "../store.js";

jest.mock("../../../config/db", () => ({
  ...jest.requireActual("../../../config/db"),
  connectMongo: jest.fn().mockResolvedValue(undefined),
}));

describe("MongoReviewStore.create", () => {
  const input = {
    listingId: new mongoose.Types.ObjectId().toHexString(),
    reviewerId: new mongoose.Types.ObjectId().toHexString(),
    rating: 4,
    comment: "",
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("turns a duplicate (listing, reviewer) insert into a validation error", async () => {
    jest.spyOn(Review, "create").mockRejectedValueOnce({ code: 11000 });

    const err = await new MongoReviewStore().create(input).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ status: 400, message: DUPLICATE_REVIEW_MESSAGE });
  });

  it("rethrows other insert failures", async () => {
    jest.spyOn(Review, "create").mockRejectedValueOnce(new Error("not primary"));

    await expect(new MongoReviewStore().create(input)).rejects.toThrow("not primary");
  });
});
