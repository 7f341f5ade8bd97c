import mongoose, { type FilterQuery } from "mongoose";

import { Review, type ReviewDoc } from "./model.js";
import { connectMongo, isDuplicateKeyError, isObjectIdHex } from "../../config/db.js";
import { ValidationError } from "../../utils/errors.js";
import { skipFor, toPage, type Page, type SortSpec } from "../../utils/query.js";

export type ReviewRecord = {
  id: string;
  listingId: string;
  reviewerId: string;
  rating: number;
  comment: string;
  createdAt: Date;
  updatedAt: Date;
};

export type ReviewSortField = "createdAt" | "rating";

export type ReviewQuery = {
  listingId?: string;
  rating?: number;
  sort: SortSpec<ReviewSortField>;
  page: number;
  limit: number;
};

export type NewReview = Pick<ReviewRecord, "listingId" | "reviewerId" | "rating" | "comment">;
export type ReviewPatch = Partial<Pick<ReviewRecord, "rating" | "comment">>;

export const DUPLICATE_REVIEW_MESSAGE = "You have already reviewed this listing";

export interface ReviewStore {
  list(q: ReviewQuery): Promise<Page<ReviewRecord>>;
  /** Every review of a listing, newest first. */
  listForListing(listingId: string): Promise<ReviewRecord[]>;
  findById(id: string): Promise<ReviewRecord | null>;
  exists(listingId: string, reviewerId: string): Promise<boolean>;
  /** Throws ValidationError(DUPLICATE_REVIEW_MESSAGE) when the pair already exists. */
  create(input: NewReview): Promise<ReviewRecord>;
  update(id: string, patch: ReviewPatch): Promise<ReviewRecord | null>;
  delete(id: string): Promise<void>;
}

function toRecord(doc: ReviewDoc): ReviewRecord {
  return {
    id: String(doc._id),
    listingId: String(doc.listingId),
    reviewerId: String(doc.reviewerId),
    rating: doc.rating,
    comment: doc.comment,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoReviewStore implements ReviewStore {
  async list(q: ReviewQuery) {
    await connectMongo();
    const filter: FilterQuery<ReviewDoc> = {};
    if (q.listingId) filter.listingId = new mongoose.Types.ObjectId(q.listingId);
    if (q.rating !== undefined) filter.rating = q.rating;

    const docs = await Review.find(filter)
      .sort({ [q.sort.field]: q.sort.direction, _id: q.sort.direction })
      .skip(skipFor(q.page, q.limit))
      .limit(q.limit + 1)
      .exec();
    return toPage(docs.map(toRecord), q.page, q.limit);
  }

  async listForListing(listingId: string) {
    if (!isObjectIdHex(listingId)) return [];
    await connectMongo();
    const docs = await Review.find({ listingId: new mongoose.Types.ObjectId(listingId) })
      .sort({ createdAt: -1, _id: -1 })
      .exec();
    return docs.map(toRecord);
  }

  async findById(id: string) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Review.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async exists(listingId: string, reviewerId: string) {
    await connectMongo();
    const found = await Review.exists({
      listingId: new mongoose.Types.ObjectId(listingId),
      reviewerId: new mongoose.Types.ObjectId(reviewerId),
    }).exec();
    return found !== null;
  }

  async create(input: NewReview) {
    await connectMongo();
    try {
      const doc = await Review.create({
        listingId: new mongoose.Types.ObjectId(input.listingId),
        reviewerId: new mongoose.Types.ObjectId(input.reviewerId),
        rating: input.rating,
        comment: input.comment,
      });
      return toRecord(doc);
    } catch (err) {
      // lost a race against a concurrent create for the same pair
      if (isDuplicateKeyError(err)) throw new ValidationError(DUPLICATE_REVIEW_MESSAGE);
      throw err;
    }
  }

  async update(id: string, patch: ReviewPatch) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Review.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true }).exec();
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string) {
    if (!isObjectIdHex(id)) return;
    await connectMongo();
    await Review.deleteOne({ _id: id }).exec();
  }
}
