import {
  DUPLICATE_REVIEW_MESSAGE,
  type ReviewPatch,
  type ReviewQuery,
  type ReviewRecord,
  type ReviewStore,
} from "./store.js";
import type { ReviewBody, ReviewPatchInput } from "./schemas.js";
import { logger } from "../../config/logger.js";
import { NotFoundError, ValidationError } from "../../utils/errors.js";
import type { Page } from "../../utils/query.js";
import type { ListingStore } from "../listings/store.js";
import { authorize, type Caller } from "../policy/policy.js";

export class ReviewsService {
  constructor(
    private readonly reviews: ReviewStore,
    private readonly listings: ListingStore
  ) {}

  list(q: ReviewQuery): Promise<Page<ReviewRecord>> {
    return this.reviews.list(q);
  }

  async get(id: string): Promise<ReviewRecord> {
    const review = await this.reviews.findById(id);
    if (!review) throw new NotFoundError();
    authorize(null, "read", { kind: "review", reviewerId: review.reviewerId });
    return review;
  }

  /** Listing-scoped action: the listing must exist and be active (404 otherwise). */
  async addToListing(caller: Caller, listingId: string, body: ReviewBody): Promise<ReviewRecord> {
    const listing = await this.listings.findById(listingId);
    if (!listing || !listing.isActive) throw new NotFoundError();
    return this.createFor(caller, listingId, body);
  }

  /** Flat create: an unknown listing is a payload problem (400), not a missing resource. */
  async create(caller: Caller, listingId: string, body: ReviewBody): Promise<ReviewRecord> {
    const listing = await this.listings.findById(listingId);
    if (!listing || !listing.isActive) {
      throw new ValidationError("Invalid listing.", { fieldErrors: { listing: ["Listing does not exist."] } });
    }
    return this.createFor(caller, listingId, body);
  }

  async listForListing(listingId: string): Promise<ReviewRecord[]> {
    const listing = await this.listings.findById(listingId);
    if (!listing || !listing.isActive) throw new NotFoundError();
    return this.reviews.listForListing(listingId);
  }

  async update(caller: Caller, id: string, input: ReviewPatchInput): Promise<ReviewRecord> {
    const review = await this.reviews.findById(id);
    if (!review) throw new NotFoundError();
    authorize(caller, "update", { kind: "review", reviewerId: review.reviewerId });

    const patch: ReviewPatch = {};
    if (input.rating !== undefined) patch.rating = input.rating;
    if (input.comment !== undefined) patch.comment = input.comment;
    const updated = await this.reviews.update(id, patch);
    if (!updated) throw new NotFoundError();
    return updated;
  }

  async delete(caller: Caller, id: string): Promise<void> {
    const review = await this.reviews.findById(id);
    if (!review) throw new NotFoundError();
    authorize(caller, "delete", { kind: "review", reviewerId: review.reviewerId });
    await this.reviews.delete(id);
  }

  private async createFor(caller: Caller, listingId: string, body: ReviewBody): Promise<ReviewRecord> {
    if (await this.reviews.exists(listingId, caller.userId)) {
      throw new ValidationError(DUPLICATE_REVIEW_MESSAGE);
    }
    const review = await this.reviews.create({
      listingId,
      reviewerId: caller.userId,
      rating: body.rating,
      comment: body.comment,
    });
    logger.info("reviews.created", { reviewId: review.id, listingId, reviewerId: caller.userId });
    return review;
  }
}

export function toPublicReview(r: ReviewRecord) {
  return {
    id: r.id,
    listing: r.listingId,
    reviewer: r.reviewerId,
    rating: r.rating,
    comment: r.comment,
    createdAt: r.createdAt,
    updatedAt: r.updatedAt,
  };
}
