import type { ListingPatch, ListingQuery, ListingRecord, ListingStore } from "./store.js";
import type { ListingInput, ListingPatchInput } from "./schemas.js";
import { logger } from "../../config/logger.js";
import { fromCents, toCents } from "../../domain/money.js";
import { NotFoundError } from "../../utils/errors.js";
import type { Page } from "../../utils/query.js";
import { authorize, type Caller } from "../policy/policy.js";

export class ListingsService {
  constructor(private readonly listings: ListingStore) {}

  list(q: ListingQuery): Promise<Page<ListingRecord>> {
    return this.listings.list(q);
  }

  /** Active listing or NotFound. */
  async get(id: string): Promise<ListingRecord> {
    const listing = await this.listings.findById(id);
    if (!listing || !listing.isActive) throw new NotFoundError();
    return listing;
  }

  async create(caller: Caller, input: ListingInput): Promise<ListingRecord> {
    const listing = await this.listings.create({
      title: input.title,
      description: input.description,
      location: input.location,
      listingType: input.listingType,
      priceCents: toCents(input.price),
      createdBy: caller.userId,
    });
    logger.info("listings.created", { listingId: listing.id, createdBy: caller.userId });
    return listing;
  }

  async update(caller: Caller, id: string, input: ListingPatchInput): Promise<ListingRecord> {
    const current = await this.get(id);
    authorize(caller, "update", { kind: "listing", createdBy: current.createdBy });

    const patch: ListingPatch = {};
    if (input.title !== undefined) patch.title = input.title;
    if (input.description !== undefined) patch.description = input.description;
    if (input.location !== undefined) patch.location = input.location;
    if (input.listingType !== undefined) patch.listingType = input.listingType;
    if (input.price !== undefined) patch.priceCents = toCents(input.price);

    const updated = await this.listings.update(id, patch);
    if (!updated) throw new NotFoundError();
    return updated;
  }

  /** Soft delete: the record stays, flagged inactive. */
  async deactivate(caller: Caller, id: string): Promise<void> {
    const current = await this.get(id);
    authorize(caller, "delete", { kind: "listing", createdBy: current.createdBy });
    await this.listings.deactivate(id);
    logger.info("listings.deactivated", { listingId: id, by: caller.userId });
  }
}

/** Public shape for API responses */
export function toPublicListing(l: ListingRecord) {
  return {
    id: l.id,
    title: l.title,
    description: l.description,
    location: l.location,
    listingType: l.listingType,
    price: fromCents(l.priceCents),
    isActive: l.isActive,
    createdBy: l.createdBy,
    createdAt: l.createdAt,
    updatedAt: l.updatedAt,
  };
}
