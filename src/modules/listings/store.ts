/** Listing persistence: Mongo implementation of the ListingStore contract. */
import mongoose, { type FilterQuery } from "mongoose";

import { Listing, type ListingDoc } from "./model.js";
import { connectMongo, isObjectIdHex } from "../../config/db.js";
import type { ListingType } from "../../domain/enums.js";
import { skipFor, toPage, type Page, type SortSpec } from "../../utils/query.js";

export type ListingRecord = {
  id: string;
  title: string;
  description: string;
  location: string;
  listingType: ListingType;
  priceCents: number;
  isActive: boolean;
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
};

export type ListingSortField = "createdAt" | "priceCents" | "title";

export type ListingQuery = {
  listingType?: ListingType;
  location?: string;
  /** Case-insensitive substring over title, description and location */
  search?: string;
  sort: SortSpec<ListingSortField>;
  page: number;
  limit: number;
};

export type NewListing = Omit<ListingRecord, "id" | "isActive" | "createdAt" | "updatedAt">;

export type ListingPatch = Partial<
  Pick<ListingRecord, "title" | "description" | "location" | "listingType" | "priceCents">
>;

export interface ListingStore {
  /** Active listings only. */
  list(q: ListingQuery): Promise<Page<ListingRecord>>;
  /** Any listing, active or not. */
  findById(id: string): Promise<ListingRecord | null>;
  create(input: NewListing): Promise<ListingRecord>;
  update(id: string, patch: ListingPatch): Promise<ListingRecord | null>;
  deactivate(id: string): Promise<void>;
}

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toRecord(doc: ListingDoc): ListingRecord {
  return {
    id: String(doc._id),
    title: doc.title,
    description: doc.description,
    location: doc.location,
    listingType: doc.listingType,
    priceCents: doc.priceCents,
    isActive: doc.isActive,
    createdBy: String(doc.createdBy),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoListingStore implements ListingStore {
  async list(q: ListingQuery) {
    await connectMongo();
    const filter: FilterQuery<ListingDoc> = { isActive: true };
    if (q.listingType) filter.listingType = q.listingType;
    if (q.location) filter.location = q.location;
    if (q.search) {
      const rx = new RegExp(escapeRegex(q.search), "i");
      filter.$or = [{ title: rx }, { description: rx }, { location: rx }];
    }

    const docs = await Listing.find(filter)
      .sort({ [q.sort.field]: q.sort.direction, _id: q.sort.direction })
      .skip(skipFor(q.page, q.limit))
      .limit(q.limit + 1) // one extra to compute hasMore
      .exec();
    return toPage(docs.map(toRecord), q.page, q.limit);
  }

  async findById(id: string) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Listing.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async create(input: NewListing) {
    await connectMongo();
    const doc = await Listing.create({
      ...input,
      createdBy: new mongoose.Types.ObjectId(input.createdBy),
    });
    return toRecord(doc);
  }

  async update(id: string, patch: ListingPatch) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Listing.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true }).exec();
    return doc ? toRecord(doc) : null;
  }

  async deactivate(id: string) {
    if (!isObjectIdHex(id)) return;
    await connectMongo();
    await Listing.updateOne({ _id: id }, { $set: { isActive: false } }).exec();
  }
}
