import mongoose, { type FilterQuery } from "mongoose";

import { Booking, type BookingDoc } from "./model.js";
import { connectMongo, isObjectIdHex } from "../../config/db.js";
import type { BookingStatus } from "../../domain/enums.js";
import { skipFor, toPage, type Page, type SortSpec } from "../../utils/query.js";

export type BookingRecord = {
  id: string;
  userId: string;
  listingId: string;
  checkIn: Date;
  checkOut: Date;
  totalPriceCents: number;
  status: BookingStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type BookingSortField = "createdAt" | "checkIn";

export type BookingQuery = {
  /** Always set: bookings are only ever listed for their owner */
  userId: string;
  status?: BookingStatus;
  listingId?: string;
  sort: SortSpec<BookingSortField>;
  page: number;
  limit: number;
};

export type NewBooking = Pick<
  BookingRecord,
  "userId" | "listingId" | "checkIn" | "checkOut" | "totalPriceCents"
>;

export type BookingPatch = Partial<Pick<BookingRecord, "checkIn" | "checkOut" | "totalPriceCents" | "status">>;

export interface BookingStore {
  list(q: BookingQuery): Promise<Page<BookingRecord>>;
  findById(id: string): Promise<BookingRecord | null>;
  create(input: NewBooking): Promise<BookingRecord>;
  update(id: string, patch: BookingPatch): Promise<BookingRecord | null>;
  delete(id: string): Promise<void>;
}

function toRecord(doc: BookingDoc): BookingRecord {
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    listingId: String(doc.listingId),
    checkIn: doc.checkIn,
    checkOut: doc.checkOut,
    totalPriceCents: doc.totalPriceCents,
    status: doc.status,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoBookingStore implements BookingStore {
  async list(q: BookingQuery) {
    await connectMongo();
    const filter: FilterQuery<BookingDoc> = { userId: new mongoose.Types.ObjectId(q.userId) };
    if (q.status) filter.status = q.status;
    if (q.listingId) filter.listingId = new mongoose.Types.ObjectId(q.listingId);

    const docs = await Booking.find(filter)
      .sort({ [q.sort.field]: q.sort.direction, _id: q.sort.direction })
      .skip(skipFor(q.page, q.limit))
      .limit(q.limit + 1)
      .exec();
    return toPage(docs.map(toRecord), q.page, q.limit);
  }

  async findById(id: string) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Booking.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async create(input: NewBooking) {
    await connectMongo();
    const doc = await Booking.create({
      userId: new mongoose.Types.ObjectId(input.userId),
      listingId: new mongoose.Types.ObjectId(input.listingId),
      checkIn: input.checkIn,
      checkOut: input.checkOut,
      totalPriceCents: input.totalPriceCents,
      status: "pending",
    });
    return toRecord(doc);
  }

  async update(id: string, patch: BookingPatch) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Booking.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true }).exec();
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string) {
    if (!isObjectIdHex(id)) return;
    await connectMongo();
    await Booking.deleteOne({ _id: id }).exec();
  }
}
