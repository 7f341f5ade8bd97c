import mongoose from "mongoose";

import { Payment, type PaymentDoc } from "./model.js";
import { connectMongo, isDuplicateKeyError, isObjectIdHex } from "../../config/db.js";
import type { PaymentStatus } from "../../domain/enums.js";

export type PaymentRecord = {
  id: string;
  bookingId: string;
  amountCents: number;
  transactionId: string;
  status: PaymentStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type NewPayment = Pick<PaymentRecord, "bookingId" | "amountCents" | "transactionId">;

export interface PaymentStore {
  findByBooking(bookingId: string): Promise<PaymentRecord | null>;
  /** Returns the existing payment untouched when the booking already has one. */
  getOrCreate(input: NewPayment): Promise<{ payment: PaymentRecord; created: boolean }>;
  updateStatus(id: string, status: PaymentStatus): Promise<PaymentRecord | null>;
  deleteByBooking(bookingId: string): Promise<void>;
}

function toRecord(doc: PaymentDoc): PaymentRecord {
  return {
    id: String(doc._id),
    bookingId: String(doc.bookingId),
    amountCents: doc.amountCents,
    transactionId: doc.transactionId,
    status: doc.status,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoPaymentStore implements PaymentStore {
  async findByBooking(bookingId: string) {
    if (!isObjectIdHex(bookingId)) return null;
    await connectMongo();
    const doc = await Payment.findOne({ bookingId: new mongoose.Types.ObjectId(bookingId) }).exec();
    return doc ? toRecord(doc) : null;
  }

  async getOrCreate(input: NewPayment) {
    const existing = await this.findByBooking(input.bookingId);
    if (existing) return { payment: existing, created: false };

    try {
      const doc = await Payment.create({
        bookingId: new mongoose.Types.ObjectId(input.bookingId),
        amountCents: input.amountCents,
        transactionId: input.transactionId,
        status: "pending",
      });
      return { payment: toRecord(doc), created: true };
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
      // a concurrent initiate inserted first; its row stands
      const winner = await this.findByBooking(input.bookingId);
      if (!winner) throw err;
      return { payment: winner, created: false };
    }
  }

  async updateStatus(id: string, status: PaymentStatus) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await Payment.findByIdAndUpdate(id, { $set: { status } }, { new: true }).exec();
    return doc ? toRecord(doc) : null;
  }

  async deleteByBooking(bookingId: string) {
    if (!isObjectIdHex(bookingId)) return;
    await connectMongo();
    await Payment.deleteOne({ bookingId: new mongoose.Types.ObjectId(bookingId) }).exec();
  }
}
