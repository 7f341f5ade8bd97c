import mongoose, { Schema, type Model } from "mongoose";

import { BOOKING_STATUSES, type BookingStatus } from "../../domain/enums.js";

export interface BookingDoc extends mongoose.Document {
  userId: mongoose.Types.ObjectId;
  listingId: mongoose.Types.ObjectId;
  checkIn: Date; // UTC midnight
  checkOut: Date; // UTC midnight, after checkIn
  totalPriceCents: number;
  status: BookingStatus;
  createdAt: Date;
  updatedAt: Date;
}

const BookingSchema = new Schema<BookingDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    listingId: { type: Schema.Types.ObjectId, ref: "Listing", required: true, index: true },
    checkIn: { type: Date, required: true },
    checkOut: { type: Date, required: true },
    totalPriceCents: { type: Number, required: true, min: 0 },
    status: { type: String, enum: BOOKING_STATUSES, default: "pending", index: true },
  },
  { timestamps: true }
);

BookingSchema.index({ userId: 1, createdAt: -1 });

export const Booking: Model<BookingDoc> =
  mongoose.models.Booking || mongoose.model<BookingDoc>("Booking", BookingSchema);
