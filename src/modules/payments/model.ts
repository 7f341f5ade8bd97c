import mongoose, { Schema, type Model } from "mongoose";

import { PAYMENT_STATUSES, type PaymentStatus } from "../../domain/enums.js";

export interface PaymentDoc extends mongoose.Document {
  bookingId: mongoose.Types.ObjectId;
  amountCents: number;
  transactionId: string; // gateway tx_ref
  status: PaymentStatus;
  createdAt: Date;
  updatedAt: Date;
}

const PaymentSchema = new Schema<PaymentDoc>(
  {
    bookingId: { type: Schema.Types.ObjectId, ref: "Booking", required: true },
    amountCents: { type: Number, required: true, min: 0 },
    transactionId: { type: String, required: true },
    status: { type: String, enum: PAYMENT_STATUSES, default: "pending" },
  },
  { timestamps: true }
);

/** At most one payment per booking; get-or-create leans on this */
PaymentSchema.index({ bookingId: 1 }, { unique: true });
PaymentSchema.index({ transactionId: 1 });

export const Payment: Model<PaymentDoc> =
  mongoose.models.Payment || mongoose.model<PaymentDoc>("Payment", PaymentSchema);
