import mongoose, { Schema, type Model } from "mongoose";

export const NOTIFICATION_TYPES = ["payment.completed", "payment.failed"] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export interface NotificationDoc extends mongoose.Document {
  userId: mongoose.Types.ObjectId; // recipient
  type: NotificationType;
  context?: {
    bookingId?: string;
    paymentId?: string;
    transactionId?: string;
  } | null;
  createdAt: Date;
  readAt?: Date | null;
  uniqKey?: string | null; // optional dedupe key
}

const NotificationSchema = new Schema<NotificationDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", index: true, required: true },
    type: { type: String, enum: NOTIFICATION_TYPES, required: true },
    context: {
      bookingId: String,
      paymentId: String,
      transactionId: String,
    },
    readAt: { type: Date, default: null },
    uniqKey: { type: String, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

NotificationSchema.index({ userId: 1, createdAt: -1 });
NotificationSchema.index({ userId: 1, readAt: 1 });
NotificationSchema.index(
  { uniqKey: 1 },
  { unique: true, partialFilterExpression: { uniqKey: { $type: "string" } } }
);

export const Notification: Model<NotificationDoc> =
  mongoose.models.Notification ||
  mongoose.model<NotificationDoc>("Notification", NotificationSchema);
