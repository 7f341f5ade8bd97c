import mongoose from "mongoose";

import { Notification, type NotificationDoc, type NotificationType } from "./model.js";
import { connectMongo, isDuplicateKeyError, isObjectIdHex } from "../../config/db.js";

export type NotificationRecord = {
  id: string;
  userId: string;
  type: NotificationType;
  context: { bookingId?: string; paymentId?: string; transactionId?: string } | null;
  readAt: Date | null;
  createdAt: Date;
};

export type NewNotification = {
  userId: string;
  type: NotificationType;
  context?: NotificationRecord["context"];
  uniqKey?: string;
};

export interface NotificationStore {
  /** With a uniqKey, a repeat returns the stored row and `created: false`. */
  insert(input: NewNotification): Promise<{ notification: NotificationRecord; created: boolean }>;
  listForUser(userId: string, limit: number): Promise<NotificationRecord[]>;
  countUnread(userId: string): Promise<number>;
  /** Sets readAt once; null when the id does not belong to the user. */
  markRead(userId: string, id: string, at: Date): Promise<NotificationRecord | null>;
}

function toRecord(doc: NotificationDoc): NotificationRecord {
  const ctx = doc.context;
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    type: doc.type,
    context: ctx
      ? { bookingId: ctx.bookingId, paymentId: ctx.paymentId, transactionId: ctx.transactionId }
      : null,
    readAt: doc.readAt ?? null,
    createdAt: doc.createdAt,
  };
}

export class MongoNotificationStore implements NotificationStore {
  async insert(input: NewNotification) {
    await connectMongo();
    const fields = {
      userId: new mongoose.Types.ObjectId(input.userId),
      type: input.type,
      context: input.context ?? null,
      uniqKey: input.uniqKey ?? null,
    };

    if (!input.uniqKey) {
      const doc = await Notification.create(fields);
      return { notification: toRecord(doc), created: true };
    }

    try {
      const res = await Notification.findOneAndUpdate(
        { uniqKey: input.uniqKey },
        { $setOnInsert: fields },
        { new: true, upsert: true, includeResultMetadata: true }
      ).exec();
      if (!res.value) throw new Error("Notification upsert returned no document");
      return { notification: toRecord(res.value), created: !res.lastErrorObject?.updatedExisting };
    } catch (err) {
      // two upserts on the same key: the loser reads the winner
      if (!isDuplicateKeyError(err)) throw err;
      const doc = await Notification.findOne({ uniqKey: input.uniqKey }).exec();
      if (!doc) throw err;
      return { notification: toRecord(doc), created: false };
    }
  }

  async listForUser(userId: string, limit: number) {
    await connectMongo();
    const docs = await Notification.find({ userId: new mongoose.Types.ObjectId(userId) })
      .sort({ createdAt: -1, _id: -1 })
      .limit(limit)
      .exec();
    return docs.map(toRecord);
  }

  async countUnread(userId: string) {
    await connectMongo();
    return Notification.countDocuments({ userId: new mongoose.Types.ObjectId(userId), readAt: null }).exec();
  }

  async markRead(userId: string, id: string, at: Date) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const filter = { _id: id, userId: new mongoose.Types.ObjectId(userId) };
    await Notification.updateOne({ ...filter, readAt: null }, { $set: { readAt: at } }).exec();
    const doc = await Notification.findOne(filter).exec();
    return doc ? toRecord(doc) : null;
  }
}
