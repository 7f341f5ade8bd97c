/** Mongo connector + ping using Mongoose */
import mongoose from "mongoose";

import { env } from "./env.js";

let connecting: Promise<void> | null = null;

export async function connectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  if (connecting) return connecting;

  connecting = mongoose
    .connect(env.MONGO_URI, { serverSelectionTimeoutMS: 3000 })
    .then(() => {}) // ensure Promise<void>
    .finally(() => {
      connecting = null;
    });

  await connecting;
}

export type DepStatus = { status: "ok" | "error"; message?: string };

export async function pingMongo(): Promise<DepStatus> {
  try {
    await connectMongo();
    const db = mongoose.connection.db;
    if (!db) throw new Error("Mongo connection not ready");
    await db.admin().command({ ping: 1 });
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: err instanceof Error ? err.message : String(err) };
  }
}

export async function closeMongo() {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}

/** E11000 from a unique index (insert or upsert race). */
export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

/** Accepts only 24-hex ObjectId strings (isValidObjectId also lets 12-char strings through). */
export function isObjectIdHex(id: string): boolean {
  return /^[0-9a-f]{24}$/i.test(id);
}
