import "dotenv/config";
import mongoose, { type Model } from "mongoose";

import { closeMongo, connectMongo } from "../src/config/db.js";
import { Booking } from "../src/modules/bookings/model.js";
import { Listing } from "../src/modules/listings/model.js";
import { Notification } from "../src/modules/notifications/model.js";
import { Payment } from "../src/modules/payments/model.js";
import { Review } from "../src/modules/reviews/model.js";
import { User } from "../src/modules/users/model.js";

// every model whose indexes the app relies on (unique ones included)
const models: Array<Pick<Model<unknown>, "syncIndexes" | "modelName" | "collection">> = [
  User,
  Listing,
  Review,
  Booking,
  Payment,
  Notification,
];

async function main() {
  await connectMongo();

  // 1) Sync model indexes (creates collections if needed)
  for (const m of models) {
    console.log(`-> syncing indexes for ${m.modelName}...`);
    await m.syncIndexes();
  }

  // 2) Print what ended up on each collection
  const db = mongoose.connection.db;
  if (!db) throw new Error("Mongo connection has no database handle");
  for (const m of models) {
    const colName = m.collection.collectionName;
    try {
      const exists = await db.listCollections({ name: colName }).hasNext();
      if (!exists) {
        console.log(`${colName}: (no collection yet)`);
        continue;
      }
      const idx = await db.collection(colName).indexes();
      console.log(
        `${colName} indexes:`,
        idx.map((i) => i.name)
      );
    } catch (e) {
      console.log(`${colName}: could not list indexes ->`, e instanceof Error ? e.message : String(e));
    }
  }

  await closeMongo();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
