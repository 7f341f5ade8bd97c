import mongoose, { Schema, type Model } from "mongoose";

import { LISTING_TYPES, type ListingType } from "../../domain/enums.js";

export interface ListingDoc extends mongoose.Document {
  title: string;
  description: string;
  location: string;
  listingType: ListingType;
  /** Per night, integer cents */
  priceCents: number;
  /** Soft delete: inactive listings are hidden everywhere */
  isActive: boolean;
  createdBy: mongoose.Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const ListingSchema = new Schema<ListingDoc>(
  {
    title: { type: String, required: true, trim: true, maxlength: 200 },
    description: { type: String, default: "", maxlength: 5000 },
    location: { type: String, required: true, trim: true, maxlength: 200, index: true },
    listingType: { type: String, enum: LISTING_TYPES, required: true, index: true },
    priceCents: { type: Number, required: true, min: 0 },
    isActive: { type: Boolean, default: true, index: true },
    createdBy: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  },
  { timestamps: true }
);

/** Default feed: active listings, newest first */
ListingSchema.index({ isActive: 1, createdAt: -1 });

export const Listing: Model<ListingDoc> =
  mongoose.models.Listing || mongoose.model<ListingDoc>("Listing", ListingSchema);
