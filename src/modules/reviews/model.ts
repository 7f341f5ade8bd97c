import mongoose, { Schema, type Model } from "mongoose";

export interface ReviewDoc extends mongoose.Document {
  listingId: mongoose.Types.ObjectId;
  reviewerId: mongoose.Types.ObjectId;
  rating: number;
  comment: string;
  createdAt: Date;
  updatedAt: Date;
}

const ReviewSchema = new Schema<ReviewDoc>(
  {
    listingId: { type: Schema.Types.ObjectId, ref: "Listing", required: true, index: true },
    reviewerId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    rating: { type: Number, required: true, min: 1, max: 5 },
    comment: { type: String, default: "", maxlength: 2000 },
  },
  { timestamps: true }
);

/** One review per (listing, reviewer); the store turns E11000 into a 400 */
ReviewSchema.index({ listingId: 1, reviewerId: 1 }, { unique: true });
ReviewSchema.index({ listingId: 1, createdAt: -1 });

export const Review: Model<ReviewDoc> =
  mongoose.models.Review || mongoose.model<ReviewDoc>("Review", ReviewSchema);
