import mongoose, { Schema, type Model } from "mongoose";

export interface UserDoc extends mongoose.Document {
  email: string;
  firstName: string;
  lastName: string;

  /** Security */
  passwordHash: string;

  /** Timestamps (from { timestamps: true }) */
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<UserDoc>(
  {
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
      match: [/.+@.+\..+/, "Must use a valid email address"],
    },
    firstName: { type: String, required: true, trim: true, maxlength: 50 },
    lastName: { type: String, required: true, trim: true, maxlength: 50 },

    passwordHash: { type: String, required: true, select: false },
  },
  { timestamps: true }
);

export const User: Model<UserDoc> =
  mongoose.models.User || mongoose.model<UserDoc>("User", UserSchema);
