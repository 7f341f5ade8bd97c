/** User persistence behind an interface so services can run against any backing store. */
import { User, type UserDoc } from "./model.js";
import { connectMongo, isDuplicateKeyError, isObjectIdHex } from "../../config/db.js";
import { ValidationError } from "../../utils/errors.js";

export type UserRecord = {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
};

export interface UserStore {
  findById(id: string): Promise<UserRecord | null>;
  /** Looks up by normalized email and includes the password hash. */
  findCredentials(email: string): Promise<{ user: UserRecord; passwordHash: string } | null>;
  /** Throws ValidationError when the email is taken. */
  create(input: NewUser): Promise<UserRecord>;
}

export const DUPLICATE_EMAIL_MESSAGE = "A user with this email already exists.";

function toRecord(doc: UserDoc): UserRecord {
  return {
    id: String(doc._id),
    email: doc.email,
    firstName: doc.firstName,
    lastName: doc.lastName,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoUserStore implements UserStore {
  async findById(id: string) {
    if (!isObjectIdHex(id)) return null;
    await connectMongo();
    const doc = await User.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async findCredentials(email: string) {
    await connectMongo();
    const doc = await User.findOne({ email: email.trim().toLowerCase() })
      .select("+passwordHash")
      .exec();
    return doc ? { user: toRecord(doc), passwordHash: doc.passwordHash } : null;
  }

  async create(input: NewUser) {
    await connectMongo();
    try {
      const doc = await User.create({
        email: input.email.trim().toLowerCase(),
        firstName: input.firstName,
        lastName: input.lastName,
        passwordHash: input.passwordHash,
      });
      return toRecord(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ValidationError(DUPLICATE_EMAIL_MESSAGE);
      throw err;
    }
  }
}
