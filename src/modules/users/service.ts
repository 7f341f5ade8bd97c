/** Users service: keeps controllers thin */
import type { UserRecord, UserStore } from "./store.js";
import { NotFoundError } from "../../utils/errors.js";

/** What the payment gateway needs to know about the paying user. */
export type CallerProfile = Pick<UserRecord, "id" | "email" | "firstName" | "lastName">;

export class UsersService {
  constructor(private readonly users: UserStore) {}

  async getProfile(userId: string): Promise<UserRecord> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError();
    return user;
  }
}

/** Safe public shape for API responses */
export function toPublicUser(u: UserRecord) {
  return {
    id: u.id,
    email: u.email,
    firstName: u.firstName,
    lastName: u.lastName,
    fullName: `${u.firstName} ${u.lastName}`.trim(),
    createdAt: u.createdAt,
    updatedAt: u.updatedAt,
  };
}
