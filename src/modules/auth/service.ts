/** Registration and login: bcrypt password hashes, JWT access tokens. */
import bcrypt from "bcrypt";

import type { LoginInput, RegisterInput } from "./schemas.js";
import { signAccessToken } from "./tokens.js";
import { logger } from "../../config/logger.js";
import { UnauthorizedError } from "../../utils/errors.js";
import type { UserRecord, UserStore } from "../users/store.js";

export type AuthResult = { user: UserRecord; accessToken: string };

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly bcryptRounds: number
  ) {}

  async register(input: RegisterInput): Promise<AuthResult> {
    const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);
    const user = await this.users.create({
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      passwordHash,
    });
    logger.info("auth.registered", { userId: user.id });
    return { user, accessToken: signAccessToken({ sub: user.id }) };
  }

  async login(input: LoginInput): Promise<AuthResult> {
    const found = await this.users.findCredentials(input.email);
    const ok = found ? await bcrypt.compare(input.password, found.passwordHash) : false;
    if (!found || !ok) throw new UnauthorizedError("Invalid email or password.");
    return { user: found.user, accessToken: signAccessToken({ sub: found.user.id }) };
  }
}
