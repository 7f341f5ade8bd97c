import { Router } from "express";

import { toPublicUser, type UsersService } from "./service.js";
import { getAuth, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

export function createUsersRouter(users: UsersService) {
  const router = Router();

  // current user
  router.get(
    "/me",
    requireAuth,
    asyncHandler(async (_req, res) => {
      const { userId } = getAuth(res);
      const user = await users.getProfile(userId);
      jsonOk(res, { user: toPublicUser(user) });
    })
  );

  return router;
}
