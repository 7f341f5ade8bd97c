import { Router } from "express";

import { loginSchema, registerSchema } from "./schemas.js";
import type { AuthService } from "./service.js";
import { rateLimit } from "../../middlewares/rateLimit.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { toPublicUser } from "../users/service.js";

export function createAuthRouter(auth: AuthService) {
  const router = Router();

  // Register: names required + password policy; auto-login
  router.post(
    "/register",
    asyncHandler(async (req, res) => {
      const body = registerSchema.parse(req.body);
      const { user, accessToken } = await auth.register(body);
      jsonOk(res, { user: toPublicUser(user), accessToken }, 201);
    })
  );

  // Login: light IP rate limit (5/min)
  router.post(
    "/login",
    rateLimit({ windowMs: 60_000, max: 5 }),
    asyncHandler(async (req, res) => {
      const body = loginSchema.parse(req.body);
      const { user, accessToken } = await auth.login(body);
      jsonOk(res, { user: toPublicUser(user), accessToken });
    })
  );

  return router;
}
