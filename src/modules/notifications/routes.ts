import { Router } from "express";
import { z } from "zod";

import { toPublicNotification, type NotificationsService } from "./service.js";
import { getAuth, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam } from "../../utils/query.js";

const ListQuery = z.object({ limit: z.coerce.number().int().min(1).max(100).default(50) });

export function createNotificationsRouter(notifications: NotificationsService) {
  const router = Router();

  // GET /notifications -> { items, unread }
  router.get(
    "/",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { limit } = ListQuery.parse(req.query);
      const { items, unread } = await notifications.list(getAuth(res).userId, limit);
      jsonOk(res, { items: items.map(toPublicNotification), unread });
    })
  );

  router.post(
    "/:id/read",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const n = await notifications.markRead(getAuth(res).userId, id);
      jsonOk(res, toPublicNotification(n));
    })
  );

  return router;
}
