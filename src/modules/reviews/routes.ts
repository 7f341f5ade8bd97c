import { Router } from "express";

import { ReviewBodySchema, ReviewCreateSchema, ReviewListQuery, ReviewPatchSchema } from "./schemas.js";
import { toPublicReview, type ReviewsService } from "./service.js";
import { getAuth, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam } from "../../utils/query.js";

export function createReviewsRouter(reviews: ReviewsService) {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const q = ReviewListQuery.parse(req.query);
      const page = await reviews.list({
        listingId: q.listing,
        rating: q.rating,
        sort: q.ordering,
        page: q.page,
        limit: q.limit,
      });
      jsonOk(res, { ...page, items: page.items.map(toPublicReview) });
    })
  );

  router.post(
    "/",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { listing, ...body } = ReviewCreateSchema.parse(req.body);
      const review = await reviews.create({ userId: getAuth(res).userId }, listing, body);
      jsonOk(res, toPublicReview(review), 201);
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      jsonOk(res, toPublicReview(await reviews.get(id)));
    })
  );

  // PUT takes the full body (comment resets to "" when omitted); PATCH any subset
  const update = (schema: typeof ReviewBodySchema | typeof ReviewPatchSchema) =>
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const input = schema.parse(req.body);
      const review = await reviews.update({ userId: getAuth(res).userId }, id, input);
      jsonOk(res, toPublicReview(review));
    });
  router.put("/:id", requireAuth, update(ReviewBodySchema));
  router.patch("/:id", requireAuth, update(ReviewPatchSchema));

  router.delete(
    "/:id",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      await reviews.delete({ userId: getAuth(res).userId }, id);
      res.status(204).end();
    })
  );

  return router;
}
