import { Router } from "express";

import { ListingInputSchema, ListingListQuery, ListingPatchSchema } from "./schemas.js";
import { toPublicListing, type ListingsService } from "./service.js";
import { getAuth, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam } from "../../utils/query.js";
import { ReviewBodySchema } from "../reviews/schemas.js";
import { toPublicReview, type ReviewsService } from "../reviews/service.js";

export function createListingsRouter(deps: { listings: ListingsService; reviews: ReviewsService }) {
  const router = Router();
  const { listings, reviews } = deps;

  /**
   * GET /listings
   * Public feed of active listings: ?listingType=&location=&search=&ordering=&page=&limit=
   */
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const q = ListingListQuery.parse(req.query);
      const page = await listings.list({
        listingType: q.listingType,
        location: q.location,
        search: q.search,
        sort: q.ordering,
        page: q.page,
        limit: q.limit,
      });
      jsonOk(res, { ...page, items: page.items.map(toPublicListing) });
    })
  );

  router.post(
    "/",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(res);
      const input = ListingInputSchema.parse(req.body);
      const listing = await listings.create({ userId }, input);
      jsonOk(res, toPublicListing(listing), 201);
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      jsonOk(res, toPublicListing(await listings.get(id)));
    })
  );

  // PUT replaces every writable field; PATCH takes any subset
  router.put(
    "/:id",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const input = ListingInputSchema.parse(req.body);
      const listing = await listings.update({ userId: getAuth(res).userId }, id, input);
      jsonOk(res, toPublicListing(listing));
    })
  );

  router.patch(
    "/:id",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const input = ListingPatchSchema.parse(req.body);
      const listing = await listings.update({ userId: getAuth(res).userId }, id, input);
      jsonOk(res, toPublicListing(listing));
    })
  );

  router.delete(
    "/:id",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      await listings.deactivate({ userId: getAuth(res).userId }, id);
      res.status(204).end();
    })
  );

  /** POST /listings/:id/add_review: one review per user per listing */
  router.post(
    "/:id/add_review",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const body = ReviewBodySchema.parse(req.body);
      const review = await reviews.addToListing({ userId: getAuth(res).userId }, id, body);
      jsonOk(res, toPublicReview(review), 201);
    })
  );

  router.get(
    "/:id/reviews",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const items = await reviews.listForListing(id);
      jsonOk(res, items.map(toPublicReview));
    })
  );

  return router;
}
