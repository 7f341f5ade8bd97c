import { z } from "zod";

import { orderingParam, PageQuery } from "../../utils/query.js";

const objectId = z.string().regex(/^[0-9a-f]{24}$/i, "Invalid id");

/** Body of POST /listings/:id/add_review (the listing comes from the path) */
export const ReviewBodySchema = z.object({
  rating: z.coerce.number().int().min(1).max(5),
  comment: z.string().trim().max(2000).default(""),
});

/** Body of POST /reviews */
export const ReviewCreateSchema = ReviewBodySchema.extend({ listing: objectId });

export const ReviewPatchSchema = ReviewBodySchema.partial();

export const ReviewListQuery = PageQuery.extend({
  listing: objectId.optional(),
  rating: z.coerce.number().int().min(1).max(5).optional(),
  ordering: orderingParam({ createdAt: "createdAt", rating: "rating" } as const, "-createdAt"),
});

export type ReviewBody = z.infer<typeof ReviewBodySchema>;
export type ReviewPatchInput = z.infer<typeof ReviewPatchSchema>;
