import { z } from "zod";

import { LISTING_TYPES } from "../../domain/enums.js";
import { orderingParam, PageQuery } from "../../utils/query.js";

export const ListingInputSchema = z.object({
  title: z.string().trim().min(1, "Title is required").max(200),
  description: z.string().trim().max(5000).default(""),
  location: z.string().trim().min(1, "Location is required").max(200),
  listingType: z.enum(LISTING_TYPES),
  /** Per night, decimal units ("120.50" or 120.5) */
  price: z.coerce.number().min(0.01, "Price must be at least 0.01").max(1_000_000),
});

/** PATCH: every field optional, none defaulted */
export const ListingPatchSchema = ListingInputSchema.partial();

export const ListingListQuery = PageQuery.extend({
  listingType: z.enum(LISTING_TYPES).optional(),
  location: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).max(100).optional(),
  ordering: orderingParam(
    { createdAt: "createdAt", price: "priceCents", title: "title" } as const,
    "-createdAt"
  ),
});

export type ListingInput = z.infer<typeof ListingInputSchema>;
export type ListingPatchInput = z.infer<typeof ListingPatchSchema>;
