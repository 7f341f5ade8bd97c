/**
 * Authorization policy: one place that decides who may read or mutate which record.
 * Services call `authorize` before touching a record; routes only establish *who* the caller is.
 */
import { ForbiddenError, NotFoundError, UnauthorizedError } from "../../utils/errors.js";

export type Caller = { userId: string };

export type Action = "read" | "update" | "delete";

export type Resource =
  | { kind: "listing"; createdBy: string }
  | { kind: "review"; reviewerId: string }
  | { kind: "booking"; userId: string }
  | { kind: "payment"; bookingOwnerId: string };

function ownerOf(resource: Resource): string {
  switch (resource.kind) {
    case "listing":
      return resource.createdBy;
    case "review":
      return resource.reviewerId;
    case "booking":
      return resource.userId;
    case "payment":
      return resource.bookingOwnerId;
  }
}

/** Listings and reviews are public to read; bookings and payments are owner-only for everything. */
function isPublicRead(resource: Resource): boolean {
  return resource.kind === "listing" || resource.kind === "review";
}

export function can(caller: Caller | null, action: Action, resource: Resource): boolean {
  if (action === "read" && isPublicRead(resource)) return true;
  if (!caller) return false;
  return ownerOf(resource) === caller.userId;
}

/**
 * Throws when `can` denies. Owner-scoped records answer 404 so ids cannot be probed;
 * listings are publicly visible, so a denied mutation there is a plain 403.
 */
export function authorize(caller: Caller | null, action: Action, resource: Resource): void {
  if (can(caller, action, resource)) return;
  if (!caller) throw new UnauthorizedError();
  if (resource.kind === "listing") throw new ForbiddenError();
  throw new NotFoundError();
}
