/**
 * Money helpers: store money as integer cents.
 * Never store floats in Mongo. Convert at the edges.
 */

export type MoneyCents = number;

/** Parse "1234.56" | 1234.56 into integer cents. */
export function toCents(input: string | number): MoneyCents {
  const n = typeof input === "number" ? input : Number(input.trim());
  if (!Number.isFinite(n)) throw new Error(`Invalid money input: ${input}`);
  return Math.round(n * 100);
}

/** Convert integer cents to decimal units (number). */
export function fromCents(cents: MoneyCents): number {
  return Math.round(cents) / 100;
}

/** Two-decimal string the payment gateway expects ("100.00"). */
export function toDecimalString(cents: MoneyCents): string {
  return fromCents(cents).toFixed(2);
}

/** Multiply cents by a whole count (e.g. nights). */
export function timesCents(cents: MoneyCents, count: number): MoneyCents {
  if (!Number.isInteger(count) || count < 0) throw new Error("Invalid count");
  return Math.round(cents) * count;
}
