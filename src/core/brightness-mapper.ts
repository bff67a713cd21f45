import type { BrightnessBucket } from "../config/types.js";

export type LuxPlacement = {
  step: number;
  /** Set when the reading fell outside every bucket and was saturated. */
  clamped: "below" | "above" | null;
};

/**
 * Buckets are validated at load: sorted, contiguous `[minLux, maxLux)` ranges
 * with consecutive steps. Readings outside the table saturate to the nearest
 * end, so sensor noise never produces an error.
 */
export function locateLux(lux: number, buckets: readonly BrightnessBucket[]): LuxPlacement {
  const first = buckets[0];
  const last = buckets[buckets.length - 1];
  if (!first || !last) return { step: 0, clamped: null };

  if (lux < first.minLux) return { step: first.step, clamped: "below" };
  for (const bucket of buckets) {
    if (bucket.minLux <= lux && lux < bucket.maxLux) {
      return { step: bucket.step, clamped: null };
    }
  }
  return { step: last.step, clamped: "above" };
}

export function mapLuxToStep(lux: number, buckets: readonly BrightnessBucket[]): number {
  return locateLux(lux, buckets).step;
}
