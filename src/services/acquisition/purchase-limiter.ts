import Bottleneck from 'bottleneck';

/** Upstream rejects bursts of gift purchases; keep at least this gap between calls. */
export const MIN_PURCHASE_SPACING_MS = 500;

/**
 * One purchase call at a time, each starting at least `minTimeMs` after the
 * previous one started.
 */
export function createPurchaseLimiter(minTimeMs: number = MIN_PURCHASE_SPACING_MS): Bottleneck {
  return new Bottleneck({
    maxConcurrent: 1,
    minTime: minTimeMs,
  });
}
