/**
 * Trip Ranker
 * Stable preference sort of trip advice: running trips with a preferred
 * (high-speed or international) product first, cancelled ones last.
 */

import { isRecord } from '../core/http-client.js';
import type { TripCandidate } from '../types/ns.types.js';

export const CANCELLED_STATUS = 'CANCELLED';

export function isCancelled(candidate: TripCandidate): boolean {
  return candidate.status === CANCELLED_STATUS;
}

/**
 * True when any leg's product category is in the preferred set
 */
export function hasPreferredCategory(candidate: TripCandidate, preferred: ReadonlySet<string>): boolean {
  const legs = candidate.legs;
  if (!Array.isArray(legs)) return false;

  return legs.some(leg => {
    if (!isRecord(leg)) return false;
    const product = leg.product;
    if (!isRecord(product)) return false;
    const category = product.categoryCode;
    return typeof category === 'string' && preferred.has(category);
  });
}

/**
 * 3 preferred and running, 2 running, 1 preferred but cancelled, 0 cancelled
 */
export function scoreTrip(candidate: TripCandidate, preferred: ReadonlySet<string>): number {
  const base = isCancelled(candidate) ? 0 : 2;
  return base + (hasPreferredCategory(candidate, preferred) ? 1 : 0);
}

/**
 * Reorder by descending score; equal scores keep their input order.
 * Returns a new array and leaves the input untouched.
 */
export function rankTrips<T extends TripCandidate>(candidates: readonly T[], preferred: Iterable<string>): T[] {
  const preferredSet = new Set(preferred);

  return candidates
    .map((candidate, position) => ({ candidate, position, score: scoreTrip(candidate, preferredSet) }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .map(entry => entry.candidate);
}
