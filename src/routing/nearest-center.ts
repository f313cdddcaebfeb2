/**
 * Nearest distribution center by road distance
 */

import { haversineDistanceKm, type Coordinates } from '../geo/distance.js';
import type { DistributionCenter } from '../store/types.js';
import type { DistanceMethod, RouteResolver } from './types.js';

/** Centers that get a routed-distance lookup */
export const ROUTED_CANDIDATES = 3;

export interface NearestCenter {
  center: DistributionCenter;
  distanceKm: number;
  method: DistanceMethod;
}

/**
 * Select the active center with the shortest routed distance.
 * Straight-line distance narrows the field to the closest few before any provider call.
 * Returns null when there is no active center.
 */
export async function selectNearestCenter(
  supplier: Coordinates,
  centers: DistributionCenter[],
  resolver: RouteResolver
): Promise<NearestCenter | null> {
  const candidates = centers
    .filter((center) => center.isActive)
    .map((center) => ({ center, straightKm: haversineDistanceKm(supplier, center.location) }))
    .sort((a, b) => a.straightKm - b.straightKm)
    .slice(0, ROUTED_CANDIDATES);

  if (candidates.length === 0) {
    return null;
  }

  const routed = await Promise.all(
    candidates.map(async ({ center }) => {
      const { distanceKm, method } = await resolver.resolve(supplier, center.location);
      return { center, distanceKm, method };
    })
  );

  // Strict comparison keeps the straight-line order on ties
  return routed.reduce((best, candidate) => (candidate.distanceKm < best.distanceKm ? candidate : best));
}
