/**
 * Great-circle distance helpers
 */

export interface Coordinates {
  lat: number;
  lng: number;
}

export const EARTH_RADIUS_KM = 6371.0;

function toRadians(degrees: number): number {
  return degrees * Math.PI / 180;
}

/**
 * Calculate haversine distance between two points in kilometers
 */
export function haversineDistanceKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.lat - from.lat);
  const dLng = toRadians(to.lng - from.lng);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.lat)) * Math.cos(toRadians(to.lat)) *
    Math.sin(dLng / 2) * Math.sin(dLng / 2);
  // Clamp: rounding can push `a` a hair above 1 for antipodal points
  const c = 2 * Math.asin(Math.sqrt(Math.min(1, a)));
  return EARTH_RADIUS_KM * c;
}
