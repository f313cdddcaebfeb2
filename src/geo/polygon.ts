/**
 * Point-in-polygon tests for sector boundaries (GeoJSON, [lng, lat] positions)
 */

import type { MultiPolygon, Polygon, Position } from 'geojson';
import type { Coordinates } from './distance.js';

export type SectorGeometry = Polygon | MultiPolygon;

/**
 * Even-odd ray casting against a single ring
 */
function isPointInRing(point: Coordinates, ring: Position[]): boolean {
  let inside = false;

  for (let i = 0, j = ring.length - 1; i < ring.length; j = i, i += 1) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];

    const crosses =
      (yi > point.lat) !== (yj > point.lat) &&
      point.lng < ((xj - xi) * (point.lat - yi)) / (yj - yi) + xi;

    if (crosses) {
      inside = !inside;
    }
  }

  return inside;
}

/**
 * Check a point against polygon rings: inside the outer ring and outside every hole
 */
function isPointInPolygonRings(point: Coordinates, rings: Position[][]): boolean {
  const [outer, ...holes] = rings;
  if (!outer || outer.length < 4) return false;

  if (!isPointInRing(point, outer)) return false;

  return !holes.some((hole) => isPointInRing(point, hole));
}

/**
 * Check if a point lies inside a sector boundary
 */
export function isPointInGeometry(point: Coordinates, geometry: SectorGeometry): boolean {
  switch (geometry.type) {
    case 'Polygon':
      return isPointInPolygonRings(point, geometry.coordinates);
    case 'MultiPolygon':
      return geometry.coordinates.some((rings) => isPointInPolygonRings(point, rings));
  }
}
