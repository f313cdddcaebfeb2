import { describe, it, expect } from 'vitest';
import type { MultiPolygon, Polygon } from 'geojson';
import { isPointInGeometry } from './polygon.js';

const SQUARE: Polygon = {
  type: 'Polygon',
  coordinates: [
    [[39.0, 43.0], [40.0, 43.0], [40.0, 44.0], [39.0, 44.0], [39.0, 43.0]],
  ],
};

const SQUARE_WITH_HOLE: Polygon = {
  type: 'Polygon',
  coordinates: [
    [[39.0, 43.0], [40.0, 43.0], [40.0, 44.0], [39.0, 44.0], [39.0, 43.0]],
    [[39.4, 43.4], [39.6, 43.4], [39.6, 43.6], [39.4, 43.6], [39.4, 43.4]],
  ],
};

describe('isPointInGeometry', () => {
  describe('Polygon', () => {
    it('detects a point inside', () => {
      expect(isPointInGeometry({ lat: 43.5, lng: 39.5 }, SQUARE)).toBe(true);
    });

    it('rejects a point outside', () => {
      expect(isPointInGeometry({ lat: 45.0, lng: 39.5 }, SQUARE)).toBe(false);
      expect(isPointInGeometry({ lat: 43.5, lng: 41.0 }, SQUARE)).toBe(false);
    });

    it('treats lat/lng order as GeoJSON [lng, lat]', () => {
      // Swapped coordinates fall outside the square
      expect(isPointInGeometry({ lat: 39.5, lng: 43.5 }, SQUARE)).toBe(false);
    });

    it('excludes points inside a hole', () => {
      expect(isPointInGeometry({ lat: 43.5, lng: 39.5 }, SQUARE_WITH_HOLE)).toBe(false);
      expect(isPointInGeometry({ lat: 43.2, lng: 39.2 }, SQUARE_WITH_HOLE)).toBe(true);
    });

    it('rejects degenerate rings', () => {
      const line: Polygon = { type: 'Polygon', coordinates: [[[39.0, 43.0], [40.0, 44.0], [39.0, 43.0]]] };

      expect(isPointInGeometry({ lat: 43.5, lng: 39.5 }, line)).toBe(false);
    });
  });

  describe('MultiPolygon', () => {
    const multi: MultiPolygon = {
      type: 'MultiPolygon',
      coordinates: [
        [[[39.0, 43.0], [39.5, 43.0], [39.5, 43.5], [39.0, 43.5], [39.0, 43.0]]],
        [[[40.0, 44.0], [40.5, 44.0], [40.5, 44.5], [40.0, 44.5], [40.0, 44.0]]],
      ],
    };

    it('matches a point in any member polygon', () => {
      expect(isPointInGeometry({ lat: 43.2, lng: 39.2 }, multi)).toBe(true);
      expect(isPointInGeometry({ lat: 44.2, lng: 40.2 }, multi)).toBe(true);
    });

    it('rejects a point between member polygons', () => {
      expect(isPointInGeometry({ lat: 43.7, lng: 39.7 }, multi)).toBe(false);
    });
  });
});
