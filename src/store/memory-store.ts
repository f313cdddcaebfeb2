/**
 * In-process reference data store
 */

import { isPointInGeometry } from '../geo/polygon.js';
import type { ReferenceData } from './reference-data.js';
import type {
  DeliveryPoint,
  DistributionCenter,
  PointSectorMatch,
  Region,
  RegionTariff,
  RegionTariffPatch,
  ReferenceDataStore,
  Sector,
} from './types.js';

/**
 * Creates a store over a validated snapshot.
 * Tariff updates swap the whole record, so readers see either the old or the new tariff.
 */
export function createMemoryStore(data: ReferenceData): ReferenceDataStore {
  const regions = new Map<number, Region>(data.regions.map((region) => [region.id, region]));
  const tariffs = new Map<number, RegionTariff>(data.tariffs.map((tariff) => [tariff.regionId, tariff]));
  const centers: DistributionCenter[] = [...data.distributionCenters];
  const points = new Map<number, DeliveryPoint>(data.deliveryPoints.map((point) => [point.id, point]));

  const sectorsByRegion = new Map<number, Sector[]>();
  for (const sector of data.sectors) {
    const list = sectorsByRegion.get(sector.regionId) ?? [];
    list.push(sector);
    sectorsByRegion.set(sector.regionId, list);
  }

  async function getRegion(regionId: number): Promise<Region | null> {
    return regions.get(regionId) ?? null;
  }

  async function getTariff(regionId: number): Promise<RegionTariff | null> {
    return tariffs.get(regionId) ?? null;
  }

  async function updateTariff(regionId: number, patch: RegionTariffPatch): Promise<RegionTariff | null> {
    const current = tariffs.get(regionId);
    if (!current) return null;

    const changes = Object.fromEntries(
      Object.entries(patch).filter(([, value]) => value !== undefined)
    );
    const updated: RegionTariff = { ...current, ...changes, regionId };
    tariffs.set(regionId, updated);
    return updated;
  }

  async function getActiveDistributionCenters(): Promise<DistributionCenter[]> {
    return centers.filter((center) => center.isActive);
  }

  async function resolvePoints(pointIds: number[], regionId: number): Promise<PointSectorMatch[]> {
    const sectors = sectorsByRegion.get(regionId) ?? [];
    const matches: PointSectorMatch[] = [];

    for (const pointId of new Set(pointIds)) {
      const point = points.get(pointId);
      if (!point || !point.isActive) continue;

      for (const sector of sectors) {
        if (isPointInGeometry(point.location, sector.boundary)) {
          matches.push({ pointId, sectorId: sector.id });
        }
      }
    }

    return matches;
  }

  async function countSectors(regionId: number): Promise<number> {
    return sectorsByRegion.get(regionId)?.length ?? 0;
  }

  return {
    getRegion,
    getTariff,
    updateTariff,
    getActiveDistributionCenters,
    resolvePoints,
    countSectors,
  };
}
