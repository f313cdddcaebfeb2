/**
 * Reference data consumed by the calculator
 */

import type { Coordinates } from '../geo/distance.js';
import type { SectorGeometry } from '../geo/polygon.js';
import type { Money } from '../pricing/decimal.js';

export interface Region {
  id: number;
  name: string;
  type: string | null;
}

/**
 * Calculation parameters of a region, one per region at most
 */
export interface RegionTariff {
  regionId: number;
  /** Driver hourly rate */
  driverHourlyRate: Money;
  /** Planned working hours per trip */
  plannedWorkHours: Money;
  fuelPricePerLiter: Money;
  /** Liters per 100 km */
  fuelConsumptionPer100km: Money;
  /** Vehicle depreciation coefficient applied to fuel cost */
  depreciationCoefficient: Money;
  warehouseProcessingPerKg: Money;
  /** Company revenue per kg */
  serviceFeePerKg: Money;
  deliveryPointCost: Money;
  /** Cargo weight of a standard trip, kg */
  standardTripWeight: Money;
  standardBoxLength: number;
  standardBoxWidth: number;
  standardBoxHeight: number;
  standardBoxMaxWeight: Money;
  minPointsForDiscount: number;
  discountStepPoints: number;
  initialDiscountPercent: Money;
  discountStepPercent: Money;
}

export type RegionTariffPatch = Partial<Omit<RegionTariff, 'regionId'>>;

export interface DistributionCenter {
  id: number;
  regionId: number;
  name: string;
  address: string | null;
  location: Coordinates;
  isActive: boolean;
}

export interface Sector {
  id: number;
  regionId: number;
  name: string;
  boundary: SectorGeometry;
}

export interface DeliveryPoint {
  id: number;
  name: string;
  location: Coordinates;
  isActive: boolean;
}

/**
 * One (delivery point, containing sector) pair
 */
export interface PointSectorMatch {
  pointId: number;
  sectorId: number;
}

/**
 * Point-in-time reads over reference data; writes are single-tariff atomic updates
 */
export interface ReferenceDataStore {
  getRegion(regionId: number): Promise<Region | null>;
  getTariff(regionId: number): Promise<RegionTariff | null>;
  /** Apply a partial update; null when the region has no tariff */
  updateTariff(regionId: number, patch: RegionTariffPatch): Promise<RegionTariff | null>;
  getActiveDistributionCenters(): Promise<DistributionCenter[]>;
  /** Active points among `pointIds` that lie inside a sector of the region */
  resolvePoints(pointIds: number[], regionId: number): Promise<PointSectorMatch[]>;
  countSectors(regionId: number): Promise<number>;
}
