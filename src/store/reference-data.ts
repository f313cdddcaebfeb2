/**
 * Reference data snapshot: JSON schema and loader
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod/v4';
import { money } from '../pricing/decimal.js';
import type { DeliveryPoint, DistributionCenter, Region, RegionTariff, Sector } from './types.js';

/**
 * Money in JSON: decimal string ("55.00") or number
 */
const MoneySchema = z.union([
  z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal number'),
  z.number(),
]).transform((value) => money(value));

const PositiveMoneySchema = MoneySchema.refine((value) => value.greaterThan(0), 'Must be greater than 0');
const NonNegativeMoneySchema = MoneySchema.refine((value) => value.greaterThanOrEqualTo(0), 'Must be at least 0');
const PercentSchema = MoneySchema.refine(
  (value) => value.greaterThanOrEqualTo(0) && value.lessThanOrEqualTo(100),
  'Must be between 0 and 100'
);

const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema).min(4);

const SectorGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(RingSchema).min(1) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(RingSchema).min(1)).min(1) }),
]);

export const TariffFieldsSchema = {
  driverHourlyRate: PositiveMoneySchema,
  plannedWorkHours: PositiveMoneySchema,
  fuelPricePerLiter: PositiveMoneySchema,
  fuelConsumptionPer100km: PositiveMoneySchema,
  depreciationCoefficient: PositiveMoneySchema,
  warehouseProcessingPerKg: NonNegativeMoneySchema,
  serviceFeePerKg: NonNegativeMoneySchema,
  deliveryPointCost: PositiveMoneySchema,
  standardTripWeight: PositiveMoneySchema,
  standardBoxLength: z.number().int().positive(),
  standardBoxWidth: z.number().int().positive(),
  standardBoxHeight: z.number().int().positive(),
  standardBoxMaxWeight: PositiveMoneySchema,
  minPointsForDiscount: z.number().int().positive(),
  discountStepPoints: z.number().int().positive(),
  initialDiscountPercent: PercentSchema,
  discountStepPercent: PercentSchema,
};

const RegionTariffSchema = z.object({
  regionId: z.number().int(),
  ...TariffFieldsSchema,
});

const ReferenceDataSchema = z.object({
  regions: z.array(
    z.object({
      id: z.number().int(),
      name: z.string().min(1),
      type: z.string().nullable().default(null),
    })
  ),
  tariffs: z.array(RegionTariffSchema).default([]),
  distributionCenters: z.array(
    z.object({
      id: z.number().int(),
      regionId: z.number().int(),
      name: z.string().min(1),
      address: z.string().nullable().default(null),
      location: CoordinatesSchema,
      isActive: z.boolean().default(true),
    })
  ).default([]),
  sectors: z.array(
    z.object({
      id: z.number().int(),
      regionId: z.number().int(),
      name: z.string(),
      boundary: SectorGeometrySchema,
    })
  ).default([]),
  deliveryPoints: z.array(
    z.object({
      id: z.number().int(),
      name: z.string(),
      location: CoordinatesSchema,
      isActive: z.boolean().default(true),
    })
  ).default([]),
});

export interface ReferenceData {
  regions: Region[];
  tariffs: RegionTariff[];
  distributionCenters: DistributionCenter[];
  sectors: Sector[];
  deliveryPoints: DeliveryPoint[];
}

/**
 * Validate a raw reference data document
 * @throws ZodError on malformed data
 */
export function parseReferenceData(raw: unknown): ReferenceData {
  const data: ReferenceData = ReferenceDataSchema.parse(raw);

  const regionIds = new Set(data.regions.map((region) => region.id));
  const seen = new Set<number>();
  for (const tariff of data.tariffs) {
    if (!regionIds.has(tariff.regionId)) {
      throw new Error(`Tariff references unknown region ${tariff.regionId}`);
    }
    if (seen.has(tariff.regionId)) {
      throw new Error(`Region ${tariff.regionId} has more than one tariff`);
    }
    seen.add(tariff.regionId);
  }

  return data;
}

/**
 * Read and validate a reference data JSON file
 */
export async function loadReferenceData(path: string): Promise<ReferenceData> {
  const text = await readFile(path, 'utf8');
  return parseReferenceData(JSON.parse(text));
}
