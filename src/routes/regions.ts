/**
 * GET/PATCH /api/v1/regions/:regionId/pricing endpoint handlers
 */

import { z } from 'zod/v4';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ApiError, invalidRequest, type ApiErrorResponse } from '../errors.js';
import type { Money } from '../pricing/decimal.js';
import { TariffFieldsSchema as F } from '../store/reference-data.js';
import type { ReferenceDataStore, RegionTariff, RegionTariffPatch } from '../store/types.js';

const RegionParamsSchema = z.object({
  regionId: z.coerce.number().int().positive(),
});

/**
 * Partial update body; nested objects are partial as well.
 * A null field is left unchanged, like an absent one.
 */
const PricingUpdateSchema = z.object({
  driver_hourly_rate: F.driverHourlyRate.nullish(),
  planned_work_hours: F.plannedWorkHours.nullish(),
  fuel_price_per_liter: F.fuelPricePerLiter.nullish(),
  fuel_consumption_per_100km: F.fuelConsumptionPer100km.nullish(),
  depreciation_coefficient: F.depreciationCoefficient.nullish(),
  warehouse_processing_per_kg: F.warehouseProcessingPerKg.nullish(),
  service_fee_per_kg: F.serviceFeePerKg.nullish(),
  delivery_point_cost: F.deliveryPointCost.nullish(),
  standard_trip_weight: F.standardTripWeight.nullish(),
  standard_box: z.object({
    length: F.standardBoxLength.nullish(),
    width: F.standardBoxWidth.nullish(),
    height: F.standardBoxHeight.nullish(),
    max_weight: F.standardBoxMaxWeight.nullish(),
  }).nullish(),
  discount: z.object({
    min_points: F.minPointsForDiscount.nullish(),
    step_points: F.discountStepPoints.nullish(),
    initial_percent: F.initialDiscountPercent.nullish(),
    step_percent: F.discountStepPercent.nullish(),
  }).nullish(),
}).strict();

type PricingUpdate = z.infer<typeof PricingUpdateSchema>;

export interface PricingResponse {
  driver_hourly_rate: string;
  planned_work_hours: string;
  fuel_price_per_liter: string;
  fuel_consumption_per_100km: string;
  depreciation_coefficient: string;
  warehouse_processing_per_kg: string;
  service_fee_per_kg: string;
  delivery_point_cost: string;
  standard_trip_weight: string;
  standard_box: {
    length: number;
    width: number;
    height: number;
    max_weight: string;
  };
  discount: {
    min_points: number;
    step_points: number;
    initial_percent: string;
    step_percent: string;
  };
}

function fixed(value: Money, places = 2): string {
  return value.toFixed(places);
}

/**
 * Tariff as shown to API clients: decimals as strings, box and discount grouped
 */
export function toPricingResponse(tariff: RegionTariff): PricingResponse {
  return {
    driver_hourly_rate: fixed(tariff.driverHourlyRate),
    planned_work_hours: fixed(tariff.plannedWorkHours),
    fuel_price_per_liter: fixed(tariff.fuelPricePerLiter),
    fuel_consumption_per_100km: fixed(tariff.fuelConsumptionPer100km),
    depreciation_coefficient: fixed(tariff.depreciationCoefficient, 4),
    warehouse_processing_per_kg: fixed(tariff.warehouseProcessingPerKg),
    service_fee_per_kg: fixed(tariff.serviceFeePerKg),
    delivery_point_cost: fixed(tariff.deliveryPointCost),
    standard_trip_weight: fixed(tariff.standardTripWeight),
    standard_box: {
      length: tariff.standardBoxLength,
      width: tariff.standardBoxWidth,
      height: tariff.standardBoxHeight,
      max_weight: fixed(tariff.standardBoxMaxWeight),
    },
    discount: {
      min_points: tariff.minPointsForDiscount,
      step_points: tariff.discountStepPoints,
      initial_percent: fixed(tariff.initialDiscountPercent),
      step_percent: fixed(tariff.discountStepPercent),
    },
  };
}

/**
 * Flatten the update body into store field names
 */
export function toTariffPatch(update: PricingUpdate): RegionTariffPatch {
  return {
    driverHourlyRate: update.driver_hourly_rate ?? undefined,
    plannedWorkHours: update.planned_work_hours ?? undefined,
    fuelPricePerLiter: update.fuel_price_per_liter ?? undefined,
    fuelConsumptionPer100km: update.fuel_consumption_per_100km ?? undefined,
    depreciationCoefficient: update.depreciation_coefficient ?? undefined,
    warehouseProcessingPerKg: update.warehouse_processing_per_kg ?? undefined,
    serviceFeePerKg: update.service_fee_per_kg ?? undefined,
    deliveryPointCost: update.delivery_point_cost ?? undefined,
    standardTripWeight: update.standard_trip_weight ?? undefined,
    standardBoxLength: update.standard_box?.length ?? undefined,
    standardBoxWidth: update.standard_box?.width ?? undefined,
    standardBoxHeight: update.standard_box?.height ?? undefined,
    standardBoxMaxWeight: update.standard_box?.max_weight ?? undefined,
    minPointsForDiscount: update.discount?.min_points ?? undefined,
    discountStepPoints: update.discount?.step_points ?? undefined,
    initialDiscountPercent: update.discount?.initial_percent ?? undefined,
    discountStepPercent: update.discount?.step_percent ?? undefined,
  };
}

/**
 * Resolve the region id param and check the region has a tariff
 */
async function findTariff(
  store: ReferenceDataStore,
  params: unknown
): Promise<{ regionId: number; tariff: RegionTariff } | ApiError> {
  const parsed = RegionParamsSchema.safeParse(params);
  if (!parsed.success) {
    return invalidRequest(parsed.error.issues, 'Invalid region id');
  }

  const { regionId } = parsed.data;
  const region = await store.getRegion(regionId);
  if (!region) {
    return new ApiError('NOT_FOUND', `Region with id ${regionId} not found`, 404);
  }

  const tariff = await store.getTariff(regionId);
  if (!tariff) {
    return new ApiError('NOT_FOUND', `Pricing not configured for region ${regionId}`, 404);
  }

  return { regionId, tariff };
}

export function createGetPricingHandler(store: ReferenceDataStore) {
  return async function getPricingHandler(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<PricingResponse | ApiErrorResponse> {
    const found = await findTariff(store, request.params);
    if (found instanceof ApiError) {
      reply.status(found.statusCode);
      return found.toResponse();
    }

    return toPricingResponse(found.tariff);
  };
}

export function createUpdatePricingHandler(store: ReferenceDataStore) {
  return async function updatePricingHandler(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<PricingResponse | ApiErrorResponse> {
    const found = await findTariff(store, request.params);
    if (found instanceof ApiError) {
      reply.status(found.statusCode);
      return found.toResponse();
    }

    const parseResult = PricingUpdateSchema.safeParse(request.body ?? {});
    if (!parseResult.success) {
      const validationError = invalidRequest(parseResult.error.issues);
      reply.status(validationError.statusCode);
      return validationError.toResponse();
    }

    const updated = await store.updateTariff(found.regionId, toTariffPatch(parseResult.data));
    if (!updated) {
      const notFound = new ApiError('NOT_FOUND', `Pricing not configured for region ${found.regionId}`, 404);
      reply.status(notFound.statusCode);
      return notFound.toResponse();
    }

    request.log.info({ regionId: found.regionId }, 'Region pricing updated');
    return toPricingResponse(updated);
  };
}

/**
 * Register region pricing routes
 */
export function registerRegionRoutes(app: FastifyInstance, store: ReferenceDataStore) {
  app.get('/api/v1/regions/:regionId/pricing', createGetPricingHandler(store));
  app.patch('/api/v1/regions/:regionId/pricing', createUpdatePricingHandler(store));
}
