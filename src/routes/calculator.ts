/**
 * POST /api/v1/calculator/* endpoint handlers
 */

import { z } from 'zod/v4';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { CalculatorService } from '../calculator/service.js';
import type { ByPointsResult, CalculationOutcome, EstimateResult } from '../calculator/types.js';
import { fromCalculationError, invalidRequest, sanitizeErrorMessage, toApiError, type ApiErrorResponse } from '../errors.js';

const INTERNAL_MESSAGE = 'Internal server error during calculation';

const SupplierLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const ProductSchema = z.object({
  length_cm: z.number().int().positive(),
  width_cm: z.number().int().positive(),
  height_cm: z.number().int().positive(),
  weight_kg: z.number().positive(),
  items_per_box: z.number().int().positive(),
});

const ByPointsRequestSchema = z.object({
  region_id: z.number().int(),
  supplier_location: SupplierLocationSchema,
  product: ProductSchema,
  delivery_point_ids: z.array(z.number().int()).min(1),
});

const EstimateRequestSchema = z.object({
  region_id: z.number().int(),
  supplier_location: SupplierLocationSchema,
  product: ProductSchema,
  delivery: z.object({
    num_points: z.number().int().positive(),
    num_sectors: z.number().int().positive().optional(),
  }),
});

type ProductBody = z.infer<typeof ProductSchema>;
type LocationBody = z.infer<typeof SupplierLocationSchema>;

/**
 * Money and distance go out as 2-place decimal strings
 */
interface EstimateResponse {
  items_in_standard_box: number;
  cost_per_item: string;
  cost_per_supplier_box: string;
  distance_to_dc_km: string;
  nearest_dc_name: string;
}

interface ByPointsResponse extends EstimateResponse {
  delivery_points_used: number;
  delivery_points_ignored: number;
  sectors_count: number;
}

function toProductSpec(product: ProductBody) {
  return {
    lengthCm: product.length_cm,
    widthCm: product.width_cm,
    heightCm: product.height_cm,
    weightKg: product.weight_kg,
    itemsPerBox: product.items_per_box,
  };
}

function toCoordinates(location: LocationBody) {
  return { lat: location.latitude, lng: location.longitude };
}

function toEstimateResponse(result: EstimateResult): EstimateResponse {
  return {
    items_in_standard_box: result.itemsInStandardBox,
    cost_per_item: result.costPerItem.toFixed(2),
    cost_per_supplier_box: result.costPerSupplierBox.toFixed(2),
    distance_to_dc_km: result.distanceToDcKm.toFixed(2),
    nearest_dc_name: result.nearestDcName,
  };
}

function toByPointsResponse(result: ByPointsResult): ByPointsResponse {
  return {
    ...toEstimateResponse(result),
    delivery_points_used: result.deliveryPointsUsed,
    delivery_points_ignored: result.deliveryPointsIgnored,
    sectors_count: result.sectorsCount,
  };
}

/**
 * Run a calculation and map its outcome to a reply:
 * precondition failures are 400s, anything thrown is an opaque 500
 */
async function respond<T, R>(
  request: FastifyRequest,
  reply: FastifyReply,
  operation: string,
  run: () => Promise<CalculationOutcome<T>>,
  toResponse: (value: T) => R
): Promise<R | ApiErrorResponse> {
  try {
    const outcome = await run();

    if (!outcome.ok) {
      request.log.warn({ kind: outcome.error.kind }, `Validation error in ${operation}: ${outcome.error.message}`);
      const apiError = fromCalculationError(outcome.error);
      reply.status(apiError.statusCode);
      return apiError.toResponse();
    }

    return toResponse(outcome.value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    request.log.error(
      { error: sanitizeErrorMessage(message), stack: error instanceof Error ? error.stack : undefined },
      `Unexpected error in ${operation}`
    );

    const apiError = toApiError(error, INTERNAL_MESSAGE);
    reply.status(apiError.statusCode);
    return apiError.toResponse();
  }
}

/**
 * Create by-points route handler
 */
export function createByPointsHandler(calculator: CalculatorService) {
  return async function byPointsHandler(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<ByPointsResponse | ApiErrorResponse> {
    const parseResult = ByPointsRequestSchema.safeParse(request.body);

    if (!parseResult.success) {
      const validationError = invalidRequest(parseResult.error.issues);
      reply.status(validationError.statusCode);
      return validationError.toResponse();
    }

    const body = parseResult.data;

    return respond(
      request,
      reply,
      'calculate_by_points',
      () => calculator.calculateByPoints({
        regionId: body.region_id,
        supplierLocation: toCoordinates(body.supplier_location),
        product: toProductSpec(body.product),
        deliveryPointIds: body.delivery_point_ids,
      }),
      toByPointsResponse
    );
  };
}

/**
 * Create estimate route handler
 */
export function createEstimateHandler(calculator: CalculatorService) {
  return async function estimateHandler(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<EstimateResponse | ApiErrorResponse> {
    const parseResult = EstimateRequestSchema.safeParse(request.body);

    if (!parseResult.success) {
      const validationError = invalidRequest(parseResult.error.issues);
      reply.status(validationError.statusCode);
      return validationError.toResponse();
    }

    const body = parseResult.data;

    return respond(
      request,
      reply,
      'calculate_estimate',
      () => calculator.calculateEstimate({
        regionId: body.region_id,
        supplierLocation: toCoordinates(body.supplier_location),
        product: toProductSpec(body.product),
        numPoints: body.delivery.num_points,
        numSectors: body.delivery.num_sectors,
      }),
      toEstimateResponse
    );
  };
}

/**
 * Register calculator routes
 */
export function registerCalculatorRoutes(app: FastifyInstance, calculator: CalculatorService) {
  app.post('/api/v1/calculator/by-points', createByPointsHandler(calculator));
  app.post('/api/v1/calculator/estimate', createEstimateHandler(calculator));
}
