/**
 * Delivery cost calculation: tariff, delivery points, nearest center, pricing, box fitting
 */

import type { Logger } from '../logger.js';
import { fitProduct } from '../pricing/box-fitting.js';
import { money, roundMoney } from '../pricing/decimal.js';
import { calculateTripCosts, finalizeCosts } from '../pricing/engine.js';
import type { ProductSpec } from '../pricing/types.js';
import { selectNearestCenter } from '../routing/nearest-center.js';
import type { RouteResolver } from '../routing/types.js';
import type { ReferenceDataStore, RegionTariff } from '../store/types.js';
import type { Coordinates } from '../geo/distance.js';
import type {
  ByPointsRequest,
  ByPointsResult,
  CalculationError,
  CalculationErrorKind,
  CalculationOutcome,
  EstimateRequest,
  EstimateResult,
} from './types.js';

export interface CalculatorDeps {
  store: ReferenceDataStore;
  resolver: RouteResolver;
  logger: Logger;
}

export interface CalculatorService {
  calculateByPoints(request: ByPointsRequest): Promise<CalculationOutcome<ByPointsResult>>;
  calculateEstimate(request: EstimateRequest): Promise<CalculationOutcome<EstimateResult>>;
}

export interface DeliveryPointSummary {
  numValid: number;
  numIgnored: number;
  numSectors: number;
}

function fail(kind: CalculationErrorKind, message: string): { ok: false; error: CalculationError } {
  return { ok: false, error: { kind, message } };
}

/**
 * Count distinct valid points and distinct sectors.
 * A point inside two sectors is one valid point and two sectors.
 */
export function summarizeDeliveryPoints(
  requestedIds: number[],
  matches: ReadonlyArray<{ pointId: number; sectorId: number }>
): DeliveryPointSummary {
  const validIds = new Set(matches.map((match) => match.pointId));
  const sectorIds = new Set(matches.map((match) => match.sectorId));

  return {
    numValid: validIds.size,
    numIgnored: requestedIds.length - validIds.size,
    numSectors: sectorIds.size,
  };
}

/**
 * Creates the calculator over a data store and a route resolver
 */
export function createCalculatorService(deps: CalculatorDeps): CalculatorService {
  const { store, resolver, logger } = deps;

  async function loadTariff(regionId: number): Promise<RegionTariff | CalculationError> {
    const tariff = await store.getTariff(regionId);
    if (!tariff) {
      return { kind: 'TARIFF_NOT_CONFIGURED', message: `Pricing not configured for region ${regionId}` };
    }
    return tariff;
  }

  /**
   * Shared tail of both modes: nearest center, trip cost, fitting, final rounding
   */
  async function price(
    tariff: RegionTariff,
    supplier: Coordinates,
    product: ProductSpec,
    numPoints: number,
    numSectors: number
  ): Promise<CalculationOutcome<EstimateResult>> {
    const centers = await store.getActiveDistributionCenters();
    const nearest = await selectNearestCenter(supplier, centers, resolver);
    if (!nearest) {
      logger.warn('No distribution centers found');
      return fail('NO_DISTRIBUTION_CENTERS', 'No distribution centers found');
    }

    logger.info(
      { center: nearest.center.name, distanceKm: nearest.distanceKm, method: nearest.method },
      `Selected nearest DC: ${nearest.center.name}`
    );

    const costs = calculateTripCosts(tariff, nearest.distanceKm, numPoints, numSectors);
    const fitting = fitProduct(tariff, product);

    logger.debug(
      { ...fitting, totalTripCost: costs.totalTripCost.toString(), standardBoxCost: costs.standardBoxCost.toString() },
      'Trip cost and product fitting'
    );

    if (fitting.itemsInStandardBox === 0) {
      return fail('PRODUCT_DOES_NOT_FIT', "Product doesn't fit in standard box");
    }

    const final = finalizeCosts(costs.standardBoxCost, fitting.itemsInStandardBox, product.itemsPerBox);

    return {
      ok: true,
      value: {
        itemsInStandardBox: fitting.itemsInStandardBox,
        costPerItem: final.costPerItem,
        costPerSupplierBox: final.costPerSupplierBox,
        distanceToDcKm: roundMoney(money(nearest.distanceKm)),
        nearestDcName: nearest.center.name,
      },
    };
  }

  async function calculateByPoints(request: ByPointsRequest): Promise<CalculationOutcome<ByPointsResult>> {
    const tariff = await loadTariff(request.regionId);
    if ('kind' in tariff) return { ok: false, error: tariff };

    const matches = await store.resolvePoints(request.deliveryPointIds, request.regionId);
    const points = summarizeDeliveryPoints(request.deliveryPointIds, matches);

    logger.info(
      { ...points, matches: matches.length },
      `Delivery points: ${points.numValid} valid, ${points.numIgnored} ignored, ${points.numSectors} sectors`
    );

    if (points.numValid === 0) {
      return fail('NO_VALID_DELIVERY_POINTS', 'No valid delivery points provided');
    }

    const outcome = await price(
      tariff,
      request.supplierLocation,
      request.product,
      points.numValid,
      points.numSectors
    );
    if (!outcome.ok) return outcome;

    return {
      ok: true,
      value: {
        ...outcome.value,
        deliveryPointsUsed: points.numValid,
        deliveryPointsIgnored: points.numIgnored,
        sectorsCount: points.numSectors,
      },
    };
  }

  async function calculateEstimate(request: EstimateRequest): Promise<CalculationOutcome<EstimateResult>> {
    const tariff = await loadTariff(request.regionId);
    if ('kind' in tariff) return { ok: false, error: tariff };

    let numSectors = request.numSectors;
    if (numSectors === undefined) {
      numSectors = await store.countSectors(request.regionId);
      logger.info(`Using max sectors for region: ${numSectors}`);
    }

    return price(tariff, request.supplierLocation, request.product, request.numPoints, numSectors);
  }

  return { calculateByPoints, calculateEstimate };
}
