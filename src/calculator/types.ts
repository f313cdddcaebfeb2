/**
 * Calculator request/response types
 */

import type { Coordinates } from '../geo/distance.js';
import type { Money } from '../pricing/decimal.js';
import type { ProductSpec } from '../pricing/types.js';

export type CalculationErrorKind =
  | 'TARIFF_NOT_CONFIGURED'
  | 'NO_VALID_DELIVERY_POINTS'
  | 'NO_DISTRIBUTION_CENTERS'
  | 'PRODUCT_DOES_NOT_FIT';

/**
 * Precondition failure the caller can correct (bad input or missing reference data)
 */
export interface CalculationError {
  kind: CalculationErrorKind;
  message: string;
}

export type CalculationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: CalculationError };

interface CalculationRequestBase {
  regionId: number;
  supplierLocation: Coordinates;
  product: ProductSpec;
}

export interface ByPointsRequest extends CalculationRequestBase {
  deliveryPointIds: number[];
}

export interface EstimateRequest extends CalculationRequestBase {
  numPoints: number;
  /** Defaults to every sector of the region */
  numSectors?: number;
}

export interface EstimateResult {
  itemsInStandardBox: number;
  costPerItem: Money;
  costPerSupplierBox: Money;
  /** Rounded to 2 places */
  distanceToDcKm: Money;
  nearestDcName: string;
}

export interface ByPointsResult extends EstimateResult {
  deliveryPointsUsed: number;
  deliveryPointsIgnored: number;
  sectorsCount: number;
}
