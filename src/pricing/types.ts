/**
 * Pricing types
 */

import type { Money } from './decimal.js';

/**
 * Supplier product, one request's worth
 */
export interface ProductSpec {
  lengthCm: number;
  widthCm: number;
  heightCm: number;
  weightKg: number;
  /** Items in the supplier's own box */
  itemsPerBox: number;
}

export interface BoxFitting {
  itemsByDimensions: number;
  itemsByWeight: number;
  itemsInStandardBox: number;
}

/**
 * Cost of one standard trip, line by line
 */
export interface TripCostBreakdown {
  driverCost: Money;
  /** Service fee */
  companyRevenue: Money;
  /** Round trip to the distribution center */
  fuelLiters: Money;
  fuelCost: Money;
  transportCost: Money;
  warehouseCost: Money;
  /** Delivery-point cost before discount */
  baseDeliveryCost: Money;
  discountPercent: Money;
  deliveryCost: Money;
  totalTripCost: Money;
  /** Trip weight over standard box weight, not rounded */
  numStandardBoxes: Money;
  standardBoxCost: Money;
}

export interface FinalCosts {
  costPerItem: Money;
  costPerSupplierBox: Money;
}
