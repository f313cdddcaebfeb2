/**
 * Delivery cost engine: trip cost from a regional tariff, spread over standard boxes
 */

import type { RegionTariff } from '../store/types.js';
import { Money, money, roundMoney, type MoneyInput } from './decimal.js';
import type { FinalCosts, TripCostBreakdown } from './types.js';

const ZERO = money(0);
const HUNDRED = money(100);

type DiscountTariff = Pick<
  RegionTariff,
  'deliveryPointCost' | 'minPointsForDiscount' | 'discountStepPoints' | 'initialDiscountPercent' | 'discountStepPercent'
>;

/**
 * Volume discount on delivery points.
 * Base cost uses the discount threshold as the point count whatever the real count is.
 * The percent is clamped to [0, 100] so the cost never goes negative.
 */
export function calculateDeliveryCost(
  tariff: DiscountTariff,
  numPoints: number,
  numSectors: number
): { baseDeliveryCost: Money; discountPercent: Money; deliveryCost: Money } {
  const baseDeliveryCost = money(numSectors)
    .times(tariff.deliveryPointCost)
    .times(tariff.minPointsForDiscount);

  if (numPoints < tariff.minPointsForDiscount) {
    return { baseDeliveryCost, discountPercent: ZERO, deliveryCost: baseDeliveryCost };
  }

  const discountSteps = Math.floor((numPoints - tariff.minPointsForDiscount) / tariff.discountStepPoints);
  const rawPercent = tariff.initialDiscountPercent.plus(tariff.discountStepPercent.times(discountSteps));
  const discountPercent = Money.min(Money.max(rawPercent, ZERO), HUNDRED);

  return {
    baseDeliveryCost,
    discountPercent,
    deliveryCost: baseDeliveryCost.times(money(1).minus(discountPercent.dividedBy(HUNDRED))),
  };
}

/**
 * Cost of one standard trip and of one standard box within it
 */
export function calculateTripCosts(
  tariff: RegionTariff,
  distanceKm: MoneyInput,
  numPoints: number,
  numSectors: number
): TripCostBreakdown {
  const driverCost = tariff.plannedWorkHours.times(tariff.driverHourlyRate);
  const companyRevenue = tariff.serviceFeePerKg.times(tariff.standardTripWeight);

  // There and back
  const fuelLiters = tariff.fuelConsumptionPer100km.dividedBy(HUNDRED).times(money(distanceKm).times(2));
  const fuelCost = fuelLiters.times(tariff.fuelPricePerLiter);
  const transportCost = fuelCost.times(tariff.depreciationCoefficient);

  const warehouseCost = tariff.warehouseProcessingPerKg.times(tariff.standardTripWeight);

  const { baseDeliveryCost, discountPercent, deliveryCost } = calculateDeliveryCost(tariff, numPoints, numSectors);

  const totalTripCost = driverCost
    .plus(companyRevenue)
    .plus(transportCost)
    .plus(warehouseCost)
    .plus(deliveryCost);

  const numStandardBoxes = tariff.standardTripWeight.dividedBy(tariff.standardBoxMaxWeight);
  const standardBoxCost = totalTripCost.dividedBy(numStandardBoxes);

  return {
    driverCost,
    companyRevenue,
    fuelLiters,
    fuelCost,
    transportCost,
    warehouseCost,
    baseDeliveryCost,
    discountPercent,
    deliveryCost,
    totalTripCost,
    numStandardBoxes,
    standardBoxCost,
  };
}

/**
 * Per-item and per-supplier-box cost.
 * The box cost multiplies the already rounded item cost.
 * @throws RangeError if itemsInStandardBox is not positive
 */
export function finalizeCosts(
  standardBoxCost: MoneyInput,
  itemsInStandardBox: number,
  itemsPerSupplierBox: number
): FinalCosts {
  if (itemsInStandardBox <= 0) {
    throw new RangeError(`itemsInStandardBox must be positive, got ${itemsInStandardBox}`);
  }

  const costPerItem = roundMoney(money(standardBoxCost).dividedBy(itemsInStandardBox));
  const costPerSupplierBox = roundMoney(costPerItem.times(itemsPerSupplierBox));

  return { costPerItem, costPerSupplierBox };
}
