/**
 * How many supplier items fit into one standard box
 */

import type { RegionTariff } from '../store/types.js';
import { money } from './decimal.js';
import type { BoxFitting, ProductSpec } from './types.js';

type BoxTariff = Pick<
  RegionTariff,
  'standardBoxLength' | 'standardBoxWidth' | 'standardBoxHeight' | 'standardBoxMaxWeight'
>;

/**
 * Axis-aligned count (no rotation) capped by the box weight limit
 */
export function fitProduct(tariff: BoxTariff, product: ProductSpec): BoxFitting {
  const alongLength = Math.floor(tariff.standardBoxLength / product.lengthCm);
  const alongWidth = Math.floor(tariff.standardBoxWidth / product.widthCm);
  const alongHeight = Math.floor(tariff.standardBoxHeight / product.heightCm);
  const itemsByDimensions = alongLength * alongWidth * alongHeight;

  const itemsByWeight = tariff.standardBoxMaxWeight.dividedToIntegerBy(money(product.weightKg)).toNumber();

  return {
    itemsByDimensions,
    itemsByWeight,
    itemsInStandardBox: Math.min(itemsByDimensions, itemsByWeight),
  };
}
