/**
 * Decimal arithmetic for money. Binary floats drift at the cent level over a trip's cost chain.
 */

import { Decimal } from 'decimal.js';

export const Money = Decimal.clone({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
});

export type Money = Decimal;

export type MoneyInput = Decimal.Value;

export function money(value: MoneyInput): Money {
  return new Money(value);
}

/**
 * Round to cents, half-up
 */
export function roundMoney(value: Money): Money {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}
