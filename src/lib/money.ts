import { Decimal } from 'decimal.js';

/**
 * Decimal helpers for prices and totals. Binary floats never enter a total.
 */

export type Money = Decimal;

export const ZERO: Money = new Decimal(0);

export function money(value: Decimal.Value): Money {
  const amount = new Decimal(value);
  if (!amount.isFinite()) {
    throw new RangeError(`Not a finite amount: ${String(value)}`);
  }
  return amount;
}

export function lineTotal(unitPrice: Money, quantity: number): Money {
  return unitPrice.times(quantity);
}

/**
 * Sum of unitPrice * quantity over the given lines
 */
export function sumLines(
  lines: ReadonlyArray<{ unitPrice: Money; quantity: number }>
): Money {
  return lines.reduce(
    (sum, line) => sum.plus(lineTotal(line.unitPrice, line.quantity)),
    ZERO
  );
}

export function formatMoney(amount: Money): string {
  return amount.toFixed(2);
}
