/**
 * Fixed-point money helpers.
 *
 * Every amount the engine produces goes through `round2` (or `round0` for the
 * whole-rupee round-off), so stored values are always at 2-digit scale.
 */

import { Decimal } from 'decimal.js';
import type { Money, MoneyInput } from '../types/index.js';

Decimal.set({ precision: 28, rounding: Decimal.ROUND_HALF_UP });

export { Decimal };

export const ZERO: Money = new Decimal(0);

/** Blank input is zero; strings are trimmed first */
export function toDecimal(value: MoneyInput | null | undefined): Decimal {
  const input = typeof value === 'string' ? value.trim() : value;
  if (input === null || input === undefined || input === '') {
    return ZERO;
  }
  return new Decimal(input);
}

export function round2(value: Decimal.Value): Money {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function round0(value: Decimal.Value): Money {
  return new Decimal(value).toDecimalPlaces(0, Decimal.ROUND_HALF_UP);
}

/** amount × rate / 100, rounded half-up to paise */
export function percentOf(amount: Decimal.Value, rate: Decimal.Value): Money {
  return round2(new Decimal(amount).times(rate).dividedBy(100));
}

export function sumMoney(values: Decimal.Value[]): Money {
  return values.reduce<Decimal>((sum, value) => sum.plus(value), ZERO);
}

export function sumBy<T>(items: T[], pick: (item: T) => Decimal): Money {
  return sumMoney(items.map(pick));
}

/** Serialize for JSON output and storage: always two decimals */
export function formatMoney(value: Decimal.Value): string {
  return new Decimal(value).toFixed(2);
}

export function formatRupees(value: Decimal.Value): string {
  return `₹${formatMoney(value)}`;
}
