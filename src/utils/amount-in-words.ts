/**
 * Rupee amounts in words, Indian numbering (Thousand, Lakh, Crore)
 */

import type { Money, MoneyInput } from '../types/index.js';
import type { AmountInWordsConverter } from '../types/service.js';
import { Decimal, round2, toDecimal } from './money.js';

const ONES = [
  '', 'One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven', 'Eight', 'Nine',
  'Ten', 'Eleven', 'Twelve', 'Thirteen', 'Fourteen', 'Fifteen', 'Sixteen',
  'Seventeen', 'Eighteen', 'Nineteen',
];

const TENS = ['', '', 'Twenty', 'Thirty', 'Forty', 'Fifty', 'Sixty', 'Seventy', 'Eighty', 'Ninety'];

const SCALES = [
  { value: 10_000_000, singular: 'Crore', plural: 'Crores' },
  { value: 100_000, singular: 'Lakh', plural: 'Lakhs' },
  { value: 1_000, singular: 'Thousand', plural: 'Thousand' },
] as const;

function belowHundred(num: number): string {
  if (num < 20) {
    return ONES[num] ?? '';
  }
  const unit = num % 10;
  const tens = TENS[Math.floor(num / 10)] ?? '';
  return unit > 0 ? `${tens} ${ONES[unit] ?? ''}` : tens;
}

function belowThousand(num: number): string {
  const parts: string[] = [];
  if (num >= 100) {
    parts.push(`${ONES[Math.floor(num / 100)] ?? ''} Hundred`);
  }
  const remainder = num % 100;
  if (remainder > 0) {
    parts.push(belowHundred(remainder));
  }
  return parts.join(' ');
}

/**
 * Whole number to words. Counts above 999 crore recurse on the crore count.
 * Scale arithmetic stays in Decimal, so counts past 2^53 keep every digit.
 */
export function numberToWords(num: Decimal.Value): string {
  let remaining = new Decimal(num).toDecimalPlaces(0, Decimal.ROUND_DOWN);
  if (remaining.isZero()) {
    return 'Zero';
  }

  const parts: string[] = [];

  for (const scale of SCALES) {
    if (remaining.greaterThanOrEqualTo(scale.value)) {
      const count = remaining.dividedToIntegerBy(scale.value);
      const words = count.greaterThanOrEqualTo(1000) ? numberToWords(count) : belowThousand(count.toNumber());
      parts.push(`${words} ${count.greaterThan(1) ? scale.plural : scale.singular}`);
      remaining = remaining.modulo(scale.value);
    }
  }

  if (remaining.greaterThan(0)) {
    parts.push(belowThousand(remaining.toNumber()));
  }

  return parts.join(' ');
}

/**
 * 11800 -> "Eleven Thousand Eight Hundred Rupees Only"
 * 1.5   -> "One Rupee and Fifty Paise Only"
 */
export function amountInWords(amount: MoneyInput): string {
  const value = round2(toDecimal(amount));
  const absolute = value.abs();

  const rupees = absolute.toDecimalPlaces(0, Decimal.ROUND_DOWN);
  const paise = absolute.minus(rupees).times(100).toNumber();

  if (rupees.isZero() && paise === 0) {
    return 'Zero Rupees Only';
  }

  const parts: string[] = [];
  if (rupees.greaterThan(0)) {
    parts.push(`${numberToWords(rupees)} ${rupees.equals(1) ? 'Rupee' : 'Rupees'}`);
  }
  if (paise > 0) {
    if (rupees.greaterThan(0)) {
      parts.push('and');
    }
    parts.push(`${numberToWords(paise)} Paise`);
  }
  parts.push('Only');

  const words = parts.join(' ');
  return value.isNegative() ? `Minus ${words}` : words;
}

export const indianAmountInWords: AmountInWordsConverter = {
  convert: (amount: Money) => amountInWords(amount),
};
