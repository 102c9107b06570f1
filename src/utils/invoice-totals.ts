/**
 * Invoice-level aggregation: global discount, tax sums, weighted rate and round-off
 */

import type { GlobalDiscount, InvoiceLineItem, Money } from '../types/index.js';
import { Decimal, ZERO, percentOf, round0, round2, sumBy, toDecimal } from './money.js';

export interface GlobalDiscountResult {
  amount: Money;
  /** The requested discount was larger than the base it applies to */
  capped: boolean;
}

export interface RoundOffResult {
  grand_total: Money;
  round_off_amount: Money;
}

export interface InvoiceTotals extends RoundOffResult {
  subtotal_amount: Money;
  line_discount_amount: Money;
  global_discount_amount: Money;
  discount_amount: Money;
  taxable_amount: Money;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
  gst_rate_applied: number;
}

/**
 * Global discount on the amount left after line discounts.
 * Percentage is rounded half-up to paise; a fixed amount is used as given.
 * Either way the result stays between zero and the base.
 */
export function calculateGlobalDiscount(base: Money, discount?: GlobalDiscount | null): GlobalDiscountResult {
  if (!discount || base.lessThanOrEqualTo(0)) {
    return { amount: ZERO, capped: false };
  }

  const requested =
    discount.type === 'percentage' ? percentOf(base, toDecimal(discount.value)) : round2(toDecimal(discount.value));

  if (requested.lessThanOrEqualTo(0)) {
    return { amount: ZERO, capped: false };
  }
  if (requested.greaterThan(base)) {
    return { amount: base, capped: true };
  }
  return { amount: requested, capped: false };
}

const PAISA = new Decimal('0.01');

/**
 * Split an invoice-level discount across lines in proportion to each line's
 * base. Shares are rounded down to paise and the leftover paise go one at a
 * time to the largest remainders (ties to the earlier line), so the shares add
 * up to the discount and no share exceeds its line's base.
 */
export function allocateGlobalDiscount(bases: Money[], discount: Money): Money[] {
  const total = bases.reduce<Decimal>((sum, base) => (base.greaterThan(0) ? sum.plus(base) : sum), ZERO);
  if (discount.lessThanOrEqualTo(0) || total.lessThanOrEqualTo(0)) {
    return bases.map(() => ZERO);
  }
  const amount = Decimal.min(round2(discount), total);

  const shares = bases.map((base, index) => {
    const exact = base.greaterThan(0) ? amount.times(base).dividedBy(total) : ZERO;
    const share = exact.toDecimalPlaces(2, Decimal.ROUND_DOWN);
    return { index, base, share, remainder: exact.minus(share) };
  });

  let leftover = amount.minus(sumBy(shares, (entry) => entry.share));
  const byRemainder = [...shares].sort((a, b) => b.remainder.comparedTo(a.remainder) || a.index - b.index);
  for (const entry of byRemainder) {
    if (leftover.lessThan(PAISA)) {
      break;
    }
    if (entry.share.plus(PAISA).lessThanOrEqualTo(entry.base)) {
      entry.share = entry.share.plus(PAISA);
      leftover = leftover.minus(PAISA);
    }
  }

  return shares.map((entry) => entry.share);
}

/**
 * Σ(taxable × (max(cgst+sgst, igst) + cess)) / Σ taxable, to 4 decimal places.
 * Zero when nothing is taxable.
 */
export function calculateWeightedAverageGSTRate(lines: InvoiceLineItem[]): number {
  const totalTaxable = sumBy(lines, (line) => line.taxable_amount);
  if (totalTaxable.isZero()) {
    return 0;
  }

  const weighted = lines.reduce<Decimal>((sum, line) => {
    const splitRate = Decimal.max(
      new Decimal(line.cgst_rate).plus(line.sgst_rate),
      new Decimal(line.igst_rate)
    );
    return sum.plus(line.taxable_amount.times(splitRate.plus(line.cess_rate)));
  }, ZERO);

  return weighted.dividedBy(totalTaxable).toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Round to the whole rupee when enabled; the signed adjustment is kept.
 */
export function applyRoundOff(total: Money, enabled: boolean): RoundOffResult {
  const unrounded = round2(total);
  if (!enabled) {
    return { grand_total: unrounded, round_off_amount: ZERO };
  }

  const rounded = round0(unrounded);
  return { grand_total: round2(rounded), round_off_amount: rounded.minus(unrounded) };
}

export function calculateInvoiceTotals(lines: InvoiceLineItem[], roundOff: boolean): InvoiceTotals {
  const subtotal = sumBy(lines, (line) => line.line_subtotal);
  const lineDiscount = sumBy(lines, (line) => line.line_discount_amount);
  const globalDiscount = sumBy(lines, (line) => line.allocated_discount_amount);
  const discount = lineDiscount.plus(globalDiscount);
  const taxable = subtotal.minus(discount);

  const cgst = sumBy(lines, (line) => line.cgst_amount);
  const sgst = sumBy(lines, (line) => line.sgst_amount);
  const igst = sumBy(lines, (line) => line.igst_amount);
  const cess = sumBy(lines, (line) => line.cess_amount);
  const totalGST = cgst.plus(sgst).plus(igst).plus(cess);

  return {
    subtotal_amount: subtotal,
    line_discount_amount: lineDiscount,
    global_discount_amount: globalDiscount,
    discount_amount: discount,
    taxable_amount: taxable,
    cgst_amount: cgst,
    sgst_amount: sgst,
    igst_amount: igst,
    cess_amount: cess,
    total_gst_amount: totalGST,
    gst_rate_applied: calculateWeightedAverageGSTRate(lines),
    ...applyRoundOff(taxable.plus(totalGST), roundOff),
  };
}
