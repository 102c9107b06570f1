/**
 * GST-inclusive pricing conversions
 *
 * Shops that print MRP-style prices need the taxable value and tax hidden
 * inside an inclusive price.
 */

import type { Money, MoneyInput } from '../types/index.js';
import { Decimal, round2, toDecimal } from './money.js';

export interface InclusiveBreakdown {
  taxable_value: Money;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  total_gst_amount: Money;
  total_amount: Money;
}

function multiplier(gstRate: number): Decimal {
  return new Decimal(1).plus(new Decimal(gstRate).dividedBy(100));
}

/** exclusive × (1 + rate/100) */
export function convertToInclusive(exclusivePrice: MoneyInput, gstRate: number): Money {
  return round2(toDecimal(exclusivePrice).times(multiplier(gstRate)));
}

/** inclusive ÷ (1 + rate/100) */
export function convertToExclusive(inclusivePrice: MoneyInput, gstRate: number): Money {
  return round2(toDecimal(inclusivePrice).dividedBy(multiplier(gstRate)));
}

export function extractGSTFromInclusive(inclusivePrice: MoneyInput, gstRate: number): Money {
  const inclusive = round2(toDecimal(inclusivePrice));
  return inclusive.minus(convertToExclusive(inclusive, gstRate));
}

/**
 * Split an inclusive line (price × quantity) into taxable value and tax.
 * Intrastate: CGST takes the rounded half, SGST the rest.
 */
export function calculateInclusiveBreakdown(
  inclusivePrice: MoneyInput,
  quantity: MoneyInput,
  gstRate: number,
  isInterstate = false
): InclusiveBreakdown {
  const totalAmount = round2(toDecimal(inclusivePrice).times(toDecimal(quantity)));
  const taxableValue = convertToExclusive(totalAmount, gstRate);
  const totalGST = totalAmount.minus(taxableValue);

  if (isInterstate) {
    return {
      taxable_value: taxableValue,
      cgst_amount: new Decimal(0),
      sgst_amount: new Decimal(0),
      igst_amount: totalGST,
      total_gst_amount: totalGST,
      total_amount: totalAmount,
    };
  }

  const cgst = round2(totalGST.dividedBy(2));
  return {
    taxable_value: taxableValue,
    cgst_amount: cgst,
    sgst_amount: totalGST.minus(cgst),
    igst_amount: new Decimal(0),
    total_gst_amount: totalGST,
    total_amount: totalAmount,
  };
}
