/**
 * Per-line discount and GST split
 */

import type { AppliedGSTRates, GSTRate, InvoiceLineItem, InvoiceLineItemRequest, Money } from '../types/index.js';
import { Decimal, percentOf, round2, toDecimal } from './money.js';

export interface LineTax {
  rates: AppliedGSTRates;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
}

export interface LineDiscount {
  amount: Money;
  percentage: number;
  /** The absolute discount asked for more than the line subtotal */
  capped: boolean;
}

const NO_RATES: AppliedGSTRates = { cgst_rate: 0, sgst_rate: 0, igst_rate: 0, cess_rate: 0 };

/**
 * Component rates of a GST rate row. Missing components derive from the
 * combined rate: CGST and SGST take half each, IGST takes all of it.
 */
export function resolveComponentRates(rate: GSTRate | null): AppliedGSTRates {
  if (!rate) {
    return NO_RATES;
  }

  const half = new Decimal(rate.gst_rate).dividedBy(2).toNumber();
  return {
    cgst_rate: rate.cgst_rate ?? half,
    sgst_rate: rate.sgst_rate ?? half,
    igst_rate: rate.igst_rate ?? rate.gst_rate,
    cess_rate: rate.cess_rate,
  };
}

/** Keep only the components charged for this kind of supply */
export function applySupplyType(rates: AppliedGSTRates, isInterstate: boolean): AppliedGSTRates {
  return isInterstate
    ? { cgst_rate: 0, sgst_rate: 0, igst_rate: rates.igst_rate, cess_rate: rates.cess_rate }
    : { cgst_rate: rates.cgst_rate, sgst_rate: rates.sgst_rate, igst_rate: 0, cess_rate: rates.cess_rate };
}

/**
 * Percentage wins over the absolute amount when both are set. An absolute
 * discount is capped at the line subtotal.
 */
export function calculateLineDiscount(
  lineSubtotal: Money,
  line: Pick<InvoiceLineItemRequest, 'discount_amount' | 'discount_percentage'>
): LineDiscount {
  const percentage = line.discount_percentage ?? 0;
  if (percentage > 0) {
    return { amount: percentOf(lineSubtotal, percentage), percentage, capped: false };
  }

  const requested = round2(toDecimal(line.discount_amount));
  if (requested.greaterThan(lineSubtotal)) {
    return { amount: lineSubtotal, percentage: 0, capped: true };
  }
  return { amount: requested, percentage: 0, capped: false };
}

/**
 * Each component is rounded on its own before the total is summed.
 * A null rate yields zero tax.
 */
export function calculateLineTax(taxableAmount: Money, rate: AppliedGSTRates | null, isInterstate: boolean): LineTax {
  const rates = applySupplyType(rate ?? NO_RATES, isInterstate);

  const cgst = percentOf(taxableAmount, rates.cgst_rate);
  const sgst = percentOf(taxableAmount, rates.sgst_rate);
  const igst = percentOf(taxableAmount, rates.igst_rate);
  const cess = percentOf(taxableAmount, rates.cess_rate);

  return {
    rates,
    cgst_amount: cgst,
    sgst_amount: sgst,
    igst_amount: igst,
    cess_amount: cess,
    total_gst_amount: cgst.plus(sgst).plus(igst).plus(cess),
  };
}

export function calculateLineSubtotal(line: Pick<InvoiceLineItemRequest, 'quantity' | 'unit_price'>): Money {
  return round2(toDecimal(line.quantity).times(toDecimal(line.unit_price)));
}

export interface LineItemInput {
  line_number: number;
  request: InvoiceLineItemRequest;
  discount: LineDiscount;
  allocated_discount: Money;
  /** Null when the mode charges no tax or no rate resolved */
  rate: GSTRate | null;
  is_interstate: boolean;
}

export function computeLineItem({
  line_number,
  request,
  discount,
  allocated_discount,
  rate,
  is_interstate,
}: LineItemInput): InvoiceLineItem {
  const lineSubtotal = calculateLineSubtotal(request);
  const discountAmount = discount.amount.plus(allocated_discount);
  const taxableAmount = lineSubtotal.minus(discountAmount);
  const tax = calculateLineTax(taxableAmount, rate ? resolveComponentRates(rate) : null, is_interstate);

  return {
    line_number,
    product_id: request.product_id,
    product_name: request.product_name,
    description: request.description ?? null,
    hsn_code: request.hsn_code?.trim() || null,
    unit: request.unit ?? 'pcs',
    quantity: toDecimal(request.quantity),
    unit_price: round2(toDecimal(request.unit_price)),
    line_subtotal: lineSubtotal,
    line_discount_amount: discount.amount,
    allocated_discount_amount: allocated_discount,
    discount_amount: discountAmount,
    discount_percentage: discount.percentage,
    taxable_amount: taxableAmount,
    is_interstate,
    gst_rate_id: rate?.id ?? null,
    ...tax.rates,
    cgst_amount: tax.cgst_amount,
    sgst_amount: tax.sgst_amount,
    igst_amount: tax.igst_amount,
    cess_amount: tax.cess_amount,
    total_gst_amount: tax.total_gst_amount,
    line_total: taxableAmount.plus(tax.total_gst_amount),
    serial_numbers: request.serial_numbers ?? [],
  };
}
