/**
 * GST breakdowns over computed line items
 *
 * Two separate groupings come out of the same lines:
 * - compliance buckets keyed by (cgst+sgst+igst rate, intrastate, HSN), stored
 *   with the invoice's GST details
 * - display buckets keyed by the combined rate including cess, shown to users
 * Their bucket boundaries differ; never merge one into the other.
 */

import type {
  GSTRateBreakdown,
  GSTRateBreakdownItem,
  HSNSummary,
  Invoice,
  InvoiceGSTDetails,
  InvoiceGSTSummary,
  InvoiceLineItem,
  InvoiceWithDetails,
} from '../types/index.js';
import { appliesTax } from './gst-mode.js';
import { Decimal, ZERO, formatMoney } from './money.js';

function addRates(...rates: number[]): number {
  return rates.reduce<Decimal>((sum, rate) => sum.plus(rate), ZERO).toNumber();
}

/** cgst + sgst + igst, without cess */
function splitRate(line: InvoiceLineItem): number {
  return addRates(line.cgst_rate, line.sgst_rate, line.igst_rate);
}

// ============================================
// COMPLIANCE GROUPING
// ============================================

export function createComplianceBreakdown(lines: InvoiceLineItem[]): GSTRateBreakdown[] {
  const buckets = new Map<string, GSTRateBreakdown>();

  for (const line of lines) {
    const rate = splitRate(line);
    const isIntrastate = !line.is_interstate;
    const key = `${rate}|${isIntrastate}|${line.hsn_code ?? ''}`;

    const bucket: GSTRateBreakdown = buckets.get(key) ?? {
      gst_rate: rate,
      is_intrastate: isIntrastate,
      hsn_code: line.hsn_code,
      taxable_amount: ZERO,
      cgst_amount: ZERO,
      sgst_amount: ZERO,
      igst_amount: ZERO,
      cess_amount: ZERO,
      total_gst_amount: ZERO,
    };

    buckets.set(key, {
      ...bucket,
      taxable_amount: bucket.taxable_amount.plus(line.taxable_amount),
      cgst_amount: bucket.cgst_amount.plus(line.cgst_amount),
      sgst_amount: bucket.sgst_amount.plus(line.sgst_amount),
      igst_amount: bucket.igst_amount.plus(line.igst_amount),
      cess_amount: bucket.cess_amount.plus(line.cess_amount),
      total_gst_amount: bucket.total_gst_amount.plus(line.total_gst_amount),
    });
  }

  return [...buckets.values()];
}

/**
 * Storage form: "18:10000.00:1800.00,5:200.00:10.00"
 */
export function serializeRateBreakdown(buckets: GSTRateBreakdown[]): string {
  return buckets
    .map((bucket) => `${bucket.gst_rate}:${formatMoney(bucket.taxable_amount)}:${formatMoney(bucket.total_gst_amount)}`)
    .join(',');
}

/**
 * HSN-wise totals for lines that carry an HSN code. The rate shown is the
 * first line's rate for that code.
 */
export function createHSNSummary(lines: InvoiceLineItem[]): HSNSummary[] {
  const summaries = new Map<string, HSNSummary>();

  for (const line of lines) {
    if (!line.hsn_code) {
      continue;
    }

    const summary: HSNSummary = summaries.get(line.hsn_code) ?? {
      hsn_code: line.hsn_code,
      quantity: ZERO,
      taxable_value: ZERO,
      gst_rate: splitRate(line),
      cgst_amount: ZERO,
      sgst_amount: ZERO,
      igst_amount: ZERO,
      cess_amount: ZERO,
      total_gst_amount: ZERO,
    };

    summaries.set(line.hsn_code, {
      ...summary,
      quantity: summary.quantity.plus(line.quantity),
      taxable_value: summary.taxable_value.plus(line.taxable_amount),
      cgst_amount: summary.cgst_amount.plus(line.cgst_amount),
      sgst_amount: summary.sgst_amount.plus(line.sgst_amount),
      igst_amount: summary.igst_amount.plus(line.igst_amount),
      cess_amount: summary.cess_amount.plus(line.cess_amount),
      total_gst_amount: summary.total_gst_amount.plus(line.total_gst_amount),
    });
  }

  return [...summaries.values()];
}

// ============================================
// DISPLAY GROUPING
// ============================================

export function createDisplayBreakdown(lines: InvoiceLineItem[]): GSTRateBreakdownItem[] {
  const buckets = new Map<number, GSTRateBreakdownItem>();

  for (const line of lines) {
    const rate = addRates(line.cgst_rate, line.sgst_rate, line.igst_rate, line.cess_rate);
    const bucket: GSTRateBreakdownItem = buckets.get(rate) ?? {
      gst_rate: rate,
      taxable_amount: ZERO,
      cgst_amount: ZERO,
      sgst_amount: ZERO,
      igst_amount: ZERO,
      cess_amount: ZERO,
      total_gst_amount: ZERO,
      total_amount: ZERO,
      hsn_codes: [],
    };

    const hsnCodes =
      line.hsn_code && !bucket.hsn_codes.includes(line.hsn_code) ? [...bucket.hsn_codes, line.hsn_code] : bucket.hsn_codes;

    buckets.set(rate, {
      ...bucket,
      taxable_amount: bucket.taxable_amount.plus(line.taxable_amount),
      cgst_amount: bucket.cgst_amount.plus(line.cgst_amount),
      sgst_amount: bucket.sgst_amount.plus(line.sgst_amount),
      igst_amount: bucket.igst_amount.plus(line.igst_amount),
      cess_amount: bucket.cess_amount.plus(line.cess_amount),
      total_gst_amount: bucket.total_gst_amount.plus(line.total_gst_amount),
      total_amount: bucket.total_amount.plus(line.line_total),
      hsn_codes: hsnCodes,
    });
  }

  return [...buckets.values()].sort((a, b) => a.gst_rate - b.gst_rate);
}

// ============================================
// INVOICE-LEVEL RECORDS
// ============================================

/**
 * Compliance record, produced only when the invoice's mode charges tax
 */
export function createInvoiceGSTDetails(
  invoice: Invoice,
  lines: InvoiceLineItem[],
  createdAt: Date
): InvoiceGSTDetails | null {
  if (!appliesTax(invoice.gst_mode)) {
    return null;
  }

  return {
    transaction_id: invoice.transaction_id,
    invoice_number: invoice.invoice_number,
    gst_mode: invoice.gst_mode,
    is_interstate: invoice.is_interstate,
    shop_gstin: invoice.shop_gstin,
    customer_gstin: invoice.customer_gstin,
    taxable_amount: invoice.taxable_amount,
    cgst_amount: invoice.cgst_amount,
    sgst_amount: invoice.sgst_amount,
    igst_amount: invoice.igst_amount,
    cess_amount: invoice.cess_amount,
    total_gst_amount: invoice.total_gst_amount,
    round_off_amount: invoice.round_off_amount,
    gst_rate_breakdown: serializeRateBreakdown(createComplianceBreakdown(lines)),
    hsn_summary: createHSNSummary(lines),
    created_at: createdAt,
  };
}

export function createGSTSummary({ invoice, line_items }: InvoiceWithDetails): InvoiceGSTSummary {
  return {
    subtotal: invoice.subtotal_amount,
    discount_amount: invoice.discount_amount,
    taxable_amount: invoice.taxable_amount,
    cgst_amount: invoice.cgst_amount,
    sgst_amount: invoice.sgst_amount,
    igst_amount: invoice.igst_amount,
    cess_amount: invoice.cess_amount,
    total_gst_amount: invoice.total_gst_amount,
    round_off_amount: invoice.round_off_amount,
    grand_total: invoice.grand_total,
    is_interstate: invoice.is_interstate,
    gst_breakdown: createDisplayBreakdown(line_items),
  };
}
