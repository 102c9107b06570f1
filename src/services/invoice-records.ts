/**
 * Row shapes for the invoice tables.
 *
 * Money is written as 2-decimal strings and dates as ISO strings; rows read
 * back are validated with zod and turned into Decimals and Dates again.
 */

import { z } from 'zod';

import {
  amountSchema,
  gstModeSchema,
  gstRateCategorySchema,
  invoiceTypeSchema,
  paymentMethodSchema,
  paymentStatusSchema,
} from '../tools/index.js';
import type {
  GSTConfiguration,
  GSTRate,
  HSNSummary,
  Invoice,
  InvoiceGSTDetails,
  InvoiceLineItem,
  InvoiceWithDetails,
} from '../types/index.js';
import type { StoredInvoiceSummary } from '../types/service.js';
import { validateGSTIN } from '../utils/gst.js';
import { Decimal, formatMoney, round2 } from '../utils/money.js';
import { toJSONObject, type JSONObject } from '../utils/serialize.js';

const money = amountSchema.transform((value) => round2(value));
const quantity = amountSchema.transform((value) => new Decimal(value));
const numeric = amountSchema.transform((value) => Number(value));
const nullableNumeric = numeric.nullable();
const nullableString = z.string().nullable();
const id = z.union([z.string(), z.number()]).transform((value) => String(value));
// z.coerce.date() would turn null into the epoch
const nullableDate = z.union([z.null(), z.coerce.date()]);

// ============ CONFIGURATION AND RATES ============

export const gstConfigurationSchema: z.ZodType<GSTConfiguration, z.ZodTypeDef, unknown> = z.object({
  id,
  shop_gstin: nullableString.optional(),
  shop_legal_name: nullableString.optional(),
  shop_trade_name: nullableString.optional(),
  shop_state_code: nullableString.optional(),
  shop_state_name: nullableString.optional(),
  default_gst_mode: gstModeSchema,
  default_gst_rate: numeric,
  default_gst_category: gstRateCategorySchema,
  round_off_total: z.boolean(),
  show_gstin_on_invoice: z.boolean(),
  show_gst_summary: z.boolean(),
  include_gst_in_price: z.boolean(),
  auto_detect_interstate: z.boolean(),
  require_customer_gstin: z.boolean(),
  hsn_code_mandatory: z.boolean(),
});

export const gstRateSchema: z.ZodType<GSTRate, z.ZodTypeDef, unknown> = z.object({
  id: id.optional(),
  category: z.string(),
  hsn_code: nullableString.optional(),
  gst_rate: numeric,
  cgst_rate: nullableNumeric.optional(),
  sgst_rate: nullableNumeric.optional(),
  igst_rate: nullableNumeric.optional(),
  cess_rate: nullableNumeric.optional().transform((value) => value ?? 0),
  effective_from: z.coerce.date(),
  effective_to: nullableDate.optional(),
});

// ============ INVOICES ============

const invoiceRecordSchema: z.ZodType<Invoice, z.ZodTypeDef, unknown> = z.object({
  invoice_number: z.string(),
  invoice_type: invoiceTypeSchema,
  transaction_id: z.string(),
  customer_id: nullableString,
  customer_name: nullableString,
  customer_phone: nullableString,
  customer_gstin: nullableString,
  customer_address: nullableString,
  customer_state_code: nullableString,
  invoice_date: z.coerce.date(),
  due_date: nullableDate,
  subtotal_amount: money,
  line_discount_amount: money,
  global_discount_amount: money,
  discount_amount: money,
  taxable_amount: money,
  gst_config_id: id,
  gst_mode: gstModeSchema,
  is_interstate: z.boolean(),
  shop_gstin: nullableString,
  shop_state_code: nullableString,
  cgst_amount: money,
  sgst_amount: money,
  igst_amount: money,
  cess_amount: money,
  total_gst_amount: money,
  gst_rate_applied: numeric,
  round_off_amount: money,
  grand_total: money,
  amount_in_words: z.string(),
  payment_method: paymentMethodSchema,
  payment_status: paymentStatusSchema,
  amount_paid: money,
  amount_due: money,
  show_gstin: z.boolean(),
  show_gst_summary: z.boolean(),
  gst_display_mode: z.enum(['full_breakdown', 'gstin_only', 'hidden']),
  include_gst_in_price: z.boolean(),
  place_of_supply: nullableString,
  notes: nullableString,
  terms: nullableString,
  created_by: z.string(),
  created_at: z.coerce.date(),
});

const invoiceMetaSchema = z.object({
  gst_configuration: gstConfigurationSchema,
  warnings: z.array(z.string()).nullable().transform((value) => value ?? []),
});

const lineItemRecordSchema: z.ZodType<InvoiceLineItem, z.ZodTypeDef, unknown> = z.object({
  line_number: z.number().int(),
  product_id: z.string(),
  product_name: z.string(),
  description: nullableString,
  hsn_code: nullableString,
  unit: z.string(),
  quantity,
  unit_price: money,
  line_subtotal: money,
  line_discount_amount: money,
  allocated_discount_amount: money,
  discount_amount: money,
  discount_percentage: numeric,
  taxable_amount: money,
  is_interstate: z.boolean(),
  gst_rate_id: nullableString,
  cgst_rate: numeric,
  sgst_rate: numeric,
  igst_rate: numeric,
  cess_rate: numeric,
  cgst_amount: money,
  sgst_amount: money,
  igst_amount: money,
  cess_amount: money,
  total_gst_amount: money,
  line_total: money,
  serial_numbers: z.array(z.string()).nullable().transform((value) => value ?? []),
});

const hsnSummarySchema: z.ZodType<HSNSummary, z.ZodTypeDef, unknown> = z.object({
  hsn_code: z.string(),
  quantity,
  taxable_value: money,
  gst_rate: numeric,
  cgst_amount: money,
  sgst_amount: money,
  igst_amount: money,
  cess_amount: money,
  total_gst_amount: money,
});

const gstDetailsRecordSchema: z.ZodType<InvoiceGSTDetails, z.ZodTypeDef, unknown> = z.object({
  transaction_id: z.string(),
  invoice_number: z.string(),
  gst_mode: gstModeSchema,
  is_interstate: z.boolean(),
  shop_gstin: nullableString,
  customer_gstin: nullableString,
  taxable_amount: money,
  cgst_amount: money,
  sgst_amount: money,
  igst_amount: money,
  cess_amount: money,
  total_gst_amount: money,
  round_off_amount: money,
  gst_rate_breakdown: z.string(),
  hsn_summary: z.array(hsnSummarySchema),
  created_at: z.coerce.date(),
});

export const storedInvoiceSummarySchema: z.ZodType<StoredInvoiceSummary, z.ZodTypeDef, unknown> = z.object({
  invoice_number: z.string(),
  invoice_type: invoiceTypeSchema,
  invoice_date: z.string(),
  customer_name: nullableString,
  grand_total: amountSchema.transform((value) => formatMoney(value)),
  payment_status: z.string(),
});

export interface InvoiceRecords {
  invoice: JSONObject;
  line_items: JSONObject[];
  gst_details: JSONObject | null;
}

export function toInvoiceRecords(details: InvoiceWithDetails): InvoiceRecords {
  return {
    invoice: {
      ...toJSONObject(details.invoice),
      gst_configuration: toJSONObject(details.gst_configuration),
      warnings: details.warnings,
    },
    line_items: details.line_items.map((line) => toJSONObject(line)),
    gst_details: details.gst_details ? toJSONObject(details.gst_details) : null,
  };
}

/**
 * Rebuild a stored invoice. `gstDetailsRow` may be a single row or the
 * one-element array an embedded select returns.
 */
export function fromInvoiceRecords(invoiceRow: unknown, lineRows: unknown[], gstDetailsRow: unknown): InvoiceWithDetails {
  const invoice = invoiceRecordSchema.parse(invoiceRow);
  const meta = invoiceMetaSchema.parse(invoiceRow);
  const lineItems = z
    .array(lineItemRecordSchema)
    .parse(lineRows)
    .sort((a, b) => a.line_number - b.line_number);

  const detailsRow: unknown = Array.isArray(gstDetailsRow) ? gstDetailsRow[0] : gstDetailsRow;

  return {
    invoice,
    line_items: lineItems,
    gst_details: detailsRow ? gstDetailsRecordSchema.parse(detailsRow) : null,
    gst_configuration: meta.gst_configuration,
    customer_gstin_validation: invoice.customer_gstin ? validateGSTIN(invoice.customer_gstin) : null,
    warnings: meta.warnings,
  };
}
