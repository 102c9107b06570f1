import { z } from 'zod';

import { GST_MODES } from '../utils/gst-mode.js';
import { INVOICE_TYPES } from '../utils/invoice-number.js';

// ============ SHARED ENUMS ============

export const PAYMENT_METHODS = ['cash', 'card', 'upi', 'bank_transfer', 'cheque', 'credit', 'other'] as const;
export const PAYMENT_STATUSES = ['paid', 'pending', 'partially_paid'] as const;
export const GST_RATE_CATEGORIES = ['exempt', 'gst_5', 'gst_12', 'gst_18', 'gst_28', 'custom'] as const;

export const gstModeSchema = z.enum(GST_MODES);
export const invoiceTypeSchema = z.enum(INVOICE_TYPES);
export const paymentMethodSchema = z.enum(PAYMENT_METHODS);
export const paymentStatusSchema = z.enum(PAYMENT_STATUSES);
export const gstRateCategorySchema = z.enum(GST_RATE_CATEGORIES);

/** Amounts arrive as JSON numbers or numeric strings ("1499.50") */
export const amountSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric amount'),
]);

// ============ INVOICE TOOLS ============

export const lineItemSchema = z.object({
  product_id: z.string().min(1).describe('Product ID'),
  product_name: z.string().min(1).describe('Product name as printed on the invoice'),
  description: z.string().optional(),
  hsn_code: z.string().optional().describe('HSN/SAC code, 4, 6 or 8 digits'),
  unit: z.string().optional().describe('Unit of measurement (pcs, kg, L, etc.)'),
  quantity: amountSchema.describe('Quantity sold'),
  unit_price: amountSchema.describe('Price per unit before GST'),
  discount_amount: amountSchema.optional().describe('Flat discount on this line'),
  discount_percentage: z.number().optional().describe('Percentage discount on this line; wins over discount_amount'),
  serial_numbers: z.array(z.string()).optional().describe('Serial/IMEI numbers'),
});

export const globalDiscountSchema = z.object({
  type: z.enum(['fixed', 'percentage']),
  value: amountSchema,
});

export const invoiceRequestSchema = z.object({
  transaction_id: z.string().min(1).describe('Sale/transaction reference'),
  customer_id: z.string().optional(),
  customer_name: z.string().optional(),
  customer_phone: z.string().optional(),
  customer_gstin: z.string().optional().describe('Customer GSTIN for B2B invoices'),
  customer_address: z.string().optional(),
  line_items: z.array(lineItemSchema).describe('Items being billed'),
  global_discount: globalDiscountSchema.optional().describe('Invoice-level discount'),
  payment_method: paymentMethodSchema.optional(),
  payment_status: paymentStatusSchema.optional(),
  amount_paid: amountSchema.optional(),
  invoice_date: z.coerce.date().optional(),
  due_date: z.coerce.date().optional(),
  invoice_type: invoiceTypeSchema.optional(),
  gst_mode_override: gstModeSchema.optional().describe('Overrides the configured GST mode for this invoice'),
  place_of_supply: z.string().optional(),
  notes: z.string().optional(),
  terms: z.string().optional(),
  created_by: z.string().optional(),
});

export const buildInvoiceSchema = invoiceRequestSchema.extend({
  user_id: z.string().describe('The user ID'),
});

export const previewInvoiceSchema = buildInvoiceSchema;

export const validateInvoiceRequestSchema = buildInvoiceSchema;

export const getInvoiceSchema = z.object({
  user_id: z.string().describe('The user ID'),
  invoice_number: z.string().min(1).describe('Invoice number, e.g. INV043210'),
});

export const getInvoiceGSTSummarySchema = getInvoiceSchema;

export const listInvoicesSchema = z.object({
  user_id: z.string().describe('The user ID'),
  invoice_type: invoiceTypeSchema.optional(),
  limit: z.number().int().positive().optional().default(50),
});

export const createReturnInvoiceSchema = z.object({
  user_id: z.string().describe('The user ID'),
  invoice_number: z.string().min(1).describe('Invoice being returned'),
  transaction_id: z.string().min(1).describe('Reference for the return transaction'),
  invoice_type: z.enum(['return', 'credit_note']).default('return'),
  reason: z.string().optional(),
});

// ============ GST TOOLS ============

export const validateGSTINSchema = z.object({
  gstin: z.string().describe('15-character GSTIN'),
});

export const detectInterstateSchema = z.object({
  shop_gstin: z.string().describe("Seller's GSTIN"),
  customer_gstin: z.string().optional().describe("Buyer's GSTIN"),
  auto_detect: z.boolean().default(true),
});

export const validateHSNCodeSchema = z.object({
  hsn_code: z.string(),
});

export const convertGSTInclusivePriceSchema = z.object({
  price: amountSchema.describe('Price to convert'),
  gst_rate: z.number().min(0).describe('GST rate percentage (e.g., 18)'),
  direction: z.enum(['inclusive_to_exclusive', 'exclusive_to_inclusive']).default('inclusive_to_exclusive'),
  quantity: amountSchema.default(1),
  is_interstate: z.boolean().default(false),
});

export const amountInWordsSchema = z.object({
  amount: amountSchema,
});

// ============ HTTP TRANSPORT ============

export const toolCallBodySchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});
