// Core billing types for the GST invoice engine

import type { Decimal } from 'decimal.js';

/** Fixed-point money value, 2-digit scale */
export type Money = Decimal;

/** Anything decimal.js accepts: number, numeric string or Decimal */
export type MoneyInput = Decimal.Value;

export type GSTMode = 'full_gst' | 'partial_gst' | 'gst_reference' | 'no_gst';

export type GSTDisplayMode = 'full_breakdown' | 'gstin_only' | 'hidden';

export type GSTRateCategory = 'exempt' | 'gst_5' | 'gst_12' | 'gst_18' | 'gst_28' | 'custom';

export type InvoiceType = 'sale' | 'return' | 'credit_note' | 'debit_note' | 'proforma' | 'quotation';

export type PaymentMethod = 'cash' | 'card' | 'upi' | 'bank_transfer' | 'cheque' | 'credit' | 'other';

export type PaymentStatus = 'paid' | 'pending' | 'partially_paid';

export interface GSTConfiguration {
  id: string;
  shop_gstin?: string | null;
  shop_legal_name?: string | null;
  shop_trade_name?: string | null;
  shop_state_code?: string | null;
  shop_state_name?: string | null;
  default_gst_mode: GSTMode;
  default_gst_rate: number;
  default_gst_category: GSTRateCategory;
  round_off_total: boolean;
  show_gstin_on_invoice: boolean;
  show_gst_summary: boolean;
  include_gst_in_price: boolean;
  auto_detect_interstate: boolean;
  require_customer_gstin: boolean;
  hsn_code_mandatory: boolean;
}

export interface GSTRate {
  id?: string;
  category: string;
  hsn_code?: string | null;
  /** Combined rate, e.g. 18 */
  gst_rate: number;
  cgst_rate?: number | null;
  sgst_rate?: number | null;
  igst_rate?: number | null;
  cess_rate: number;
  effective_from: Date;
  effective_to?: Date | null;
}

/** Component rates actually charged on a line */
export interface AppliedGSTRates {
  cgst_rate: number;
  sgst_rate: number;
  igst_rate: number;
  cess_rate: number;
}

export interface InvoiceLineItemRequest {
  product_id: string;
  product_name: string;
  description?: string;
  hsn_code?: string;
  unit?: string;
  quantity: MoneyInput;
  unit_price: MoneyInput;
  discount_amount?: MoneyInput;
  discount_percentage?: number;
  /** Serial/IMEI references, carried through untouched */
  serial_numbers?: string[];
}

export interface GlobalDiscount {
  type: 'fixed' | 'percentage';
  value: MoneyInput;
}

export interface InvoiceRequest {
  transaction_id: string;
  customer_id?: string;
  customer_name?: string;
  customer_phone?: string;
  customer_gstin?: string;
  customer_address?: string;
  line_items: InvoiceLineItemRequest[];
  global_discount?: GlobalDiscount;
  payment_method?: PaymentMethod;
  payment_status?: PaymentStatus;
  amount_paid?: MoneyInput;
  invoice_date?: Date;
  /** Date the GST rates are looked up at; defaults to the invoice date */
  rate_date?: Date;
  due_date?: Date;
  invoice_type?: InvoiceType;
  gst_mode_override?: GSTMode;
  place_of_supply?: string;
  notes?: string;
  terms?: string;
  created_by?: string;
}

export interface InvoiceLineItem extends AppliedGSTRates {
  line_number: number;
  product_id: string;
  product_name: string;
  description: string | null;
  hsn_code: string | null;
  unit: string;
  quantity: Decimal;
  unit_price: Money;
  /** quantity × unit_price */
  line_subtotal: Money;
  /** The line's own discount */
  line_discount_amount: Money;
  /** This line's share of the invoice-level discount */
  allocated_discount_amount: Money;
  /** line_discount_amount + allocated_discount_amount */
  discount_amount: Money;
  discount_percentage: number;
  taxable_amount: Money;
  is_interstate: boolean;
  gst_rate_id: string | null;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
  line_total: Money;
  serial_numbers: string[];
}

export interface Invoice {
  invoice_number: string;
  invoice_type: InvoiceType;
  transaction_id: string;
  customer_id: string | null;
  customer_name: string | null;
  customer_phone: string | null;
  customer_gstin: string | null;
  customer_address: string | null;
  customer_state_code: string | null;
  invoice_date: Date;
  due_date: Date | null;

  subtotal_amount: Money;
  line_discount_amount: Money;
  global_discount_amount: Money;
  discount_amount: Money;
  taxable_amount: Money;

  gst_config_id: string;
  gst_mode: GSTMode;
  is_interstate: boolean;
  shop_gstin: string | null;
  shop_state_code: string | null;

  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
  /** Weighted-average effective rate across lines */
  gst_rate_applied: number;

  round_off_amount: Money;
  grand_total: Money;
  amount_in_words: string;

  payment_method: PaymentMethod;
  payment_status: PaymentStatus;
  amount_paid: Money;
  amount_due: Money;

  show_gstin: boolean;
  show_gst_summary: boolean;
  gst_display_mode: GSTDisplayMode;
  include_gst_in_price: boolean;

  place_of_supply: string | null;
  notes: string | null;
  terms: string | null;
  created_by: string;
  created_at: Date;
}

/** Compliance bucket: (cgst+sgst+igst rate, intrastate, HSN) */
export interface GSTRateBreakdown {
  gst_rate: number;
  is_intrastate: boolean;
  hsn_code: string | null;
  taxable_amount: Money;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
}

/** Display bucket: combined rate including cess */
export interface GSTRateBreakdownItem {
  gst_rate: number;
  taxable_amount: Money;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
  total_amount: Money;
  hsn_codes: string[];
}

export interface HSNSummary {
  hsn_code: string;
  quantity: Decimal;
  taxable_value: Money;
  gst_rate: number;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
}

export interface InvoiceGSTDetails {
  transaction_id: string;
  invoice_number: string;
  gst_mode: GSTMode;
  is_interstate: boolean;
  shop_gstin: string | null;
  customer_gstin: string | null;
  taxable_amount: Money;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
  round_off_amount: Money;
  /** `rate:taxable:totalTax` entries joined by commas */
  gst_rate_breakdown: string;
  hsn_summary: HSNSummary[];
  created_at: Date;
}

export interface InvoiceGSTSummary {
  subtotal: Money;
  discount_amount: Money;
  taxable_amount: Money;
  cgst_amount: Money;
  sgst_amount: Money;
  igst_amount: Money;
  cess_amount: Money;
  total_gst_amount: Money;
  round_off_amount: Money;
  grand_total: Money;
  is_interstate: boolean;
  gst_breakdown: GSTRateBreakdownItem[];
}

export interface GSTINValidationResult {
  is_valid: boolean;
  /** Trimmed, upper-cased input (null when empty) */
  gstin: string | null;
  error_message: string | null;
  state_code: string | null;
  state_name: string | null;
  pan: string | null;
  entity_number: string | null;
}

export interface InvoiceWithDetails {
  invoice: Invoice;
  line_items: InvoiceLineItem[];
  gst_details: InvoiceGSTDetails | null;
  gst_configuration: GSTConfiguration;
  customer_gstin_validation: GSTINValidationResult | null;
  warnings: string[];
}

export interface InvoiceRequestValidation {
  is_valid: boolean;
  errors: string[];
  warnings: string[];
}
