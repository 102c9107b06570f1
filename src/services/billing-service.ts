import type {
  GSTConfiguration,
  GSTRate,
  Invoice,
  InvoiceGSTSummary,
  InvoiceLineItem,
  InvoiceLineItemRequest,
  InvoiceRequest,
  InvoiceRequestValidation,
  InvoiceWithDetails,
  MoneyInput,
  PaymentStatus,
} from '../types/index.js';
import type {
  AmountInWordsConverter,
  Clock,
  ConfigurationProvider,
  InvoiceNumberGenerator,
  RateLookupService,
} from '../types/service.js';
import { systemClock } from '../types/service.js';
import { indianAmountInWords } from '../utils/amount-in-words.js';
import { BILLING_ERROR_CODES, BillingError } from '../utils/errors.js';
import {
  createComplianceBreakdown,
  createGSTSummary,
  createInvoiceGSTDetails,
} from '../utils/gst-breakdown.js';
import { getGSTModePolicy, resolveGSTMode } from '../utils/gst-mode.js';
import { determineInterstate, getStateCode, getStateName, isValidHSNCode, validateGSTIN } from '../utils/gst.js';
import {
  allocateGlobalDiscount,
  calculateGlobalDiscount,
  calculateInvoiceTotals,
} from '../utils/invoice-totals.js';
import { generateInvoiceNumber } from '../utils/invoice-number.js';
import { calculateLineDiscount, calculateLineSubtotal, computeLineItem } from '../utils/line-tax.js';
import { Decimal, ZERO, formatRupees, round2, sumBy, sumMoney, toDecimal } from '../utils/money.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface BillingServiceDeps {
  configuration: ConfigurationProvider;
  rates: RateLookupService;
  amountInWords?: AmountInWordsConverter;
  clock?: Clock;
  invoiceNumber?: InvoiceNumberGenerator;
}

export interface ReturnRequestOptions {
  transaction_id: string;
  invoice_type?: 'return' | 'credit_note';
  reason?: string;
  created_by?: string;
}

// Whatever passes here is safe to hand to toDecimal
function isNumeric(value: MoneyInput): boolean {
  if (typeof value === 'string' && !value.trim()) {
    return false;
  }
  try {
    return toDecimal(value).isFinite();
  } catch {
    return false;
  }
}

function derivePaymentStatus(grandTotal: Decimal, amountPaid: Decimal): PaymentStatus {
  if (amountPaid.greaterThan(0) && amountPaid.greaterThanOrEqualTo(grandTotal)) {
    return 'paid';
  }
  return amountPaid.greaterThan(0) ? 'partially_paid' : 'pending';
}

/**
 * Turns a draft order into a fully computed GST invoice.
 *
 * Holds only its collaborators; every call reads the active configuration
 * afresh and either returns a complete invoice or throws.
 */
export class BillingService {
  private readonly configuration: ConfigurationProvider;
  private readonly rates: RateLookupService;
  private readonly amountInWords: AmountInWordsConverter;
  private readonly clock: Clock;
  private readonly invoiceNumber: InvoiceNumberGenerator;

  constructor(deps: BillingServiceDeps) {
    this.configuration = deps.configuration;
    this.rates = deps.rates;
    this.amountInWords = deps.amountInWords ?? indianAmountInWords;
    this.clock = deps.clock ?? systemClock;
    this.invoiceNumber = deps.invoiceNumber ?? generateInvoiceNumber;
  }

  async buildInvoice(request: InvoiceRequest): Promise<InvoiceWithDetails> {
    const config = await this.configuration.getActiveConfiguration();
    if (!config) {
      throw new BillingError(BILLING_ERROR_CODES.GST_CONFIG_NOT_FOUND);
    }

    const validation = this.validateInvoiceRequest(request, config);
    if (!validation.is_valid) {
      throw new BillingError(BILLING_ERROR_CODES.INVALID_REQUEST, {
        technicalMessage: `Invalid invoice request ${request.transaction_id}: ${validation.errors.join('; ')}`,
        details: validation.errors,
        context: { transaction_id: request.transaction_id },
      });
    }
    const warnings = [...validation.warnings];

    const now = this.clock.now();
    const invoiceDate = request.invoice_date ?? now;
    const rateDate = request.rate_date ?? invoiceDate;
    const invoiceType = request.invoice_type ?? 'sale';
    const gstMode = resolveGSTMode(config, request.gst_mode_override);
    const policy = getGSTModePolicy(gstMode);

    const customerGSTIN = request.customer_gstin?.trim().toUpperCase() || null;
    const customerValidation = customerGSTIN ? validateGSTIN(customerGSTIN) : null;
    const isInterstate = determineInterstate({
      shop_gstin: config.shop_gstin,
      customer_gstin: customerGSTIN,
      auto_detect: config.auto_detect_interstate,
    });

    const rates = policy.applies_tax
      ? await Promise.all(request.line_items.map((line) => this.resolveRate(line, config, rateDate)))
      : request.line_items.map(() => null);

    // Line discounts first, then the invoice discount spread over what is left
    const drafts = request.line_items.map((line, index) => {
      const subtotal = calculateLineSubtotal(line);
      const discount = calculateLineDiscount(subtotal, line);
      if (discount.capped) {
        warnings.push(`Line ${index + 1}: discount capped at the line subtotal ${formatRupees(subtotal)}`);
      }
      return { line, discount, base: subtotal.minus(discount.amount) };
    });

    const bases = drafts.map((draft) => draft.base);
    const globalDiscount = calculateGlobalDiscount(sumMoney(bases), request.global_discount);
    if (globalDiscount.capped) {
      warnings.push(`Global discount capped at ${formatRupees(globalDiscount.amount)}`);
    }
    const allocations = allocateGlobalDiscount(bases, globalDiscount.amount);

    const lineItems = drafts.map((draft, index) =>
      computeLineItem({
        line_number: index + 1,
        request: draft.line,
        discount: draft.discount,
        allocated_discount: allocations[index] ?? ZERO,
        rate: rates[index] ?? null,
        is_interstate: isInterstate,
      })
    );

    const totals = calculateInvoiceTotals(lineItems, config.round_off_total);
    const invoiceNumber = this.invoiceNumber(invoiceType, now);
    const amountPaid = round2(toDecimal(request.amount_paid));

    const shopStateName = config.shop_state_name ?? getStateName(getStateCode(config.shop_gstin));

    const invoice: Invoice = {
      invoice_number: invoiceNumber,
      invoice_type: invoiceType,
      transaction_id: request.transaction_id,
      customer_id: request.customer_id ?? null,
      customer_name: request.customer_name ?? null,
      customer_phone: request.customer_phone ?? null,
      customer_gstin: customerGSTIN,
      customer_address: request.customer_address ?? null,
      customer_state_code: customerValidation?.state_code ?? null,
      invoice_date: invoiceDate,
      due_date: request.due_date ?? null,

      ...totals,

      gst_config_id: config.id,
      gst_mode: gstMode,
      is_interstate: isInterstate,
      shop_gstin: config.shop_gstin ?? null,
      shop_state_code: config.shop_state_code ?? getStateCode(config.shop_gstin),

      amount_in_words: this.amountInWords.convert(totals.grand_total),

      payment_method: request.payment_method ?? 'cash',
      payment_status: request.payment_status ?? derivePaymentStatus(totals.grand_total, amountPaid),
      amount_paid: amountPaid,
      amount_due: totals.grand_total.minus(amountPaid),

      show_gstin: config.show_gstin_on_invoice && policy.shows_gstin,
      show_gst_summary: config.show_gst_summary && policy.shows_gst_to_customer,
      gst_display_mode: policy.display_mode,
      include_gst_in_price: config.include_gst_in_price,

      place_of_supply: request.place_of_supply ?? shopStateName,
      notes: request.notes ?? null,
      terms: request.terms ?? null,
      created_by: request.created_by ?? 'system',
      created_at: now,
    };

    console.error(
      `[Billing] ${invoiceNumber}: ${lineItems.length} line(s), ${gstMode}, ` +
        `${isInterstate ? 'interstate' : 'intrastate'}, total ${formatRupees(invoice.grand_total)}`
    );

    return {
      invoice,
      line_items: lineItems,
      gst_details: createInvoiceGSTDetails(invoice, lineItems, now),
      gst_configuration: config,
      customer_gstin_validation: customerValidation,
      warnings,
    };
  }

  /** Validate against the active configuration without building */
  async reviewInvoiceRequest(request: InvoiceRequest): Promise<InvoiceRequestValidation> {
    const config = await this.configuration.getActiveConfiguration();
    if (!config) {
      throw new BillingError(BILLING_ERROR_CODES.GST_CONFIG_NOT_FOUND);
    }
    return this.validateInvoiceRequest(request, config);
  }

  /**
   * Errors block the build; warnings travel with the built invoice.
   */
  validateInvoiceRequest(request: InvoiceRequest, config: GSTConfiguration): InvoiceRequestValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!request.transaction_id.trim()) {
      errors.push('Transaction ID is required');
    }

    if (request.line_items.length === 0) {
      warnings.push('Invoice has no line items');
    }

    request.line_items.forEach((line, index) => {
      const label = `Line ${index + 1}`;

      if (!line.product_name.trim()) {
        errors.push(`${label}: product name is required`);
      }

      if (!isNumeric(line.quantity)) {
        errors.push(`${label}: quantity must be a number`);
      } else if (toDecimal(line.quantity).lessThanOrEqualTo(0)) {
        errors.push(`${label}: quantity must be greater than zero`);
      }

      if (!isNumeric(line.unit_price)) {
        errors.push(`${label}: unit price must be a number`);
      } else if (toDecimal(line.unit_price).isNegative()) {
        errors.push(`${label}: unit price cannot be negative`);
      }

      const percentage = line.discount_percentage ?? 0;
      if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
        errors.push(`${label}: discount percentage must be between 0 and 100`);
      }

      const hasAmount = line.discount_amount !== undefined && line.discount_amount !== '';
      if (hasAmount && !isNumeric(line.discount_amount ?? 0)) {
        errors.push(`${label}: discount amount must be a number`);
      } else if (hasAmount && toDecimal(line.discount_amount).isNegative()) {
        errors.push(`${label}: discount amount cannot be negative`);
      } else if (hasAmount && percentage > 0 && !toDecimal(line.discount_amount).isZero()) {
        warnings.push(`${label}: both discount percentage and amount given; the percentage is applied`);
      }

      const hsnCode = line.hsn_code?.trim();
      if (!hsnCode) {
        if (config.hsn_code_mandatory) {
          warnings.push(`${label}: HSN code is required`);
        }
      } else if (!isValidHSNCode(hsnCode)) {
        warnings.push(`${label}: HSN code ${hsnCode} should be 4, 6 or 8 digits`);
      }
    });

    const globalDiscount = request.global_discount;
    if (globalDiscount) {
      if (!isNumeric(globalDiscount.value)) {
        errors.push('Global discount must be a number');
      } else if (toDecimal(globalDiscount.value).isNegative()) {
        errors.push('Global discount cannot be negative');
      } else if (globalDiscount.type === 'percentage' && toDecimal(globalDiscount.value).greaterThan(100)) {
        errors.push('Global discount percentage cannot exceed 100');
      }
    }

    const amountPaid = request.amount_paid;
    if (amountPaid !== undefined && !isNumeric(amountPaid)) {
      errors.push('Amount paid must be a number');
    } else if (amountPaid !== undefined && toDecimal(amountPaid).isNegative()) {
      errors.push('Amount paid cannot be negative');
    } else if (
      request.payment_status === 'paid' &&
      request.line_items.length > 0 &&
      toDecimal(amountPaid).isZero()
    ) {
      warnings.push('Payment status is paid but no amount paid was recorded');
    }

    const customerGSTIN = request.customer_gstin?.trim();
    if (customerGSTIN) {
      const result = validateGSTIN(customerGSTIN);
      if (!result.is_valid) {
        warnings.push(`Customer GSTIN: ${result.error_message ?? 'invalid'}`);
      }
    } else if (config.require_customer_gstin) {
      warnings.push('Customer GSTIN is required by the GST configuration');
    }

    return { is_valid: errors.length === 0, errors, warnings };
  }

  summarizeGST(details: InvoiceWithDetails): InvoiceGSTSummary {
    return createGSTSummary(details);
  }

  /**
   * Re-check the arithmetic identities of a built (or stored) invoice.
   * Returns one message per broken identity; empty when consistent.
   */
  verifyInvoice({ invoice, line_items, gst_details }: InvoiceWithDetails): string[] {
    const problems: string[] = [];

    for (const line of line_items) {
      const label = `Line ${line.line_number}`;
      const components = line.cgst_amount.plus(line.sgst_amount).plus(line.igst_amount).plus(line.cess_amount);

      if (!line.total_gst_amount.equals(components)) {
        problems.push(`${label}: total GST does not equal the sum of its components`);
      }
      if (!line.taxable_amount.equals(line.line_subtotal.minus(line.discount_amount))) {
        problems.push(`${label}: taxable amount does not equal subtotal less discount`);
      }
      if (!line.line_total.equals(line.taxable_amount.plus(line.total_gst_amount))) {
        problems.push(`${label}: line total does not equal taxable amount plus GST`);
      }
      const hasSplit = !line.cgst_amount.isZero() || !line.sgst_amount.isZero();
      if (hasSplit && !line.igst_amount.isZero()) {
        problems.push(`${label}: both CGST/SGST and IGST charged`);
      }
    }

    const sums: Array<[string, Decimal, (line: InvoiceLineItem) => Decimal]> = [
      ['CGST', invoice.cgst_amount, (line) => line.cgst_amount],
      ['SGST', invoice.sgst_amount, (line) => line.sgst_amount],
      ['IGST', invoice.igst_amount, (line) => line.igst_amount],
      ['Cess', invoice.cess_amount, (line) => line.cess_amount],
      ['Taxable amount', invoice.taxable_amount, (line) => line.taxable_amount],
    ];
    for (const [name, total, pick] of sums) {
      if (!total.equals(sumBy(line_items, pick))) {
        problems.push(`${name} does not equal the sum of line items`);
      }
    }

    const components = invoice.cgst_amount.plus(invoice.sgst_amount).plus(invoice.igst_amount).plus(invoice.cess_amount);
    if (!invoice.total_gst_amount.equals(components)) {
      problems.push('Total GST does not equal the sum of its components');
    }
    if (!invoice.grand_total.equals(invoice.taxable_amount.plus(invoice.total_gst_amount).plus(invoice.round_off_amount))) {
      problems.push('Grand total does not equal taxable amount plus GST plus round-off');
    }
    if (!invoice.amount_due.equals(invoice.grand_total.minus(invoice.amount_paid))) {
      problems.push('Amount due does not equal grand total less amount paid');
    }

    if (gst_details) {
      const breakdownTotal = sumBy(createComplianceBreakdown(line_items), (bucket) => bucket.total_gst_amount);
      if (!breakdownTotal.equals(invoice.total_gst_amount) || !gst_details.total_gst_amount.equals(invoice.total_gst_amount)) {
        problems.push('GST breakdown total does not equal invoice GST');
      }
    }

    return problems;
  }

  /**
   * Request that reverses a built invoice: same lines, same GST mode, positive
   * quantities, rates as of the original invoice date. The invoice type
   * carries the direction.
   */
  createReturnRequest({ invoice, line_items }: InvoiceWithDetails, options: ReturnRequestOptions): InvoiceRequest {
    const lines: InvoiceLineItemRequest[] = line_items.map((line) => ({
      product_id: line.product_id,
      product_name: line.product_name,
      ...(line.description ? { description: line.description } : {}),
      ...(line.hsn_code ? { hsn_code: line.hsn_code } : {}),
      unit: line.unit,
      quantity: line.quantity,
      unit_price: line.unit_price,
      ...(line.discount_percentage > 0
        ? { discount_percentage: line.discount_percentage }
        : { discount_amount: line.line_discount_amount }),
      serial_numbers: line.serial_numbers,
    }));

    const note = `Return against ${invoice.invoice_number}`;

    return {
      transaction_id: options.transaction_id,
      ...(invoice.customer_id ? { customer_id: invoice.customer_id } : {}),
      ...(invoice.customer_name ? { customer_name: invoice.customer_name } : {}),
      ...(invoice.customer_phone ? { customer_phone: invoice.customer_phone } : {}),
      ...(invoice.customer_gstin ? { customer_gstin: invoice.customer_gstin } : {}),
      ...(invoice.customer_address ? { customer_address: invoice.customer_address } : {}),
      line_items: lines,
      ...(invoice.global_discount_amount.greaterThan(0)
        ? { global_discount: { type: 'fixed' as const, value: invoice.global_discount_amount } }
        : {}),
      payment_method: invoice.payment_method,
      payment_status: 'pending',
      invoice_type: options.invoice_type ?? 'return',
      rate_date: invoice.invoice_date,
      gst_mode_override: invoice.gst_mode,
      ...(invoice.place_of_supply ? { place_of_supply: invoice.place_of_supply } : {}),
      notes: options.reason ? `${note}: ${options.reason}` : note,
      created_by: options.created_by ?? invoice.created_by,
    };
  }

  /**
   * Proforma copy of a request, valid for `validityDays` from the invoice date
   */
  createProformaRequest(request: InvoiceRequest, validityDays = 30): InvoiceRequest {
    const invoiceDate = request.invoice_date ?? this.clock.now();
    return {
      ...request,
      invoice_type: 'proforma',
      invoice_date: invoiceDate,
      due_date: new Date(invoiceDate.getTime() + validityDays * DAY_MS),
      payment_status: 'pending',
      amount_paid: 0,
    };
  }

  /**
   * Product or HSN rate, then the configured default category, then a rate
   * built from the configured default percentage.
   */
  private async resolveRate(line: InvoiceLineItemRequest, config: GSTConfiguration, at: Date): Promise<GSTRate> {
    const productRate = await this.rates.getRateForProduct(line.product_id, line.hsn_code?.trim() || null, at);
    if (productRate) {
      return productRate;
    }

    const defaultRate = await this.rates.getDefaultRate(config.default_gst_category, at);
    if (defaultRate) {
      return defaultRate;
    }

    return {
      category: config.default_gst_category,
      gst_rate: config.default_gst_rate,
      cess_rate: 0,
      effective_from: at,
    };
  }
}
