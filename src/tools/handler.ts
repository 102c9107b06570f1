import type { BillingService } from '../services/billing-service.js';
import type { InvoiceWithDetails } from '../types/index.js';
import type { InvoiceRepository } from '../types/service.js';
import { amountInWords } from '../utils/amount-in-words.js';
import { BILLING_ERROR_CODES, BillingError } from '../utils/errors.js';
import { calculateInclusiveBreakdown, convertToExclusive, convertToInclusive } from '../utils/gst-inclusive.js';
import { getGSTModeLabel } from '../utils/gst-mode.js';
import {
  determineInterstate,
  formatGSTIN,
  formatHSNCode,
  getStateCode,
  getStateName,
  isValidHSNCode,
  validateGSTIN,
} from '../utils/gst.js';
import { formatMoney, round2 } from '../utils/money.js';
import { toJSONValue, type JSONValue } from '../utils/serialize.js';
import * as tools from './index.js';

export interface ShopServices {
  billing: BillingService;
  invoices: InvoiceRepository;
}

export interface ToolContext {
  /** Billing pipeline and invoice store scoped to one shop user */
  forUser(userId: string): ShopServices;
}

function invoiceNotFound(invoiceNumber: string): BillingError {
  return new BillingError(BILLING_ERROR_CODES.INVOICE_NOT_FOUND, {
    technicalMessage: `Invoice ${invoiceNumber} not found`,
    context: { invoice_number: invoiceNumber },
  });
}

function invoiceResult(billing: BillingService, details: InvoiceWithDetails): JSONValue {
  return toJSONValue({
    ...details,
    gst_mode_label: getGSTModeLabel(details.invoice.gst_mode),
    gst_summary: billing.summarizeGST(details),
  });
}

export function createToolHandler(context: ToolContext) {
  return async function handleToolCall(name: string, args: Record<string, unknown>): Promise<JSONValue> {
    switch (name) {
      // ============ INVOICES ============
      case 'build_invoice': {
        const { user_id, ...request } = tools.buildInvoiceSchema.parse(args);
        const { billing, invoices } = context.forUser(user_id);
        const details = await billing.buildInvoice(request);
        await invoices.saveInvoice(details);
        return invoiceResult(billing, details);
      }

      case 'preview_invoice': {
        const { user_id, ...request } = tools.previewInvoiceSchema.parse(args);
        const { billing } = context.forUser(user_id);
        return invoiceResult(billing, await billing.buildInvoice(request));
      }

      case 'validate_invoice_request': {
        const { user_id, ...request } = tools.validateInvoiceRequestSchema.parse(args);
        const { billing } = context.forUser(user_id);
        return toJSONValue(await billing.reviewInvoiceRequest(request));
      }

      case 'get_invoice': {
        const parsed = tools.getInvoiceSchema.parse(args);
        const { billing, invoices } = context.forUser(parsed.user_id);
        const details = await invoices.getInvoice(parsed.invoice_number);
        if (!details) throw invoiceNotFound(parsed.invoice_number);
        return invoiceResult(billing, details);
      }

      case 'list_invoices': {
        const parsed = tools.listInvoicesSchema.parse(args);
        const { invoices } = context.forUser(parsed.user_id);
        return toJSONValue(
          await invoices.listInvoices({ limit: parsed.limit, invoice_type: parsed.invoice_type })
        );
      }

      case 'get_invoice_gst_summary': {
        const parsed = tools.getInvoiceGSTSummarySchema.parse(args);
        const { billing, invoices } = context.forUser(parsed.user_id);
        const details = await invoices.getInvoice(parsed.invoice_number);
        if (!details) throw invoiceNotFound(parsed.invoice_number);
        return toJSONValue({
          invoice_number: details.invoice.invoice_number,
          gst_mode: details.invoice.gst_mode,
          summary: billing.summarizeGST(details),
          gst_rate_breakdown: details.gst_details?.gst_rate_breakdown ?? null,
          hsn_summary: details.gst_details?.hsn_summary ?? [],
          problems: billing.verifyInvoice(details),
        });
      }

      case 'create_return_invoice': {
        const parsed = tools.createReturnInvoiceSchema.parse(args);
        const { billing, invoices } = context.forUser(parsed.user_id);
        const original = await invoices.getInvoice(parsed.invoice_number);
        if (!original) throw invoiceNotFound(parsed.invoice_number);

        const request = billing.createReturnRequest(original, {
          transaction_id: parsed.transaction_id,
          invoice_type: parsed.invoice_type,
          reason: parsed.reason,
        });
        const details = await billing.buildInvoice(request);
        await invoices.saveInvoice(details);
        return invoiceResult(billing, details);
      }

      // ============ GST ============
      case 'validate_gstin': {
        const parsed = tools.validateGSTINSchema.parse(args);
        const result = validateGSTIN(parsed.gstin);
        return toJSONValue({
          ...result,
          formatted: result.is_valid && result.gstin ? formatGSTIN(result.gstin) : null,
        });
      }

      case 'detect_interstate': {
        const parsed = tools.detectInterstateSchema.parse(args);
        const customer = parsed.customer_gstin ? validateGSTIN(parsed.customer_gstin) : null;
        const isInterstate = determineInterstate(parsed);
        return toJSONValue({
          is_interstate: isInterstate,
          tax_type: isInterstate ? 'IGST' : 'CGST + SGST',
          shop_state: getStateName(getStateCode(parsed.shop_gstin)),
          customer_state: customer?.state_name ?? null,
          customer_gstin_validation: customer,
        });
      }

      case 'validate_hsn_code': {
        const parsed = tools.validateHSNCodeSchema.parse(args);
        const isValid = isValidHSNCode(parsed.hsn_code);
        return {
          hsn_code: parsed.hsn_code.trim(),
          is_valid: isValid,
          formatted: isValid ? formatHSNCode(parsed.hsn_code) : null,
        };
      }

      case 'convert_gst_inclusive_price': {
        const parsed = tools.convertGSTInclusivePriceSchema.parse(args);
        if (parsed.direction === 'exclusive_to_inclusive') {
          const exclusive = round2(parsed.price);
          const inclusive = convertToInclusive(exclusive, parsed.gst_rate);
          return toJSONValue({
            exclusive_price: exclusive,
            inclusive_price: inclusive,
            gst_amount: inclusive.minus(exclusive),
            gst_rate: parsed.gst_rate,
          });
        }
        return toJSONValue({
          inclusive_price: round2(parsed.price),
          exclusive_price: convertToExclusive(parsed.price, parsed.gst_rate),
          gst_rate: parsed.gst_rate,
          breakdown: calculateInclusiveBreakdown(parsed.price, parsed.quantity, parsed.gst_rate, parsed.is_interstate),
        });
      }

      case 'amount_in_words': {
        const parsed = tools.amountInWordsSchema.parse(args);
        return { amount: formatMoney(parsed.amount), words: amountInWords(parsed.amount) };
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  };
}
