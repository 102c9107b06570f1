import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  FIXED_NOW,
  KARNATAKA_GSTIN,
  SHOP_GSTIN,
  createTestBilling,
  gstRate,
  testConfig,
} from '../../__tests__/fixtures.js';
import type { InvoiceRequest } from '../../types/index.js';
import { BILLING_ERROR_CODES, BillingError } from '../../utils/errors.js';
import { Decimal } from '../../utils/money.js';
import { toJSONValue } from '../../utils/serialize.js';
import { BillingService } from '../billing-service.js';

function phoneSale(overrides: Partial<InvoiceRequest> = {}): InvoiceRequest {
  return {
    transaction_id: 'TXN-1',
    line_items: [{ product_id: 'phone', product_name: 'Phone', hsn_code: '8517', quantity: 2, unit_price: 5000 }],
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('BillingService.buildInvoice', () => {
  it('builds an intrastate invoice at 18%', async () => {
    const { billing } = createTestBilling();
    const { invoice, line_items, gst_details, warnings } = await billing.buildInvoice(phoneSale());

    expect(invoice.invoice_number).toBe('INV123456');
    expect(invoice.invoice_type).toBe('sale');
    expect(invoice.is_interstate).toBe(false);
    expect(invoice.taxable_amount.toFixed(2)).toBe('10000.00');
    expect(invoice.cgst_amount.toFixed(2)).toBe('900.00');
    expect(invoice.sgst_amount.toFixed(2)).toBe('900.00');
    expect(invoice.igst_amount.toFixed(2)).toBe('0.00');
    expect(invoice.total_gst_amount.toFixed(2)).toBe('1800.00');
    expect(invoice.grand_total.toFixed(2)).toBe('11800.00');
    expect(invoice.round_off_amount.toFixed(2)).toBe('0.00');
    expect(invoice.gst_rate_applied).toBe(18);
    expect(invoice.amount_in_words).toBe('Eleven Thousand Eight Hundred Rupees Only');
    expect(invoice.invoice_date).toEqual(FIXED_NOW);
    expect(invoice.place_of_supply).toBe('Maharashtra');
    expect(invoice.shop_gstin).toBe(SHOP_GSTIN);
    expect(invoice.gst_display_mode).toBe('full_breakdown');
    expect(invoice.payment_method).toBe('cash');
    expect(invoice.payment_status).toBe('pending');
    expect(invoice.amount_due.toFixed(2)).toBe('11800.00');
    expect(invoice.created_by).toBe('system');

    expect(line_items[0]?.cgst_rate).toBe(9);
    expect(line_items[0]?.gst_rate_id).toBe('rate-18');
    expect(gst_details?.gst_rate_breakdown).toBe('18:10000.00:1800.00');
    expect(gst_details?.hsn_summary).toHaveLength(1);
    expect(warnings).toEqual([]);
  });

  it('charges IGST to a customer in another state', async () => {
    const { billing } = createTestBilling();
    const { invoice, line_items, customer_gstin_validation } = await billing.buildInvoice(
      phoneSale({ customer_gstin: KARNATAKA_GSTIN })
    );

    expect(invoice.is_interstate).toBe(true);
    expect(invoice.customer_state_code).toBe('29');
    expect(invoice.igst_amount.toFixed(2)).toBe('1800.00');
    expect(invoice.cgst_amount.toFixed(2)).toBe('0.00');
    expect(invoice.sgst_amount.toFixed(2)).toBe('0.00');
    expect(invoice.grand_total.toFixed(2)).toBe('11800.00');
    expect(line_items[0]?.igst_rate).toBe(18);
    expect(line_items[0]?.cgst_rate).toBe(0);
    expect(customer_gstin_validation?.state_name).toBe('Karnataka');
  });

  it('applies a global percentage discount before tax', async () => {
    const { billing } = createTestBilling();
    const { invoice, line_items } = await billing.buildInvoice(
      phoneSale({ global_discount: { type: 'percentage', value: 10 } })
    );

    expect(invoice.global_discount_amount.toFixed(2)).toBe('1000.00');
    expect(invoice.line_discount_amount.toFixed(2)).toBe('0.00');
    expect(invoice.discount_amount.toFixed(2)).toBe('1000.00');
    expect(invoice.taxable_amount.toFixed(2)).toBe('9000.00');
    expect(invoice.total_gst_amount.toFixed(2)).toBe('1620.00');
    expect(invoice.grand_total.toFixed(2)).toBe('10620.00');
    expect(line_items[0]?.allocated_discount_amount.toFixed(2)).toBe('1000.00');
  });

  it('charges nothing in no-GST mode', async () => {
    const { billing, rates } = createTestBilling();
    const lookup = vi.spyOn(rates, 'getRateForProduct');
    const { invoice, line_items, gst_details } = await billing.buildInvoice(phoneSale({ gst_mode_override: 'no_gst' }));

    expect(invoice.gst_mode).toBe('no_gst');
    expect(invoice.total_gst_amount.toFixed(2)).toBe('0.00');
    expect(invoice.grand_total.toFixed(2)).toBe('10000.00');
    expect(invoice.gst_rate_applied).toBe(0);
    expect(invoice.show_gstin).toBe(false);
    expect(invoice.gst_display_mode).toBe('hidden');
    expect(line_items[0]?.cgst_rate).toBe(0);
    expect(line_items[0]?.gst_rate_id).toBeNull();
    expect(gst_details).toBeNull();
    expect(lookup).not.toHaveBeenCalled();
  });

  it('shows the GSTIN without charging tax in reference mode', async () => {
    const { billing } = createTestBilling(testConfig({ default_gst_mode: 'gst_reference' }));
    const { invoice, gst_details } = await billing.buildInvoice(phoneSale());

    expect(invoice.total_gst_amount.isZero()).toBe(true);
    expect(invoice.show_gstin).toBe(true);
    expect(invoice.gst_display_mode).toBe('gstin_only');
    expect(gst_details).toBeNull();
  });

  it('charges but hides tax in partial GST mode', async () => {
    const { billing } = createTestBilling(testConfig({ default_gst_mode: 'partial_gst' }));
    const { invoice, gst_details } = await billing.buildInvoice(phoneSale());

    expect(invoice.total_gst_amount.toFixed(2)).toBe('1800.00');
    expect(invoice.show_gst_summary).toBe(false);
    expect(invoice.gst_display_mode).toBe('hidden');
    expect(gst_details?.total_gst_amount.toFixed(2)).toBe('1800.00');
  });

  it('rounds the grand total to the rupee when configured', async () => {
    const { billing } = createTestBilling(testConfig({ round_off_total: true }));
    // 9999.66 + 899.97 + 899.97 = 11799.60
    const { invoice } = await billing.buildInvoice(
      phoneSale({ line_items: [{ product_id: 'tv', product_name: 'TV', quantity: 1, unit_price: '9999.66' }] })
    );

    expect(invoice.grand_total.toFixed(2)).toBe('11800.00');
    expect(invoice.round_off_amount.toFixed(2)).toBe('0.40');
    expect(invoice.amount_in_words).toBe('Eleven Thousand Eight Hundred Rupees Only');
  });

  it('treats an invalid customer GSTIN as intrastate and warns', async () => {
    const { billing } = createTestBilling();
    const { invoice, customer_gstin_validation, warnings } = await billing.buildInvoice(
      phoneSale({ customer_gstin: 'abc123' })
    );

    expect(customer_gstin_validation?.is_valid).toBe(false);
    expect(customer_gstin_validation?.error_message).toBe('GSTIN must be exactly 15 characters');
    expect(invoice.customer_gstin).toBe('ABC123');
    expect(invoice.is_interstate).toBe(false);
    expect(invoice.cgst_amount.toFixed(2)).toBe('900.00');
    expect(warnings).toEqual(['Customer GSTIN: GSTIN must be exactly 15 characters']);
  });

  it('fails without an active configuration', async () => {
    const { billing } = createTestBilling(null);
    const attempt = billing.buildInvoice(phoneSale());

    await expect(attempt).rejects.toBeInstanceOf(BillingError);
    await expect(attempt).rejects.toMatchObject({ code: BILLING_ERROR_CODES.GST_CONFIG_NOT_FOUND });
  });

  it('passes a failed configuration lookup through', async () => {
    const billing = new BillingService({
      configuration: { getActiveConfiguration: () => Promise.reject(new Error('connection refused')) },
      rates: createTestBilling().rates,
    });

    await expect(billing.buildInvoice(phoneSale())).rejects.toThrow('connection refused');
  });

  it('rejects an invalid request with every error listed', async () => {
    const { billing } = createTestBilling();
    const attempt = billing.buildInvoice(
      phoneSale({
        line_items: [
          { product_id: 'phone', product_name: 'Phone', quantity: 0, unit_price: 5000 },
          { product_id: 'case', product_name: 'Case', quantity: 1, unit_price: -10 },
        ],
      })
    );

    await expect(attempt).rejects.toMatchObject({
      code: BILLING_ERROR_CODES.INVALID_REQUEST,
      details: ['Line 1: quantity must be greater than zero', 'Line 2: unit price cannot be negative'],
    });
  });

  it('builds an empty invoice with a warning', async () => {
    const { billing } = createTestBilling();
    const { invoice, line_items, gst_details, warnings } = await billing.buildInvoice(phoneSale({ line_items: [] }));

    expect(line_items).toEqual([]);
    expect(invoice.grand_total.toFixed(2)).toBe('0.00');
    expect(invoice.gst_rate_applied).toBe(0);
    expect(invoice.amount_in_words).toBe('Zero Rupees Only');
    expect(gst_details?.gst_rate_breakdown).toBe('');
    expect(warnings).toEqual(['Invoice has no line items']);
  });

  it('falls back from product rate to default category to the configured percentage', async () => {
    const { billing, rates } = createTestBilling(testConfig({ default_gst_rate: 12, default_gst_category: 'gst_12' }));
    rates.productRates.set('phone', gstRate(18));
    rates.defaultRates.set('gst_12', gstRate(12, { id: 'rate-12-default' }));

    const request = phoneSale({
      line_items: [
        { product_id: 'phone', product_name: 'Phone', quantity: 1, unit_price: 1000 },
        { product_id: 'shirt', product_name: 'Shirt', quantity: 1, unit_price: 1000 },
      ],
    });
    const first = await billing.buildInvoice(request);
    expect(first.line_items.map((line) => line.cgst_rate)).toEqual([9, 6]);
    expect(first.line_items[1]?.gst_rate_id).toBe('rate-12-default');

    rates.defaultRates.clear();
    const second = await billing.buildInvoice(request);
    // 12% split in halves
    expect(second.line_items[1]?.cgst_rate).toBe(6);
    expect(second.line_items[1]?.sgst_rate).toBe(6);
    expect(second.line_items[1]?.total_gst_amount.toFixed(2)).toBe('120.00');
    expect(second.line_items[1]?.gst_rate_id).toBeNull();
  });

  it('prefers a line percentage over an amount and warns', async () => {
    const { billing } = createTestBilling();
    const { line_items, warnings } = await billing.buildInvoice(
      phoneSale({
        line_items: [
          { product_id: 'phone', product_name: 'Phone', quantity: 1, unit_price: 1000, discount_percentage: 10, discount_amount: 500 },
        ],
      })
    );

    expect(line_items[0]?.line_discount_amount.toFixed(2)).toBe('100.00');
    expect(warnings).toEqual(['Line 1: both discount percentage and amount given; the percentage is applied']);
  });

  it('caps discounts so nothing goes negative', async () => {
    const { billing } = createTestBilling();
    const { invoice, line_items, warnings } = await billing.buildInvoice(
      phoneSale({
        line_items: [
          { product_id: 'phone', product_name: 'Phone', quantity: 1, unit_price: 1000, discount_amount: 1500 },
          { product_id: 'case', product_name: 'Case', quantity: 1, unit_price: 200 },
        ],
        global_discount: { type: 'fixed', value: 500 },
      })
    );

    expect(line_items[0]?.taxable_amount.toFixed(2)).toBe('0.00');
    expect(line_items[1]?.taxable_amount.toFixed(2)).toBe('0.00');
    expect(invoice.grand_total.toFixed(2)).toBe('0.00');
    expect(warnings).toEqual(['Line 1: discount capped at the line subtotal ₹1000.00', 'Global discount capped at ₹200.00']);
  });

  it('derives the payment status from the amount paid', async () => {
    const { billing } = createTestBilling();

    const partial = await billing.buildInvoice(phoneSale({ amount_paid: 5000 }));
    expect(partial.invoice.payment_status).toBe('partially_paid');
    expect(partial.invoice.amount_due.toFixed(2)).toBe('6800.00');

    const paid = await billing.buildInvoice(phoneSale({ amount_paid: '11800' }));
    expect(paid.invoice.payment_status).toBe('paid');
    expect(paid.invoice.amount_due.toFixed(2)).toBe('0.00');
  });

  it('keeps every total consistent across mixed lines', async () => {
    const { billing, rates } = createTestBilling(testConfig({ round_off_total: true }));
    rates.productRates.set('cover', gstRate(5));
    rates.productRates.set('cola', gstRate(28, { cess_rate: 12 }));

    const details = await billing.buildInvoice(
      phoneSale({
        line_items: [
          { product_id: 'phone', product_name: 'Phone', hsn_code: '8517', quantity: 3, unit_price: '333.33', discount_percentage: 10 },
          { product_id: 'cover', product_name: 'Cover', hsn_code: '3926', quantity: 1, unit_price: 1000 },
          { product_id: 'cola', product_name: 'Cola', hsn_code: '2202', quantity: 2, unit_price: 250, discount_amount: 50 },
        ],
        global_discount: { type: 'fixed', value: 100 },
      })
    );
    const { invoice, line_items } = details;

    expect(billing.verifyInvoice(details)).toEqual([]);
    const allocated = line_items.reduce((sum, line) => sum.plus(line.allocated_discount_amount), new Decimal(0));
    expect(allocated.toFixed(2)).toBe('100.00');
    for (const line of line_items) {
      expect(line.taxable_amount.decimalPlaces()).toBeLessThanOrEqual(2);
      expect(line.total_gst_amount.isNegative()).toBe(false);
    }
    expect(invoice.grand_total.decimalPlaces()).toBe(0);
  });

  it('keeps tiny lines from going negative under a global discount', async () => {
    const { billing } = createTestBilling();
    const details = await billing.buildInvoice(
      phoneSale({
        line_items: [
          ...Array.from({ length: 10 }, (_, index) => ({
            product_id: `pen-${index + 1}`,
            product_name: 'Pen',
            quantity: 1,
            unit_price: 1,
          })),
          { product_id: 'clip', product_name: 'Clip', quantity: 1, unit_price: '0.01' },
        ],
        global_discount: { type: 'fixed', value: '0.44' },
      })
    );
    const { invoice, line_items } = details;

    // four pens take 0.05, six take 0.04, the clip takes nothing
    expect(line_items.map((line) => line.taxable_amount.toFixed(2))).toEqual([
      ...Array.from({ length: 4 }, () => '0.95'),
      ...Array.from({ length: 6 }, () => '0.96'),
      '0.01',
    ]);
    expect(line_items[10]?.total_gst_amount.toFixed(2)).toBe('0.00');
    expect(invoice.global_discount_amount.toFixed(2)).toBe('0.44');
    expect(invoice.taxable_amount.toFixed(2)).toBe('9.57');
    // 0.09 CGST + 0.09 SGST on each pen
    expect(invoice.total_gst_amount.toFixed(2)).toBe('1.80');
    expect(invoice.grand_total.toFixed(2)).toBe('11.37');
    expect(billing.verifyInvoice(details)).toEqual([]);
  });

  it('keeps the weighted rate between the line rates', async () => {
    const { billing, rates } = createTestBilling();
    rates.productRates.set('cover', gstRate(5));
    rates.productRates.set('cola', gstRate(28));
    rates.productRates.set('mint', gstRate(28));

    const details = await billing.buildInvoice(
      phoneSale({
        line_items: [
          { product_id: 'cover', product_name: 'Cover', quantity: 1, unit_price: '333.33' },
          { product_id: 'phone', product_name: 'Phone', quantity: 1, unit_price: '777.77' },
          { product_id: 'cola', product_name: 'Cola', quantity: 1, unit_price: '123.45' },
          { product_id: 'mint', product_name: 'Mint', quantity: 1, unit_price: '0.01' },
        ],
        global_discount: { type: 'fixed', value: '100.01' },
      })
    );
    const { invoice, line_items } = details;

    expect(invoice.gst_rate_applied).toBeGreaterThanOrEqual(5);
    expect(invoice.gst_rate_applied).toBeLessThanOrEqual(28);
    for (const line of line_items) {
      expect(line.taxable_amount.isNegative()).toBe(false);
      expect(line.allocated_discount_amount.isNegative()).toBe(false);
    }
    expect(invoice.global_discount_amount.toFixed(2)).toBe('100.01');
    expect(billing.verifyInvoice(details)).toEqual([]);
  });

  it('trims padded numeric strings', async () => {
    const { billing } = createTestBilling();
    const { invoice, line_items } = await billing.buildInvoice(
      phoneSale({
        line_items: [{ product_id: 'phone', product_name: 'Phone', quantity: ' 2', unit_price: '5000 ' }],
      })
    );

    expect(line_items[0]?.quantity.toString()).toBe('2');
    expect(invoice.grand_total.toFixed(2)).toBe('11800.00');
  });

  it('reports unparseable numbers instead of throwing', async () => {
    const { billing } = createTestBilling();
    const attempt = billing.buildInvoice(
      phoneSale({
        line_items: [{ product_id: 'phone', product_name: 'Phone', quantity: '2 pcs', unit_price: '  ' }],
        amount_paid: '1,000',
      })
    );

    await expect(attempt).rejects.toMatchObject({
      code: BILLING_ERROR_CODES.INVALID_REQUEST,
      details: ['Line 1: quantity must be a number', 'Line 1: unit price must be a number', 'Amount paid must be a number'],
    });
  });

  it('returns the same invoice for the same request and clock', async () => {
    const { billing } = createTestBilling();
    const request = phoneSale({ global_discount: { type: 'fixed', value: 250 } });

    expect(toJSONValue(await billing.buildInvoice(request))).toEqual(toJSONValue(await billing.buildInvoice(request)));
  });
});

describe('BillingService.validateInvoiceRequest', () => {
  const { billing } = createTestBilling();

  it('collects errors', () => {
    const result = billing.validateInvoiceRequest(
      {
        transaction_id: ' ',
        line_items: [
          { product_id: 'a', product_name: '', quantity: 'two', unit_price: 10, discount_percentage: 150 },
          { product_id: 'b', product_name: 'B', quantity: 1, unit_price: 10, discount_amount: -5 },
        ],
        global_discount: { type: 'percentage', value: 120 },
        amount_paid: -1,
      },
      testConfig()
    );

    expect(result.is_valid).toBe(false);
    expect(result.errors).toEqual([
      'Transaction ID is required',
      'Line 1: product name is required',
      'Line 1: quantity must be a number',
      'Line 1: discount percentage must be between 0 and 100',
      'Line 2: discount amount cannot be negative',
      'Global discount percentage cannot exceed 100',
      'Amount paid cannot be negative',
    ]);
  });

  it('collects configuration warnings', () => {
    const result = billing.validateInvoiceRequest(
      phoneSale({
        line_items: [
          { product_id: 'a', product_name: 'A', quantity: 1, unit_price: 10 },
          { product_id: 'b', product_name: 'B', hsn_code: '85A', quantity: 1, unit_price: 10 },
        ],
        payment_status: 'paid',
      }),
      testConfig({ hsn_code_mandatory: true, require_customer_gstin: true })
    );

    expect(result.is_valid).toBe(true);
    expect(result.warnings).toEqual([
      'Line 1: HSN code is required',
      'Line 2: HSN code 85A should be 4, 6 or 8 digits',
      'Payment status is paid but no amount paid was recorded',
      'Customer GSTIN is required by the GST configuration',
    ]);
  });

  it('reviews against the active configuration', async () => {
    const { billing: unconfigured } = createTestBilling(null);
    await expect(unconfigured.reviewInvoiceRequest(phoneSale())).rejects.toMatchObject({
      code: BILLING_ERROR_CODES.GST_CONFIG_NOT_FOUND,
    });
    await expect(billing.reviewInvoiceRequest(phoneSale())).resolves.toEqual({ is_valid: true, errors: [], warnings: [] });
  });
});

describe('BillingService.verifyInvoice', () => {
  it('reports a tampered grand total', async () => {
    const { billing } = createTestBilling();
    const details = await billing.buildInvoice(phoneSale());
    const tampered = { ...details, invoice: { ...details.invoice, grand_total: new Decimal('11900.00') } };

    expect(billing.verifyInvoice(tampered)).toEqual([
      'Grand total does not equal taxable amount plus GST plus round-off',
      'Amount due does not equal grand total less amount paid',
    ]);
  });
});

describe('BillingService.summarizeGST', () => {
  it('summarizes by display rate', async () => {
    const { billing } = createTestBilling();
    const summary = billing.summarizeGST(await billing.buildInvoice(phoneSale()));

    expect(summary.grand_total.toFixed(2)).toBe('11800.00');
    expect(summary.gst_breakdown).toHaveLength(1);
    expect(summary.gst_breakdown[0]?.gst_rate).toBe(18);
    expect(summary.gst_breakdown[0]?.hsn_codes).toEqual(['8517']);
  });
});

describe('BillingService.createReturnRequest', () => {
  it('reverses a discounted sale', async () => {
    const { billing } = createTestBilling();
    const sale = await billing.buildInvoice(
      phoneSale({ customer_name: 'Asha', global_discount: { type: 'percentage', value: 10 } })
    );

    const request = billing.createReturnRequest(sale, { transaction_id: 'TXN-R1', reason: 'Damaged' });
    expect(request.invoice_type).toBe('return');
    expect(request.gst_mode_override).toBe('full_gst');
    expect(request.payment_status).toBe('pending');
    expect(request.notes).toBe('Return against INV123456: Damaged');

    const { invoice } = await billing.buildInvoice(request);
    expect(invoice.invoice_number).toBe('RTN123456');
    expect(invoice.customer_name).toBe('Asha');
    expect(invoice.taxable_amount.toFixed(2)).toBe('9000.00');
    expect(invoice.grand_total.toFixed(2)).toBe('10620.00');
  });

  it('looks up rates as of the original invoice date', async () => {
    const { billing, rates } = createTestBilling();
    const saleDate = new Date('2023-06-01T10:00:00.000Z');
    const sale = await billing.buildInvoice(phoneSale({ invoice_date: saleDate }));
    const lookup = vi.spyOn(rates, 'getRateForProduct');

    const request = billing.createReturnRequest(sale, { transaction_id: 'TXN-R3' });
    expect(request.rate_date).toEqual(saleDate);
    expect(request.invoice_date).toBeUndefined();

    const { invoice } = await billing.buildInvoice(request);
    expect(lookup).toHaveBeenCalledWith('phone', '8517', saleDate);
    expect(invoice.invoice_date).toEqual(FIXED_NOW);
  });

  it('keeps line percentages', async () => {
    const { billing } = createTestBilling();
    const sale = await billing.buildInvoice(
      phoneSale({
        line_items: [{ product_id: 'phone', product_name: 'Phone', quantity: 1, unit_price: 1000, discount_percentage: 5 }],
      })
    );

    const request = billing.createReturnRequest(sale, { transaction_id: 'TXN-R2', invoice_type: 'credit_note' });
    expect(request.line_items[0]?.discount_percentage).toBe(5);
    expect(request.line_items[0]?.discount_amount).toBeUndefined();
    expect(request.notes).toBe('Return against INV123456');
    expect(request.global_discount).toBeUndefined();
  });
});

describe('BillingService.createProformaRequest', () => {
  it('sets a validity window from the invoice date', () => {
    const { billing } = createTestBilling();
    const request = billing.createProformaRequest(phoneSale({ amount_paid: 100 }), 15);

    expect(request.invoice_type).toBe('proforma');
    expect(request.invoice_date).toEqual(FIXED_NOW);
    expect(request.due_date).toEqual(new Date(FIXED_NOW.getTime() + 15 * 24 * 60 * 60 * 1000));
    expect(request.amount_paid).toBe(0);
    expect(request.payment_status).toBe('pending');
  });
});
