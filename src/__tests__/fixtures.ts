/**
 * Shared test data and in-memory collaborators
 */

import { BillingService } from '../services/billing-service.js';
import type {
  GSTConfiguration,
  GSTRate,
  GSTRateCategory,
  InvoiceLineItem,
  InvoiceLineItemRequest,
  InvoiceType,
  InvoiceWithDetails,
  MoneyInput,
} from '../types/index.js';
import type {
  ConfigurationProvider,
  InvoiceRepository,
  RateLookupService,
  StoredInvoiceSummary,
} from '../types/service.js';
import { calculateLineDiscount, calculateLineSubtotal, computeLineItem } from '../utils/line-tax.js';
import { formatMoney, toDecimal } from '../utils/money.js';

/** Epoch ms ending in 123456, so sale invoices are numbered INV123456 */
export const FIXED_NOW = new Date(1_700_000_123_456);

export const SHOP_GSTIN = '27AAPFU0939F1ZV';
export const KARNATAKA_GSTIN = '29AAGCB7383J1Z4';

export function testConfig(overrides: Partial<GSTConfiguration> = {}): GSTConfiguration {
  return {
    id: 'cfg-test',
    shop_gstin: SHOP_GSTIN,
    shop_legal_name: 'Test Traders',
    shop_state_code: '27',
    shop_state_name: 'Maharashtra',
    default_gst_mode: 'full_gst',
    default_gst_rate: 18,
    default_gst_category: 'gst_18',
    round_off_total: false,
    show_gstin_on_invoice: true,
    show_gst_summary: true,
    include_gst_in_price: false,
    auto_detect_interstate: true,
    require_customer_gstin: false,
    hsn_code_mandatory: false,
    ...overrides,
  };
}

export function gstRate(rate: number, overrides: Partial<GSTRate> = {}): GSTRate {
  return {
    id: `rate-${rate}`,
    category: `gst_${rate}`,
    gst_rate: rate,
    cgst_rate: rate / 2,
    sgst_rate: rate / 2,
    igst_rate: rate,
    cess_rate: 0,
    effective_from: new Date('2017-07-01T00:00:00.000Z'),
    ...overrides,
  };
}

export interface TestLineOptions {
  line_number?: number;
  quantity?: MoneyInput;
  unit_price: MoneyInput;
  hsn_code?: string;
  discount_amount?: MoneyInput;
  discount_percentage?: number;
  allocated_discount?: MoneyInput;
  rate?: GSTRate | null;
  is_interstate?: boolean;
}

/** A computed line, 18% intrastate unless told otherwise */
export function makeLine(options: TestLineOptions): InvoiceLineItem {
  const lineNumber = options.line_number ?? 1;
  const request: InvoiceLineItemRequest = {
    product_id: `p-${lineNumber}`,
    product_name: `Product ${lineNumber}`,
    hsn_code: options.hsn_code,
    quantity: options.quantity ?? 1,
    unit_price: options.unit_price,
    discount_amount: options.discount_amount,
    discount_percentage: options.discount_percentage,
  };

  return computeLineItem({
    line_number: lineNumber,
    request,
    discount: calculateLineDiscount(calculateLineSubtotal(request), request),
    allocated_discount: toDecimal(options.allocated_discount),
    rate: options.rate === undefined ? gstRate(18) : options.rate,
    is_interstate: options.is_interstate ?? false,
  });
}

export class InMemoryConfigurationProvider implements ConfigurationProvider {
  constructor(public config: GSTConfiguration | null = testConfig()) {}

  async getActiveConfiguration(): Promise<GSTConfiguration | null> {
    return this.config;
  }
}

export class InMemoryRateLookup implements RateLookupService {
  readonly productRates = new Map<string, GSTRate>();
  readonly defaultRates = new Map<GSTRateCategory, GSTRate>();

  async getRateForProduct(productId: string): Promise<GSTRate | null> {
    return this.productRates.get(productId) ?? null;
  }

  async getDefaultRate(category: GSTRateCategory): Promise<GSTRate | null> {
    return this.defaultRates.get(category) ?? null;
  }
}

export class InMemoryInvoiceRepository implements InvoiceRepository {
  readonly invoices = new Map<string, InvoiceWithDetails>();

  async saveInvoice(details: InvoiceWithDetails): Promise<void> {
    this.invoices.set(details.invoice.invoice_number, details);
  }

  async getInvoice(invoiceNumber: string): Promise<InvoiceWithDetails | null> {
    return this.invoices.get(invoiceNumber) ?? null;
  }

  async listInvoices(options: { limit?: number; invoice_type?: InvoiceType } = {}): Promise<StoredInvoiceSummary[]> {
    return [...this.invoices.values()]
      .reverse()
      .filter(({ invoice }) => !options.invoice_type || invoice.invoice_type === options.invoice_type)
      .slice(0, options.limit ?? 50)
      .map(({ invoice }) => ({
        invoice_number: invoice.invoice_number,
        invoice_type: invoice.invoice_type,
        invoice_date: invoice.invoice_date.toISOString(),
        customer_name: invoice.customer_name,
        grand_total: formatMoney(invoice.grand_total),
        payment_status: invoice.payment_status,
      }));
  }
}

export interface TestBilling {
  billing: BillingService;
  configuration: InMemoryConfigurationProvider;
  rates: InMemoryRateLookup;
}

/** Billing service on a fixed clock; every product is at 18% unless mapped otherwise */
export function createTestBilling(config: GSTConfiguration | null = testConfig()): TestBilling {
  const configuration = new InMemoryConfigurationProvider(config);
  const rates = new InMemoryRateLookup();
  rates.defaultRates.set('gst_18', gstRate(18));

  const billing = new BillingService({
    configuration,
    rates,
    clock: { now: () => FIXED_NOW },
  });

  return { billing, configuration, rates };
}
