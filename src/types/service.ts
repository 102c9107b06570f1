import type {
  GSTConfiguration,
  GSTRate,
  GSTRateCategory,
  InvoiceType,
  InvoiceWithDetails,
  Money,
} from './index.js';

export interface ConfigurationProvider {
  /** The single active configuration, or null when none is set up */
  getActiveConfiguration(): Promise<GSTConfiguration | null>;
}

export interface RateLookupService {
  /** Product- or HSN-specific rate effective at `at`, or null to fall back to the default category */
  getRateForProduct(productId: string, hsnCode: string | null, at: Date): Promise<GSTRate | null>;
  getDefaultRate(category: GSTRateCategory, at: Date): Promise<GSTRate | null>;
}

export interface AmountInWordsConverter {
  convert(amount: Money): string;
}

export interface Clock {
  now(): Date;
}

export type InvoiceNumberGenerator = (type: InvoiceType, now: Date) => string;

export interface StoredInvoiceSummary {
  invoice_number: string;
  invoice_type: InvoiceType;
  invoice_date: string;
  customer_name: string | null;
  grand_total: string;
  payment_status: string;
}

export interface InvoiceRepository {
  saveInvoice(details: InvoiceWithDetails): Promise<void>;
  getInvoice(invoiceNumber: string): Promise<InvoiceWithDetails | null>;
  listInvoices(options?: { limit?: number; invoice_type?: InvoiceType }): Promise<StoredInvoiceSummary[]>;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
