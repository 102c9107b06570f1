import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { GSTConfiguration, GSTRate, GSTRateCategory, InvoiceType, InvoiceWithDetails } from '../types/index.js';
import type {
  ConfigurationProvider,
  InvoiceRepository,
  RateLookupService,
  StoredInvoiceSummary,
} from '../types/service.js';
import { BILLING_ERROR_CODES, BillingError } from '../utils/errors.js';
import {
  fromInvoiceRecords,
  gstConfigurationSchema,
  gstRateSchema,
  storedInvoiceSummarySchema,
  toInvoiceRecords,
} from './invoice-records.js';

const insertedRowSchema = z.object({ id: z.union([z.string(), z.number()]) });

const invoiceWithChildrenSchema = z.object({
  invoice_line_items: z.array(z.unknown()).nullable().transform((rows) => rows ?? []),
  invoice_gst_details: z.unknown(),
});

function storageError(action: string, error: PostgrestError): BillingError {
  console.error(`[Store] Failed to ${action}:`, error.message);
  return new BillingError(BILLING_ERROR_CODES.STORAGE_ERROR, {
    technicalMessage: `Failed to ${action}: ${error.message}`,
    context: { code: error.code },
    cause: error,
  });
}

/**
 * Supabase-backed collaborators for one shop user: GST settings, rate table
 * and invoice storage.
 */
export class SupabaseBillingStore implements ConfigurationProvider, RateLookupService, InvoiceRepository {
  constructor(
    private supabase: SupabaseClient,
    private userId: string
  ) {}

  // ============ GST CONFIGURATION ============

  async getActiveConfiguration(): Promise<GSTConfiguration | null> {
    const { data, error } = await this.supabase
      .from('gst_configurations')
      .select('*')
      .eq('user_id', this.userId)
      .eq('is_active', true)
      .order('updated_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw storageError('load GST configuration', error);
    return data ? gstConfigurationSchema.parse(data) : null;
  }

  // ============ GST RATES ============

  async getRateForProduct(productId: string, hsnCode: string | null, at: Date): Promise<GSTRate | null> {
    const productRate = await this.findRate({ product_id: productId }, [], at);
    if (productRate || !hsnCode) {
      return productRate;
    }
    return this.findRate({ hsn_code: hsnCode }, ['product_id'], at);
  }

  async getDefaultRate(category: GSTRateCategory, at: Date): Promise<GSTRate | null> {
    return this.findRate({ category }, ['product_id', 'hsn_code'], at);
  }

  /**
   * Most recent active rate whose effective range contains `at`
   */
  private async findRate(filters: Record<string, string>, nullColumns: string[], at: Date): Promise<GSTRate | null> {
    const timestamp = at.toISOString();

    let query = this.supabase
      .from('gst_rates')
      .select('*')
      .eq('user_id', this.userId)
      .eq('is_active', true)
      .lte('effective_from', timestamp)
      .or(`effective_to.is.null,effective_to.gte."${timestamp}"`);

    for (const [column, value] of Object.entries(filters)) query = query.eq(column, value);
    for (const column of nullColumns) query = query.is(column, null);

    const { data, error } = await query.order('effective_from', { ascending: false }).limit(1).maybeSingle();

    if (error) throw storageError('look up GST rate', error);
    return data ? gstRateSchema.parse(data) : null;
  }

  // ============ INVOICES ============

  async saveInvoice(details: InvoiceWithDetails): Promise<void> {
    const records = toInvoiceRecords(details);

    const { data, error } = await this.supabase
      .from('invoices')
      .insert([{ ...records.invoice, user_id: this.userId }])
      .select('id')
      .single();

    if (error) throw storageError(`save invoice ${details.invoice.invoice_number}`, error);
    const invoiceId = insertedRowSchema.parse(data).id;

    try {
      if (records.line_items.length > 0) {
        const { error: linesError } = await this.supabase
          .from('invoice_line_items')
          .insert(records.line_items.map((line) => ({ ...line, invoice_id: invoiceId, user_id: this.userId })));
        if (linesError) throw storageError('save invoice line items', linesError);
      }

      if (records.gst_details) {
        const { error: detailsError } = await this.supabase
          .from('invoice_gst_details')
          .insert([{ ...records.gst_details, invoice_id: invoiceId, user_id: this.userId }]);
        if (detailsError) throw storageError('save invoice GST details', detailsError);
      }
    } catch (err) {
      // Remove the header row so a failed save leaves nothing behind
      const { error: deleteError } = await this.supabase.from('invoices').delete().eq('id', invoiceId);
      if (deleteError) {
        console.error(`[Store] Could not remove partial invoice ${invoiceId}:`, deleteError.message);
      }
      throw err;
    }

    console.error(`[Store] Saved invoice ${details.invoice.invoice_number}`);
  }

  async getInvoice(invoiceNumber: string): Promise<InvoiceWithDetails | null> {
    const { data, error } = await this.supabase
      .from('invoices')
      .select('*, invoice_line_items(*), invoice_gst_details(*)')
      .eq('user_id', this.userId)
      .eq('invoice_number', invoiceNumber)
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw storageError(`load invoice ${invoiceNumber}`, error);
    if (!data) return null;

    const children = invoiceWithChildrenSchema.parse(data);
    return fromInvoiceRecords(data, children.invoice_line_items, children.invoice_gst_details);
  }

  async listInvoices(options: { limit?: number; invoice_type?: InvoiceType } = {}): Promise<StoredInvoiceSummary[]> {
    let query = this.supabase
      .from('invoices')
      .select('invoice_number, invoice_type, invoice_date, customer_name, grand_total, payment_status')
      .eq('user_id', this.userId);

    if (options.invoice_type) query = query.eq('invoice_type', options.invoice_type);
    if (options.limit) query = query.limit(options.limit);

    const { data, error } = await query.order('created_at', { ascending: false });
    if (error) throw storageError('list invoices', error);
    return z.array(storedInvoiceSummarySchema).parse(data ?? []);
  }
}
