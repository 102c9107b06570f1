import type { InvoiceType } from '../types/index.js';

export const INVOICE_TYPES = ['sale', 'return', 'credit_note', 'debit_note', 'proforma', 'quotation'] as const satisfies readonly InvoiceType[];

export const INVOICE_NUMBER_PREFIXES: Record<InvoiceType, string> = {
  sale: 'INV',
  return: 'RTN',
  credit_note: 'CN',
  debit_note: 'DN',
  proforma: 'PRO',
  quotation: 'QUO',
};

const INVOICE_NUMBER_PATTERN = /^([A-Z]{2,3})(\d{6})$/;

/**
 * PREFIX + last six digits of the epoch milliseconds, e.g. INV043210.
 * Two invoices of the same type built within the same millisecond (or exactly
 * 1,000,000 ms apart) get the same number.
 */
export function generateInvoiceNumber(type: InvoiceType, now: Date): string {
  const suffix = (now.getTime() % 1_000_000).toString().padStart(6, '0');
  return `${INVOICE_NUMBER_PREFIXES[type]}${suffix}`;
}

export interface ParsedInvoiceNumber {
  prefix: string;
  invoice_type: InvoiceType;
  sequence: string;
}

export function parseInvoiceNumber(invoiceNumber: string): ParsedInvoiceNumber | null {
  const match = INVOICE_NUMBER_PATTERN.exec(invoiceNumber.trim().toUpperCase());
  if (!match) {
    return null;
  }

  const [, prefix = '', sequence = ''] = match;
  const invoiceType = INVOICE_TYPES.find((type) => INVOICE_NUMBER_PREFIXES[type] === prefix);
  return invoiceType ? { prefix, invoice_type: invoiceType, sequence } : null;
}
