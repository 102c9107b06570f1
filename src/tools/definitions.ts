import { Tool } from '@modelcontextprotocol/sdk/types.js';

const amount = {
  type: ['number', 'string'],
  description: 'Amount as a number or numeric string',
};

const lineItem = {
  type: 'object',
  properties: {
    product_id: { type: 'string' },
    product_name: { type: 'string' },
    description: { type: 'string' },
    hsn_code: { type: 'string', description: 'HSN/SAC code (4, 6 or 8 digits)' },
    unit: { type: 'string', default: 'pcs' },
    quantity: amount,
    unit_price: { ...amount, description: 'Price per unit before GST' },
    discount_amount: { ...amount, description: 'Flat discount on this line' },
    discount_percentage: { type: 'number', description: 'Percentage discount; wins over discount_amount' },
    serial_numbers: { type: 'array', items: { type: 'string' }, description: 'Serial/IMEI numbers' },
  },
  required: ['product_id', 'product_name', 'quantity', 'unit_price'],
};

const invoiceRequestProperties = {
  user_id: { type: 'string', description: 'The user ID' },
  transaction_id: { type: 'string', description: 'Sale/transaction reference' },
  customer_id: { type: 'string' },
  customer_name: { type: 'string' },
  customer_phone: { type: 'string' },
  customer_gstin: { type: 'string', description: 'Customer GSTIN for B2B invoices' },
  customer_address: { type: 'string' },
  line_items: { type: 'array', items: lineItem },
  global_discount: {
    type: 'object',
    properties: {
      type: { type: 'string', enum: ['fixed', 'percentage'] },
      value: amount,
    },
    required: ['type', 'value'],
  },
  payment_method: { type: 'string', enum: ['cash', 'card', 'upi', 'bank_transfer', 'cheque', 'credit', 'other'] },
  payment_status: { type: 'string', enum: ['paid', 'pending', 'partially_paid'] },
  amount_paid: amount,
  invoice_date: { type: 'string', description: 'ISO date; defaults to now' },
  due_date: { type: 'string', description: 'ISO date' },
  invoice_type: { type: 'string', enum: ['sale', 'return', 'credit_note', 'debit_note', 'proforma', 'quotation'] },
  gst_mode_override: { type: 'string', enum: ['full_gst', 'partial_gst', 'gst_reference', 'no_gst'] },
  place_of_supply: { type: 'string' },
  notes: { type: 'string' },
  terms: { type: 'string' },
  created_by: { type: 'string' },
};

const invoiceRequestRequired = ['user_id', 'transaction_id', 'line_items'];

// Define all available tools
export const TOOLS: Tool[] = [
  // ============ INVOICE TOOLS ============
  {
    name: 'build_invoice',
    description:
      'Compute a GST invoice (CGST/SGST/IGST/Cess, discounts, round-off) using the shop GST settings and save it.',
    inputSchema: {
      type: 'object',
      properties: invoiceRequestProperties,
      required: invoiceRequestRequired,
    },
  },
  {
    name: 'preview_invoice',
    description: 'Compute a GST invoice exactly like build_invoice without saving it.',
    inputSchema: {
      type: 'object',
      properties: invoiceRequestProperties,
      required: invoiceRequestRequired,
    },
  },
  {
    name: 'validate_invoice_request',
    description: 'Check an invoice request against the shop GST settings. Returns errors and warnings.',
    inputSchema: {
      type: 'object',
      properties: invoiceRequestProperties,
      required: invoiceRequestRequired,
    },
  },
  {
    name: 'get_invoice',
    description: 'Get a saved invoice with its line items and GST details.',
    inputSchema: {
      type: 'object',
      properties: {
        user_id: { type: 'string', description: 'The user ID' },
        invoice_number: { type: 'string', description: 'Invoice number, e.g. INV043210' },
      },
      required: ['user_id', 'invoice_number'],
    },
  },
  {
    name: 'list_invoices',
    description: 'List saved invoices, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        user_id: { type: 'string', description: 'The user ID' },
        invoice_type: invoiceRequestProperties.invoice_type,
        limit: { type: 'number', default: 50 },
      },
      required: ['user_id'],
    },
  },
  {
    name: 'get_invoice_gst_summary',
    description: 'Rate-wise GST summary of a saved invoice, with a consistency check of its figures.',
    inputSchema: {
      type: 'object',
      properties: {
        user_id: { type: 'string', description: 'The user ID' },
        invoice_number: { type: 'string' },
      },
      required: ['user_id', 'invoice_number'],
    },
  },
  {
    name: 'create_return_invoice',
    description: 'Create a return or credit note that reverses a saved invoice.',
    inputSchema: {
      type: 'object',
      properties: {
        user_id: { type: 'string', description: 'The user ID' },
        invoice_number: { type: 'string', description: 'Invoice being returned' },
        transaction_id: { type: 'string', description: 'Reference for the return transaction' },
        invoice_type: { type: 'string', enum: ['return', 'credit_note'], default: 'return' },
        reason: { type: 'string' },
      },
      required: ['user_id', 'invoice_number', 'transaction_id'],
    },
  },

  // ============ GST TOOLS ============
  {
    name: 'validate_gstin',
    description: 'Validate a GSTIN and extract its state, PAN and entity number.',
    inputSchema: {
      type: 'object',
      properties: {
        gstin: { type: 'string', description: '15-character GSTIN' },
      },
      required: ['gstin'],
    },
  },
  {
    name: 'detect_interstate',
    description: 'Decide whether a sale is interstate (IGST) or intrastate (CGST + SGST).',
    inputSchema: {
      type: 'object',
      properties: {
        shop_gstin: { type: 'string' },
        customer_gstin: { type: 'string' },
        auto_detect: { type: 'boolean', default: true },
      },
      required: ['shop_gstin'],
    },
  },
  {
    name: 'validate_hsn_code',
    description: 'Check an HSN/SAC code and return its display format.',
    inputSchema: {
      type: 'object',
      properties: {
        hsn_code: { type: 'string' },
      },
      required: ['hsn_code'],
    },
  },
  {
    name: 'convert_gst_inclusive_price',
    description: 'Convert between GST-inclusive and GST-exclusive prices and split the tax.',
    inputSchema: {
      type: 'object',
      properties: {
        price: amount,
        gst_rate: { type: 'number', description: 'GST rate percentage (e.g., 18)' },
        direction: {
          type: 'string',
          enum: ['inclusive_to_exclusive', 'exclusive_to_inclusive'],
          default: 'inclusive_to_exclusive',
        },
        quantity: { ...amount, default: 1 },
        is_interstate: { type: 'boolean', default: false },
      },
      required: ['price', 'gst_rate'],
    },
  },
  {
    name: 'amount_in_words',
    description: 'Write a rupee amount in words (Indian numbering: Thousand, Lakh, Crore).',
    inputSchema: {
      type: 'object',
      properties: {
        amount,
      },
      required: ['amount'],
    },
  },
];
