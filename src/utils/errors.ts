/**
 * Billing Error Utilities
 *
 * Error codes, user-facing messages and the BillingError class.
 * Advisory problems (an invalid customer GSTIN, a capped discount) are never
 * thrown; they travel as data in validation results and invoice warnings.
 */

import { ZodError } from 'zod';

// ============================================
// ERROR CODES
// ============================================

export const BILLING_ERROR_CODES = {
  GST_CONFIG_NOT_FOUND: 'BILLING_GST_CONFIG_NOT_FOUND',
  INVALID_REQUEST: 'BILLING_INVALID_REQUEST',
  INVOICE_NOT_FOUND: 'BILLING_INVOICE_NOT_FOUND',
  STORAGE_ERROR: 'BILLING_STORAGE_ERROR',
  UNKNOWN: 'BILLING_UNKNOWN_ERROR',
} as const;

export type BillingErrorCode = (typeof BILLING_ERROR_CODES)[keyof typeof BILLING_ERROR_CODES];

// ============================================
// USER-FACING MESSAGES
// ============================================

export const BILLING_ERROR_MESSAGES: Record<BillingErrorCode, string> = {
  [BILLING_ERROR_CODES.GST_CONFIG_NOT_FOUND]: 'GST configuration not found. Set up GST settings before billing.',
  [BILLING_ERROR_CODES.INVALID_REQUEST]: 'The invoice request is invalid',
  [BILLING_ERROR_CODES.INVOICE_NOT_FOUND]: 'Invoice not found',
  [BILLING_ERROR_CODES.STORAGE_ERROR]: 'Could not read or write billing data',
  [BILLING_ERROR_CODES.UNKNOWN]: 'An unexpected error occurred',
};

// ============================================
// BILLING ERROR CLASS
// ============================================

export interface BillingErrorResult {
  success: false;
  error: {
    code: BillingErrorCode;
    message: string;
    details?: string[];
  };
}

export class BillingError extends Error {
  readonly code: BillingErrorCode;
  readonly userMessage: string;
  readonly details: string[];
  readonly context?: Record<string, unknown>;

  constructor(
    code: BillingErrorCode,
    options?: {
      technicalMessage?: string;
      details?: string[];
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    const userMessage = BILLING_ERROR_MESSAGES[code];
    super(options?.technicalMessage || userMessage, { cause: options?.cause });
    this.name = 'BillingError';
    this.code = code;
    this.userMessage = userMessage;
    this.details = options?.details ?? [];
    this.context = options?.context;

    Object.setPrototypeOf(this, BillingError.prototype);
  }

  toResult(): BillingErrorResult {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.userMessage,
        ...(this.details.length > 0 ? { details: this.details } : {}),
      },
    };
  }
}

export function isBillingError(error: unknown): error is BillingError {
  return error instanceof BillingError;
}

/**
 * Normalize anything a tool handler can throw into a result object.
 */
export function toErrorResult(error: unknown): BillingErrorResult {
  if (isBillingError(error)) {
    return error.toResult();
  }

  if (error instanceof ZodError) {
    return {
      success: false,
      error: {
        code: BILLING_ERROR_CODES.INVALID_REQUEST,
        message: BILLING_ERROR_MESSAGES[BILLING_ERROR_CODES.INVALID_REQUEST],
        details: error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        ),
      },
    };
  }

  return {
    success: false,
    error: {
      code: BILLING_ERROR_CODES.UNKNOWN,
      message: error instanceof Error ? error.message : BILLING_ERROR_MESSAGES[BILLING_ERROR_CODES.UNKNOWN],
    },
  };
}
