/**
 * GSTIN, state code and HSN utilities for India
 */

import type { GSTINValidationResult, GSTRateCategory } from '../types/index.js';

// Rates the GST council has notified; anything else is a custom rate
export const STANDARD_GST_RATES = [0, 0.25, 3, 5, 12, 18, 28] as const;

const GSTIN_PATTERN = /^[0-9]{2}[A-Z]{5}[0-9]{4}[A-Z][1-9A-Z]Z[0-9A-Z]$/;
const HSN_PATTERN = /^(\d{4}|\d{6}|\d{8})$/;

// Indian state codes for GST
export const INDIAN_STATES: Record<string, string> = {
  '01': 'Jammu & Kashmir',
  '02': 'Himachal Pradesh',
  '03': 'Punjab',
  '04': 'Chandigarh',
  '05': 'Uttarakhand',
  '06': 'Haryana',
  '07': 'Delhi',
  '08': 'Rajasthan',
  '09': 'Uttar Pradesh',
  '10': 'Bihar',
  '11': 'Sikkim',
  '12': 'Arunachal Pradesh',
  '13': 'Nagaland',
  '14': 'Manipur',
  '15': 'Mizoram',
  '16': 'Tripura',
  '17': 'Meghalaya',
  '18': 'Assam',
  '19': 'West Bengal',
  '20': 'Jharkhand',
  '21': 'Odisha',
  '22': 'Chhattisgarh',
  '23': 'Madhya Pradesh',
  '24': 'Gujarat',
  '25': 'Daman & Diu',
  '26': 'Dadra & Nagar Haveli and Daman & Diu',
  '27': 'Maharashtra',
  '28': 'Andhra Pradesh (Old)',
  '29': 'Karnataka',
  '30': 'Goa',
  '31': 'Lakshadweep',
  '32': 'Kerala',
  '33': 'Tamil Nadu',
  '34': 'Puducherry',
  '35': 'Andaman & Nicobar Islands',
  '36': 'Telangana',
  '37': 'Andhra Pradesh (New)',
  '38': 'Ladakh',
  '96': 'Other Territory',
  '97': 'Other Territory',
  '99': 'Centre Jurisdiction',
};

function invalid(gstin: string | null, errorMessage: string): GSTINValidationResult {
  return {
    is_valid: false,
    gstin,
    error_message: errorMessage,
    state_code: null,
    state_name: null,
    pan: null,
    entity_number: null,
  };
}

/**
 * Validate GSTIN (GST Identification Number)
 * Format: 2 digit state code + 10 character PAN + entity number + Z + check character
 *
 * Never throws; the first failing check decides the error message.
 */
export function validateGSTIN(gstin?: string | null): GSTINValidationResult {
  const normalized = (gstin ?? '').trim().toUpperCase();

  if (!normalized) {
    return invalid(null, 'GSTIN cannot be empty');
  }
  if (normalized.length !== 15) {
    return invalid(normalized, 'GSTIN must be exactly 15 characters');
  }
  if (!GSTIN_PATTERN.test(normalized)) {
    return invalid(normalized, 'Invalid GSTIN format');
  }

  const stateCode = normalized.substring(0, 2);
  const stateName = INDIAN_STATES[stateCode];
  if (!stateName) {
    return invalid(normalized, 'Invalid state code in GSTIN');
  }

  return {
    is_valid: true,
    gstin: normalized,
    error_message: null,
    state_code: stateCode,
    state_name: stateName,
    pan: normalized.substring(2, 12),
    entity_number: normalized.charAt(12),
  };
}

export function isValidGSTIN(gstin?: string | null): boolean {
  return validateGSTIN(gstin).is_valid;
}

/**
 * First two characters of a GSTIN, or null when it is too short to carry one
 */
export function getStateCode(gstin?: string | null): string | null {
  const normalized = (gstin ?? '').trim();
  return normalized.length >= 2 ? normalized.substring(0, 2) : null;
}

export function getStateName(stateCode?: string | null): string | null {
  if (!stateCode) {
    return null;
  }
  return INDIAN_STATES[stateCode] ?? null;
}

/**
 * Extract PAN from GSTIN
 */
export function extractPANFromGSTIN(gstin: string): string | null {
  return validateGSTIN(gstin).pan;
}

/**
 * Get state name from GSTIN state code
 */
export function getStateFromGSTIN(gstin: string): string | null {
  return validateGSTIN(gstin).state_name;
}

/** Strip everything except letters and digits */
export function cleanGSTIN(gstin: string): string {
  return gstin.replace(/[^0-9A-Za-z]/g, '').toUpperCase();
}

/**
 * Display form: 27-AAPFU-0939-F1ZV
 * Input that does not clean to 15 characters is returned unchanged.
 */
export function formatGSTIN(gstin: string): string {
  const cleaned = cleanGSTIN(gstin);
  if (cleaned.length !== 15) {
    return gstin;
  }
  return `${cleaned.substring(0, 2)}-${cleaned.substring(2, 7)}-${cleaned.substring(7, 11)}-${cleaned.substring(11)}`;
}

// ============================================
// INTERSTATE DETECTION
// ============================================

export interface InterstateInput {
  shop_gstin?: string | null;
  customer_gstin?: string | null;
  auto_detect: boolean;
}

/**
 * A supply is interstate when shop and customer are registered in different
 * states. Without auto-detect, a shop GSTIN, or a valid customer GSTIN the
 * supply is treated as intrastate.
 */
export function determineInterstate({ shop_gstin, customer_gstin, auto_detect }: InterstateInput): boolean {
  if (!auto_detect) {
    return false;
  }

  const shopStateCode = getStateCode(shop_gstin);
  if (!shopStateCode) {
    return false;
  }

  const customer = validateGSTIN(customer_gstin);
  if (!customer.is_valid || !customer.state_code) {
    return false;
  }

  return shopStateCode !== customer.state_code;
}

// ============================================
// HSN CODES AND RATE SLABS
// ============================================

/**
 * HSN codes are 4, 6 or 8 digits
 */
export function isValidHSNCode(hsnCode?: string | null): boolean {
  if (!hsnCode) {
    return false;
  }
  return HSN_PATTERN.test(hsnCode.trim());
}

/**
 * 8517 -> 8517, 851712 -> 8517.12, 85171210 -> 8517.12.10
 */
export function formatHSNCode(hsnCode: string): string {
  const trimmed = hsnCode.trim();
  switch (trimmed.length) {
    case 6:
      return `${trimmed.substring(0, 4)}.${trimmed.substring(4)}`;
    case 8:
      return `${trimmed.substring(0, 4)}.${trimmed.substring(4, 6)}.${trimmed.substring(6)}`;
    default:
      return trimmed;
  }
}

export function isStandardGSTRate(rate: number): boolean {
  return STANDARD_GST_RATES.some((standard) => standard === rate);
}

export function getGSTRateCategory(rate: number): GSTRateCategory {
  switch (rate) {
    case 0:
      return 'exempt';
    case 5:
      return 'gst_5';
    case 12:
      return 'gst_12';
    case 18:
      return 'gst_18';
    case 28:
      return 'gst_28';
    default:
      return 'custom';
  }
}
