import { Decimal, formatMoney } from './money.js';

export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue };

// Decimal fields that are counts, not rupee amounts
const QUANTITY_KEYS = new Set(['quantity']);

/**
 * Plain JSON view of computed billing objects: money as 2-decimal strings,
 * quantities as plain decimal strings, dates as ISO strings.
 */
export function toJSONValue(value: unknown, key = ''): JSONValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (Decimal.isDecimal(value)) {
    return QUANTITY_KEYS.has(key) ? value.toString() : formatMoney(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJSONValue(item, key));
  }
  if (typeof value === 'object') {
    return toJSONObject(value);
  }
  return String(value);
}

export type JSONObject = { [key: string]: JSONValue };

export function toJSONObject(value: object): JSONObject {
  const result: JSONObject = {};
  for (const [key, entryValue] of Object.entries(value)) {
    if (entryValue !== undefined) {
      result[key] = toJSONValue(entryValue, key);
    }
  }
  return result;
}
