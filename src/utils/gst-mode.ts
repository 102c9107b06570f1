/**
 * GST mode behavior table
 *
 * Each mode maps to a fixed policy; callers look modes up here instead of
 * branching on the mode value.
 */

import type { GSTConfiguration, GSTDisplayMode, GSTMode } from '../types/index.js';

export interface GSTModePolicy {
  label: string;
  applies_tax: boolean;
  shows_gst_to_customer: boolean;
  shows_gstin: boolean;
  display_mode: GSTDisplayMode;
}

export const GST_MODE_POLICIES: Record<GSTMode, GSTModePolicy> = {
  full_gst: {
    label: 'Full GST',
    applies_tax: true,
    shows_gst_to_customer: true,
    shows_gstin: true,
    display_mode: 'full_breakdown',
  },
  partial_gst: {
    label: 'Partial GST',
    applies_tax: true,
    shows_gst_to_customer: false,
    shows_gstin: true,
    display_mode: 'hidden',
  },
  gst_reference: {
    label: 'GST Reference Only',
    applies_tax: false,
    shows_gst_to_customer: true,
    shows_gstin: true,
    display_mode: 'gstin_only',
  },
  no_gst: {
    label: 'No GST',
    applies_tax: false,
    shows_gst_to_customer: false,
    shows_gstin: false,
    display_mode: 'hidden',
  },
};

export const GST_MODES = ['full_gst', 'partial_gst', 'gst_reference', 'no_gst'] as const satisfies readonly GSTMode[];

/** A per-request override wins over the configured default */
export function resolveGSTMode(config: Pick<GSTConfiguration, 'default_gst_mode'>, override?: GSTMode | null): GSTMode {
  return override ?? config.default_gst_mode;
}

export function getGSTModePolicy(mode: GSTMode): GSTModePolicy {
  return GST_MODE_POLICIES[mode];
}

export function appliesTax(mode: GSTMode): boolean {
  return GST_MODE_POLICIES[mode].applies_tax;
}

export function getGSTModeLabel(mode: GSTMode): string {
  return GST_MODE_POLICIES[mode].label;
}
