/**
 * Zod validation schemas for archive options.
 *
 * Each schema fills in defaults so callers can pass partial objects;
 * the CLI reuses them to validate `.textar/config.json`.
 */

import { z } from 'zod';
import type { EncodingConfig } from './types';

// ============================================================================
// Encoding
// ============================================================================

export const EncodingConfigSchema = z.object({
  checkContentMarkers: z.boolean().default(true),
  validateUtf8: z.boolean().default(true),
});

// ============================================================================
// Decode
// ============================================================================

export const DecodeConfigSchema = z.object({
  strictTags: z.boolean().default(false),
});

// ============================================================================
// Edit Application
// ============================================================================

export const ApplyConfigSchema = z.object({
  matchPolicy: z.enum(['first', 'unique']).default('first'),
});

// ============================================================================
// Inferred Types
// ============================================================================

export type EncodingConfigInput = z.input<typeof EncodingConfigSchema>;
export type DecodeConfig = z.infer<typeof DecodeConfigSchema>;
export type DecodeConfigInput = z.input<typeof DecodeConfigSchema>;
export type ApplyConfig = z.infer<typeof ApplyConfigSchema>;
export type ApplyConfigInput = z.input<typeof ApplyConfigSchema>;

/**
 * Build a frozen EncodingConfig, defaulting both checks to on.
 */
export function createEncodingConfig(input: EncodingConfigInput = {}): EncodingConfig {
  return Object.freeze(EncodingConfigSchema.parse(input));
}

export const DEFAULT_ENCODING_CONFIG: EncodingConfig = createEncodingConfig();
