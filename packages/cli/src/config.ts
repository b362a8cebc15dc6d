/**
 * .textar/ Config Loader
 *
 * Loads CLI configuration from `<configDir>/config.json`. Every section is
 * optional; missing fields take the defaults below.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ApplyConfigSchema, DecodeConfigSchema, EncodingConfigSchema } from '@textar/archive';

// ============================================================================
// Config Schema
// ============================================================================

const CreateConfigSchema = z.object({
  /** Directory or file names skipped while packing */
  exclude: z.array(z.string()).default(['.git', 'node_modules']),
});

export const TextarConfigSchema = z.object({
  encoding: EncodingConfigSchema.default({}),
  decode: DecodeConfigSchema.default({}),
  edits: ApplyConfigSchema.default({}),
  create: CreateConfigSchema.default({}),
});

export type TextarConfig = z.infer<typeof TextarConfigSchema>;

const DEFAULT_CONFIG: TextarConfig = TextarConfigSchema.parse({});

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from .textar/config.json
 * Falls back to defaults if not found.
 */
export function loadConfig(configPath: string): TextarConfig {
  const configFile = path.join(configPath, 'config.json');

  if (!fs.existsSync(configFile)) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch {
    console.warn(`Warning: Failed to parse ${configFile}, using defaults`);
    return DEFAULT_CONFIG;
  }

  const result = TextarConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
    console.warn(`Warning: Invalid ${configFile} (${where}: ${issue.message}), using defaults`);
    return DEFAULT_CONFIG;
  }

  return result.data;
}

export { DEFAULT_CONFIG };
