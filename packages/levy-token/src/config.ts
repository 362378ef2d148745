// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { AddressSchema } from './types.js';
import { InvalidConfigError } from './errors.js';
import {
  DEFAULT_DECIMALS,
  DEFAULT_INITIAL_SUPPLY_UNITS,
  DEFAULT_TAX_PERCENT,
  DEFAULT_TAX_WINDOW_SECONDS,
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
} from './constants.js';

// ---------------------------------------------------------------------------
// Levy token config
// ---------------------------------------------------------------------------

/**
 * Zod schema for LevyTokenConfig.
 *
 * Only `administrator` is required. The remaining fields default to the
 * deployed token's constants: 1,000,000 whole tokens at 18 decimals, a 5%
 * levy and a one-hour window.
 */
export const LevyTokenConfigSchema = z.object({
  /** Becomes the owner, receives the whole supply and is exempt from the levy. */
  administrator: AddressSchema,
  name: z.string().min(1).default(DEFAULT_TOKEN_NAME),
  symbol: z.string().min(1).default(DEFAULT_TOKEN_SYMBOL),
  decimals: z.number().int().min(0).max(255).default(DEFAULT_DECIMALS),
  /** Whole tokens minted at construction, before decimal scaling. */
  initialSupplyUnits: z.bigint().positive().default(DEFAULT_INITIAL_SUPPLY_UNITS),
  taxPercent: z.bigint().min(0n).max(100n).default(DEFAULT_TAX_PERCENT),
  taxWindowSeconds: z.number().int().positive().default(DEFAULT_TAX_WINDOW_SECONDS),
  /**
   * Address the token is deployed at. Doubles as the protocol custody
   * identity. Allocated by the chain when omitted.
   */
  address: AddressSchema.optional(),
});

export type LevyTokenConfig = z.infer<typeof LevyTokenConfigSchema>;
export type LevyTokenConfigInput = z.input<typeof LevyTokenConfigSchema>;

// ---------------------------------------------------------------------------
// Simple asset config
// ---------------------------------------------------------------------------

export const SimpleAssetConfigSchema = z.object({
  name: z.string().min(1),
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(255).default(DEFAULT_DECIMALS),
  /** The only identity allowed to mint. */
  minter: AddressSchema,
  address: AddressSchema.optional(),
});

export type SimpleAssetConfig = z.infer<typeof SimpleAssetConfigSchema>;
export type SimpleAssetConfigInput = z.input<typeof SimpleAssetConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parse and validate a raw token config, throwing InvalidConfigError on
 * failure.
 */
export function parseLevyTokenConfig(raw: unknown): LevyTokenConfig {
  const result = LevyTokenConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse and validate a SimpleAsset config, throwing InvalidConfigError on
 * failure.
 */
export function parseSimpleAssetConfig(raw: unknown): SimpleAssetConfig {
  const result = SimpleAssetConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}
