/**
 * BNPL Credit Protocol - Configuration
 *
 * Loads and validates configuration from environment variables using Zod.
 * `.env` is loaded by dotenv at boot.
 */

import { z } from 'zod';
import { Address, toAddress } from './shared/types';

// ============================================================================
// SCHEMA
// ============================================================================

function addressField(fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const address = toAddress(value);
      if (!address || /^0x0{40}$/.test(address)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address: ${value}` });
        return z.NEVER;
      }
      return address;
    });
}

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().optional(),

  // Auth
  ADMIN_API_KEY: z.string().optional(),
  ACTOR_API_KEYS: z.string().default(''),
  RATE_LIMIT_RPM: z.coerce.number().int().min(1).default(100),

  // Identities
  ADMIN_ADDRESS: addressField('0x00000000000000000000000000000000000000ad'),
  ORCHESTRATOR_ADDRESS: addressField('0x00000000000000000000000000000000000000b1'),
  CREDIT_LEDGER_ADDRESS: addressField('0x00000000000000000000000000000000000000b2'),
  LIQUIDITY_LEDGER_ADDRESS: addressField('0x00000000000000000000000000000000000000b3'),
  DEFAULT_DETECTOR_ADDRESS: addressField('0x00000000000000000000000000000000000000b4'),

  // Loan terms
  REPAYMENT_WINDOW_DAYS: z.coerce.number().int().min(1).default(30),
  FEE_RATE_BPS: z.coerce.number().int().min(0).max(10_000).default(50),
  GRACE_PERIOD_DAYS: z.coerce.number().int().min(0).default(3),

  // Event mirror
  EVENT_MIRROR_URL: z.string().url().optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// ============================================================================
// ACTOR KEYS
// ============================================================================

export interface ActorApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse ACTOR_API_KEYS into key -> address records.
 *
 * Format: "key1:0xabc...,key2:0xdef..."
 */
export function parseActorApiKeys(raw: string): readonly ActorApiKey[] {
  if (raw.trim() === '') {
    return [];
  }

  const keys: ActorApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(',')) {
    const parts = entry.trim().split(':');
    if (parts.length !== 2) {
      throw new Error(`Invalid ACTOR_API_KEYS entry: "${entry.trim()}". Expected format: key:address`);
    }

    const [key, rawAddress] = parts;
    if (key === '') {
      throw new Error('API key cannot be empty');
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in ACTOR_API_KEYS: "${key}"`);
    }
    const address = toAddress(rawAddress);
    if (!address) {
      throw new Error(`Invalid address "${rawAddress}" in ACTOR_API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

// ============================================================================
// LOADER
// ============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  return ConfigSchema.parse(env);
}
