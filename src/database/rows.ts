/**
 * Decoding of rows read back from PostgreSQL.
 * NUMERIC and BIGINT columns arrive as decimal strings, INTEGER as numbers.
 */

import { z } from 'zod';
import { Address, toAddress } from '../shared/types';

export const storedAddress = z.string().transform((value, ctx): Address => {
  const address = toAddress(value);
  if (!address) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an address: ${value}` });
    return z.NEVER;
  }
  return address;
});

export const storedAmount = z
  .string()
  .regex(/^\d+$/, 'not a non-negative integer')
  .transform((value) => BigInt(value));

export const storedSeconds = z
  .union([z.string().regex(/^\d+$/, 'not a non-negative integer'), z.number().int().nonnegative()])
  .transform((value) => Number(value));

export const storedInteger = z.number().int();

/**
 * Decode every row or fail the whole load
 */
export function decodeRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], table: string): T[] {
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Corrupt ${table} row: ${issues}`);
    }
    return parsed.data;
  });
}
