/**
 * BNPL Credit Protocol - Request Schemas
 * JSON amounts are decimal strings; addresses are normalized to lower case.
 */

import { z } from 'zod';
import { CAPABILITIES } from '../core/access';
import { toAddress } from '../shared/types';

export const AddressSchema = z.string().transform((value, ctx) => {
  const address = toAddress(value);
  if (!address) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address: ${value}` });
    return z.NEVER;
  }
  return address;
});

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, 'Amount must be a decimal string of base units')
  .transform((value) => BigInt(value));

export const LoanIdSchema = z.coerce.number().int().positive();

export const CreateLoanSchema = z.object({
  borrower: AddressSchema,
  merchant: AddressSchema,
  amount: AmountSchema,
});

export const DisputeSchema = z.object({
  reason: z.string().min(1).max(500),
});

export const CheckDefaultSchema = z.object({
  borrower: AddressSchema,
});

export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export const WithdrawSchema = z.object({
  amount: AmountSchema,
  recipient: AddressSchema,
});

export const SetLimitSchema = z.object({
  user: AddressSchema,
  limit: AmountSchema,
});

export const BatchLimitsSchema = z.object({
  users: z.array(AddressSchema),
  limits: z.array(AmountSchema),
});

export const SettingsUpdateSchema = z
  .object({
    repayment_window_days: z.number().int().optional(),
    fee_rate_bps: z.number().int().optional(),
    grace_period_days: z.number().int().optional(),
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), 'At least one setting is required');

export const DefaultCheckSchema = z.object({
  user: AddressSchema,
  loan_id: LoanIdSchema,
});

export const BatchDefaultCheckSchema = z.object({
  users: z.array(AddressSchema),
  loan_ids: z.array(LoanIdSchema),
});

export const GrantSchema = z.object({
  capability: z.enum(CAPABILITIES),
  holder: AddressSchema,
});

export const TransferAdminSchema = z.object({
  next: AddressSchema,
});

export const MintSchema = z.object({
  account: AddressSchema,
  amount: AmountSchema,
});

export const AmountQuerySchema = z.object({
  amount: AmountSchema,
});

export const DefaultPreviewQuerySchema = z.object({
  user: AddressSchema,
  loan_id: LoanIdSchema,
});
