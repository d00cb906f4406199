import { z } from 'zod';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DECIMAL = /^-?\d+(\.\d+)?$/;

export const LinkStateSchema = z.enum(['ACTIVE', 'REQUIRES_VERIFICATION']);
export type LinkState = z.infer<typeof LinkStateSchema>;

export const LinkSchema = z.object({
  itemId: z.string().min(1),
  alias: z.string(),
  accessToken: z.string().min(1),
  state: LinkStateSchema,
  syncCursor: z.string().nullable(),
  institutionId: z.string().nullable(),
});
export type Link = z.infer<typeof LinkSchema>;

export const AccountTypeSchema = z.enum(['depository', 'credit', 'loan', 'investment', 'other']);
export type AccountType = z.infer<typeof AccountTypeSchema>;

export const AccountSchema = z.object({
  id: z.string().min(1),
  itemId: z.string().min(1),
  name: z.string(),
  type: AccountTypeSchema,
  mask: z.string().nullable(),
  currency: z.string().min(1),
  currentBalance: z.string().regex(DECIMAL).nullable(),
  availableBalance: z.string().regex(DECIMAL).nullable(),
});
export type Account = z.infer<typeof AccountSchema>;

export const TransactionStatusSchema = z.enum(['PENDING', 'POSTED']);
export type TransactionStatus = z.infer<typeof TransactionStatusSchema>;

export const TransactionSchema = z.object({
  id: z.string().min(1),
  upstreamId: z.string().min(1),
  itemId: z.string().min(1),
  accountId: z.string().min(1),
  date: z.string().regex(ISO_DATE, 'Date must be in YYYY-MM-DD format'),
  narration: z.string(),
  payee: z.string().nullable(),
  merchant: z.string().nullable(),
  category: z.string().nullable(),
  /** Signed from the origin account's perspective: negative means money left the account. */
  amount: z.string().regex(DECIMAL),
  currency: z.string().min(1),
  /** Upstream record exactly as fetched, serialized as JSON. */
  source: z.string(),
  status: TransactionStatusSchema,
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const PostingSchema = z.object({
  id: z.string().min(1),
  txnId: z.string().min(1),
  account: z.string().min(1),
  amount: z.string().regex(DECIMAL),
  currency: z.string().min(1),
  status: TransactionStatusSchema,
});
export type Posting = z.infer<typeof PostingSchema>;

export const TagSchema = z.object({
  id: z.string().min(1),
  txnId: z.string().min(1),
  value: z.string().min(1),
});
export type Tag = z.infer<typeof TagSchema>;

export const CategorizationDirectiveSchema = z
  .object({
    account: z.string().trim().min(1, 'directive account must not be empty'),
    alias: z.string().min(1).optional(),
    tags: z.array(z.string().min(1)).default([]),
  })
  .strict();
export type CategorizationDirective = z.infer<typeof CategorizationDirectiveSchema>;
