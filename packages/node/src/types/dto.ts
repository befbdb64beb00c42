/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-unit integer strings; the service parses them
 * into u64 bigints.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AccountSchema = z.string().trim().min(1).max(256);

export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Amount must be a non-negative integer in base units");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Operation DTOs
// =============================================================================

export const MintSchema = z.object({
  to: AccountSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

export const BurnSchema = z.object({
  from: AccountSchema,
  amount: AmountSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

export const TransferSchema = z.object({
  to: AccountSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

// =============================================================================
// Account administration DTOs
// =============================================================================

export const ReferenceBalanceSchema = z.object({
  amount: AmountSchema,
});

export type ReferenceBalanceDto = z.infer<typeof ReferenceBalanceSchema>;

export const RecordActivitySchema = z.object({
  count: z.number().int().min(1).max(1_000_000).default(1),
});

export type RecordActivityDto = z.infer<typeof RecordActivitySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterSequence: z.coerce.number().int().min(0).optional(),
  kind: z.enum(["Mint", "Burn", "Transfer"]).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListHoldersQuerySchema = PaginationQuerySchema;

export type ListHoldersQuery = z.infer<typeof ListHoldersQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

/** An amount in base units with its display form. */
export interface AmountView {
  readonly amount: string;
  readonly display: string;
}

export interface AssetView {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly maxSupply: string | null;
  readonly iconUri: string | null;
  readonly projectUri: string | null;
  readonly administrator: string;
  readonly totalSupply: AmountView;
}

export interface BalanceView extends AmountView {
  readonly account: string;
}

export interface LedgerEventView {
  readonly sequence: number;
  readonly kind: "Mint" | "Burn" | "Transfer";
  readonly actor: string;
  readonly counterparty: string;
  readonly amount: string;
  readonly display: string;
  readonly asset: string;
}

/** A ledger event as read back from the event log. */
export interface EventView extends LedgerEventView {
  readonly eventId: string;
  readonly timestamp: string;
  readonly correlationId: string;
  readonly hash: string;
}

export interface AccountView {
  readonly account: string;
  readonly balance: AmountView;
  readonly activityCounter: string;
  readonly referenceBalance: string;
}
