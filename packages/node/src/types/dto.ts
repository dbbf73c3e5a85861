/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts cross the wire as base-unit digit strings; response mappers
 * turn ledger bigints back into strings.
 */

import { z } from "zod";
import type {
  AccountSummary,
  DepositReceipt,
  RescueReceipt,
  WithdrawReceipt,
} from "@capvault/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Parsed into base units by the route; malformed values fail as INVALID_AMOUNT. */
export const AmountSchema = z.string().min(1);

export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Operation DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  amount: AmountSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RescueSchema = z.object({
  destination: z.string().trim().min(1).max(256),
  amount: AmountSchema,
});

export type RescueDto = z.infer<typeof RescueSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).default(0),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface AccountDto {
  readonly account: string;
  readonly balance: string;
  readonly deposits: number;
  readonly withdrawals: number;
}

export interface BalanceChangeDto {
  readonly account: string;
  readonly amount: string;
  readonly newBalance: string;
}

export interface RescueResultDto {
  readonly destination: string;
  readonly amount: string;
  readonly heldFunds: string;
}

export function toAccountDto(summary: AccountSummary): AccountDto {
  return {
    account: summary.account,
    balance: summary.balance.toString(),
    deposits: summary.deposits,
    withdrawals: summary.withdrawals,
  };
}

export function toBalanceChangeDto(receipt: DepositReceipt | WithdrawReceipt): BalanceChangeDto {
  return {
    account: receipt.account,
    amount: receipt.amount.toString(),
    newBalance: receipt.newBalance.toString(),
  };
}

export function toRescueDto(receipt: RescueReceipt): RescueResultDto {
  return {
    destination: receipt.destination,
    amount: receipt.amount.toString(),
    heldFunds: receipt.heldFunds.toString(),
  };
}
