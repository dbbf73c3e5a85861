/**
 * Type barrel: re-exports all public types from @capvault/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  DepositSchema,
  WithdrawSchema,
  RescueSchema,
  ListEventsQuerySchema,
  toAccountDto,
  toBalanceChangeDto,
  toRescueDto,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  RescueDto,
  ListEventsQuery,
  AccountDto,
  BalanceChangeDto,
  RescueResultDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { paginate } from "./pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
