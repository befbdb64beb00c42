/**
 * Type barrel — re-exports all public types from @tollgate/node.
 */

// DTOs
export {
  AccountSchema,
  AmountSchema,
  PaginationQuerySchema,
  MintSchema,
  BurnSchema,
  TransferSchema,
  ReferenceBalanceSchema,
  RecordActivitySchema,
  ListEventsQuerySchema,
  ListHoldersQuerySchema,
} from "./dto.js";
export type {
  MintDto,
  BurnDto,
  TransferDto,
  ReferenceBalanceDto,
  RecordActivityDto,
  ListEventsQuery,
  ListHoldersQuery,
  AmountView,
  AssetView,
  BalanceView,
  LedgerEventView,
  EventView,
  AccountView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  Cursor,
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
