/**
 * Type barrel — re-exports all public types from @cadence/node.
 */

// DTOs
export {
  AmountSchema,
  SecondsSchema,
  AccountSchema,
  TokenSchema,
  CreateStreamSchema,
  CreateStreamBatchSchema,
  CreateVestingSchema,
  MintSchema,
  ListEventsQuerySchema,
  toScheduleDto,
  toProgressDto,
  toClaimDto,
} from "./dto.js";
export type {
  CreateStreamDto,
  CreateStreamBatchDto,
  CreateVestingDto,
  MintDto,
  ListEventsQuery,
  ScheduleDto,
  StreamDto,
  VestingDto,
  ProgressDto,
  ClaimDto,
  TerminationDto,
} from "./dto.js";
export { PaginationQuerySchema, IdParamSchema } from "./query.js";

// Envelopes
export { createErrorEnvelope, dataEnvelope } from "./envelope.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, DataEnvelope } from "./envelope.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
