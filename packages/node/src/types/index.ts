/**
 * Type barrel: re-exports all public types from @sharepool/node.
 */

// DTOs
export {
  IdentitySchema,
  MoneySchema,
  CreateSplitterSchema,
  InitializeSchema,
  DepositSchema,
  ReleaseSchema,
  AddFeesSchema,
  TransferOwnershipSchema,
  PayeeIndexParamSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  CreateSplitterDto,
  InitializeDto,
  DepositDto,
  ReleaseDto,
  AddFeesDto,
  TransferOwnershipDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { AuthStrategy, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
