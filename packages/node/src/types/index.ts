/**
 * Type barrel — re-exports all public types from @turnout/node.
 */

// DTOs
export {
  AmountSchema,
  EventIdParamSchema,
  AccountParamSchema,
  CreateEventSchema,
  ReserveSchema,
  DepositSchema,
  toEventView,
  toReservationResponse,
  toWithdrawResponse,
} from "./dto.js";
export type {
  CreateEventDto,
  ReserveDto,
  DepositDto,
  EventView,
  EscrowView,
  ReservationResponse,
  WithdrawResponse,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
