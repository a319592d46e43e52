/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts and times are integers that may exceed 2^53, so they travel as
 * decimal strings in both directions. Times may also be sent as plain
 * JSON numbers when they fit a safe integer.
 */

import { z } from "zod";
import type {
  ClaimRecord,
  Schedule,
  ScheduleProgress,
  TerminationRecord,
} from "@cadence/schedules";
import { PaginationQuerySchema } from "./query.js";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Signed base-unit amount; sign and range are the engines' to judge. */
export const AmountSchema = z
  .string()
  .regex(/^-?\d{1,40}$/, "must be an integer amount in base units")
  .transform((v) => BigInt(v));

/** Unix seconds or a duration in seconds. */
export const SecondsSchema = z
  .union([
    z.string().regex(/^\d{1,20}$/, "must be a non-negative integer"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((v) => BigInt(v));

export const AccountSchema = z.string().min(1).max(128);

export const TokenSchema = z.string().min(1).max(64);

// =============================================================================
// Stream DTOs
// =============================================================================

export const CreateStreamSchema = z.object({
  recipient: AccountSchema,
  token: TokenSchema,
  totalAmount: AmountSchema,
  startTime: SecondsSchema,
  endTime: SecondsSchema,
});

export type CreateStreamDto = z.infer<typeof CreateStreamSchema>;

export const CreateStreamBatchSchema = z.object({
  streams: z.array(CreateStreamSchema).max(100),
});

export type CreateStreamBatchDto = z.infer<typeof CreateStreamBatchSchema>;

// =============================================================================
// Vesting DTOs
// =============================================================================

export const CreateVestingSchema = z.object({
  beneficiary: AccountSchema,
  token: TokenSchema,
  totalAmount: AmountSchema,
  startTime: SecondsSchema,
  cliffDuration: SecondsSchema,
  cliffAmount: AmountSchema,
  totalDuration: SecondsSchema,
  label: z.string(),
  revocable: z.boolean().default(true),
});

export type CreateVestingDto = z.infer<typeof CreateVestingSchema>;

// =============================================================================
// Ledger DTOs
// =============================================================================

export const MintSchema = z.object({
  account: AccountSchema,
  token: TokenSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Event Queries
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  source: z.enum(["stream", "vesting", "ledger"]).optional(),
  correlationId: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface TerminationDto {
  readonly at: string;
  readonly settledAmount: string;
  readonly refundedAmount: string;
  readonly originalTotal: string;
}

interface ScheduleDtoBase {
  readonly id: number;
  readonly sender: string;
  readonly recipient: string;
  readonly token: string;
  readonly totalAmount: string;
  readonly claimedAmount: string;
  readonly startTime: string;
  readonly status: Schedule["status"];
  readonly lastClaimTime: string;
  readonly createdAt: string;
  readonly termination?: TerminationDto;
}

export interface StreamDto extends ScheduleDtoBase {
  readonly kind: "stream";
  readonly endTime: string;
}

export interface VestingDto extends ScheduleDtoBase {
  readonly kind: "vesting";
  readonly cliffDuration: string;
  readonly cliffAmount: string;
  readonly totalDuration: string;
  readonly label: string;
  readonly revocable: boolean;
}

export type ScheduleDto = StreamDto | VestingDto;

export interface ProgressDto {
  readonly id: number;
  readonly kind: Schedule["kind"];
  readonly status: Schedule["status"];
  readonly totalAmount: string;
  readonly accruedAmount: string;
  readonly claimedAmount: string;
  readonly claimableAmount: string;
  readonly asOf: string;
}

export interface ClaimDto {
  readonly amount: string;
  readonly timestamp: string;
}

function toTerminationDto(t: TerminationRecord): TerminationDto {
  return {
    at: t.at.toString(),
    settledAmount: t.settledAmount.toString(),
    refundedAmount: t.refundedAmount.toString(),
    originalTotal: t.originalTotal.toString(),
  };
}

export function toScheduleDto(schedule: Schedule): ScheduleDto {
  const base: ScheduleDtoBase = {
    id: schedule.id,
    sender: schedule.sender,
    recipient: schedule.recipient,
    token: schedule.token,
    totalAmount: schedule.totalAmount.toString(),
    claimedAmount: schedule.claimedAmount.toString(),
    startTime: schedule.startTime.toString(),
    status: schedule.status,
    lastClaimTime: schedule.lastClaimTime.toString(),
    createdAt: schedule.createdAt.toString(),
    ...(schedule.termination !== undefined
      ? { termination: toTerminationDto(schedule.termination) }
      : {}),
  };

  if (schedule.kind === "stream") {
    return { ...base, kind: "stream", endTime: schedule.endTime.toString() };
  }
  return {
    ...base,
    kind: "vesting",
    cliffDuration: schedule.cliffDuration.toString(),
    cliffAmount: schedule.cliffAmount.toString(),
    totalDuration: schedule.totalDuration.toString(),
    label: schedule.label,
    revocable: schedule.revocable,
  };
}

export function toProgressDto(p: ScheduleProgress): ProgressDto {
  return {
    id: p.id,
    kind: p.kind,
    status: p.status,
    totalAmount: p.totalAmount.toString(),
    accruedAmount: p.accruedAmount.toString(),
    claimedAmount: p.claimedAmount.toString(),
    claimableAmount: p.claimableAmount.toString(),
    asOf: p.asOf.toString(),
  };
}

export function toClaimDto(record: ClaimRecord): ClaimDto {
  return { amount: record.amount.toString(), timestamp: record.timestamp.toString() };
}
