/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Domain rules
 * (positive shares, matching currency, unique payees) stay in the
 * splitter so HTTP callers get the same error codes as library callers.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentitySchema = z.string().min(1).max(256);

export const MoneySchema = z.object({
  amount: z.string().min(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

// =============================================================================
// Splitter DTOs
// =============================================================================

export const CreateSplitterSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_-]+$/, "may only contain letters, digits, '-' and '_'")
    .optional(),
  currency: z.string().min(1).optional(),
  decimals: z.number().int().min(0).max(18).optional(),
});

export type CreateSplitterDto = z.infer<typeof CreateSplitterSchema>;

export const InitializeSchema = z.object({
  identities: z.array(z.string()),
  shares: z.array(z.number()),
});

export type InitializeDto = z.infer<typeof InitializeSchema>;

export const DepositSchema = z.object({
  amount: MoneySchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const ReleaseSchema = z.object({
  /** Defaults to the caller. */
  identity: IdentitySchema.optional(),
});

export type ReleaseDto = z.infer<typeof ReleaseSchema>;

export const AddFeesSchema = z.object({
  investor: IdentitySchema,
  amount: MoneySchema,
});

export type AddFeesDto = z.infer<typeof AddFeesSchema>;

export const TransferOwnershipSchema = z.object({
  newOwner: IdentitySchema,
});

export type TransferOwnershipDto = z.infer<typeof TransferOwnershipSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const PayeeIndexParamSchema = z.coerce.number().int().min(0);

export const ListEventsQuerySchema = z.object({
  fromVersion: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  direction: z.enum(["forward", "backward"]).default("forward"),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
