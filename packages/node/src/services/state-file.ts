/**
 * Splitter state file: snapshots of every splitter and its journal.
 *
 * Written after each mutating request when persistence is enabled and
 * read once at startup. The file is replaced atomically (write + rename).
 * Shapes are checked with zod here; the domain restore re-checks totals.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { z } from "zod";
import type { SplitterServiceState } from "./splitter-service.js";

// =============================================================================
// Schemas
// =============================================================================

const MoneySchema = z.object({
  amount: z.string().regex(/^-?\d+(\.\d+)?$/),
  currency: z.string().min(1),
  decimals: z.number().int().min(0),
});

const SplitterSnapshotSchema = z.object({
  version: z.literal(1),
  id: z.string().min(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0),
  owner: z.string().min(1),
  initialized: z.boolean(),
  payees: z.array(
    z.object({ identity: z.string(), shares: z.number(), released: MoneySchema }),
  ),
  totalReleased: MoneySchema,
  poolBalance: MoneySchema,
  investors: z.array(
    z.object({
      identity: z.string(),
      feeOwed: MoneySchema,
      status: z.enum(["active", "cleared"]),
      reimbursed: MoneySchema,
    }),
  ),
  feePoolTotal: MoneySchema,
  asOf: z.string(),
});

const LedgerEntrySchema = z.object({
  id: z.string(),
  accountId: z.string(),
  type: z.enum(["debit", "credit"]),
  money: MoneySchema,
  timestamp: z.string(),
  correlationId: z.string(),
  reference: z.string().optional(),
});

const JournalSnapshotSchema = z.object({
  version: z.literal(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0),
  accounts: z.array(
    z.object({
      ref: z.object({
        id: z.string(),
        type: z.enum(["asset", "liability", "income", "expense", "equity"]),
        name: z.string(),
      }),
      openedAt: z.string(),
    }),
  ),
  transactions: z.array(
    z.object({
      correlationId: z.string(),
      entries: z.array(LedgerEntrySchema),
      timestamp: z.string(),
      description: z.string().optional(),
    }),
  ),
  createdAt: z.string(),
});

export const StateFileSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  splitters: z.array(
    z.object({ splitter: SplitterSnapshotSchema, journal: JournalSnapshotSchema }),
  ),
});

export type StateFile = z.infer<typeof StateFileSchema>;

// =============================================================================
// IO
// =============================================================================

/**
 * Read the state file. A missing file is an empty state.
 *
 * @throws {Error} when the file exists but does not parse
 */
export function readStateFile(filePath: string): readonly SplitterServiceState[] {
  if (!existsSync(filePath)) {
    return [];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new Error(`State file ${filePath} is not valid JSON`, { cause: err });
  }

  const result = StateFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`State file ${filePath} is malformed: ${issues}`);
  }
  return result.data.splitters;
}

export function writeStateFile(
  filePath: string,
  states: readonly SplitterServiceState[],
  savedAt: string = new Date().toISOString(),
): void {
  const file = { version: 1, savedAt, splitters: states };
  const tmp = `${filePath}.tmp`;
  writeFileSync(tmp, JSON.stringify(file), "utf-8");
  renameSync(tmp, filePath);
}
