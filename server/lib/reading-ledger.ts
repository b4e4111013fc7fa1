import * as schema from "@server/db/schema";
import type { Medium } from "@server/db/schema";
import type { DbExecutor } from "@server/db/client";
import type { DateRange } from "@server/lib/date-utils";
import type { LedgerDelta } from "@server/lib/synchronizer";
import { Decimal } from "decimal.js";
import { and, asc, eq, gte, lte, type SQL } from "drizzle-orm";

/**
 * A ledger row joined with the book it counts towards.
 */
export interface LedgerEntry {
  seq: number;
  progressId: string;
  bookId: string;
  logDate: string;
  medium: Medium;
  pagesEquivalent: Decimal;
  audioSeconds: number;
}

/**
 * Append deltas to the ledger. This is the only write the ledger supports:
 * there is no update or delete, and the table rejects updates.
 */
export function appendLedgerEntries(
  executor: DbExecutor,
  progressId: string,
  deltas: LedgerDelta[],
  createdAt: Date,
): void {
  if (deltas.length === 0) return;

  executor
    .insert(schema.readingLedger)
    .values(
      deltas.map((delta) => ({
        progressId,
        logDate: delta.logDate,
        medium: delta.medium,
        pagesEquivalent: delta.pagesEquivalent.toFixed(2),
        audioSeconds: delta.audioSeconds,
        createdAt,
      })),
    )
    .run();
}

const ledgerColumns = {
  seq: schema.readingLedger.seq,
  progressId: schema.readingLedger.progressId,
  bookId: schema.readingProgress.bookId,
  logDate: schema.readingLedger.logDate,
  medium: schema.readingLedger.medium,
  pagesEquivalent: schema.readingLedger.pagesEquivalent,
  audioSeconds: schema.readingLedger.audioSeconds,
};

function selectLedger(executor: DbExecutor, conditions: SQL[]): LedgerEntry[] {
  return executor
    .select(ledgerColumns)
    .from(schema.readingLedger)
    .innerJoin(
      schema.readingProgress,
      eq(schema.readingLedger.progressId, schema.readingProgress.id),
    )
    .where(and(...conditions))
    .orderBy(asc(schema.readingLedger.logDate), asc(schema.readingLedger.seq))
    .all()
    .map((row) => ({ ...row, pagesEquivalent: new Decimal(row.pagesEquivalent) }));
}

/**
 * Ledger entries of every read-through of a reader, oldest first.
 * Optionally limited to an inclusive date range.
 */
export function listLedgerEntries(
  executor: DbExecutor,
  readerId: string,
  range?: DateRange,
): LedgerEntry[] {
  const conditions = [eq(schema.readingProgress.readerId, readerId)];

  if (range) {
    conditions.push(gte(schema.readingLedger.logDate, range.start));
    conditions.push(lte(schema.readingLedger.logDate, range.end));
  }

  return selectLedger(executor, conditions);
}

/**
 * Ledger entries of a single read-through, oldest first.
 */
export function listProgressLedger(
  executor: DbExecutor,
  progressId: string,
): LedgerEntry[] {
  return selectLedger(executor, [eq(schema.readingLedger.progressId, progressId)]);
}
