import * as schema from "@server/db/schema";
import type { DbExecutor } from "@server/db/client";
import type { Medium } from "@server/db/schema";
import { Decimal } from "decimal.js";
import { asc, eq } from "drizzle-orm";

export interface ReadingSession {
  id: string;
  progressId: string;
  medium: Medium;
  startPage: number;
  endPage: number;
  pagesEquivalent: Decimal | null;
  durationSeconds: number;
  startedAt: Date;
  endedAt: Date;
}

export function appendSession(executor: DbExecutor, session: ReadingSession): void {
  executor
    .insert(schema.readingSession)
    .values({
      ...session,
      pagesEquivalent: session.pagesEquivalent?.toFixed(2) ?? null,
    })
    .run();
}

/**
 * Sessions of a single read-through, oldest first.
 */
export function listProgressSessions(
  executor: DbExecutor,
  progressId: string,
): ReadingSession[] {
  return executor
    .select()
    .from(schema.readingSession)
    .where(eq(schema.readingSession.progressId, progressId))
    .orderBy(asc(schema.readingSession.startedAt))
    .all()
    .map((row) => ({
      ...row,
      pagesEquivalent: row.pagesEquivalent === null ? null : new Decimal(row.pagesEquivalent),
    }));
}
