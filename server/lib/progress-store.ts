import * as schema from "@server/db/schema";
import type { Medium } from "@server/db/schema";
import type { DbExecutor } from "@server/db/client";
import { isWithinRange, toLogDate, type DateRange } from "@server/lib/date-utils";
import {
  toMediumState,
  toProgressRecord,
  type MediumState,
  type ProgressKey,
  type ProgressRecord,
} from "@server/lib/progress-record";
import { and, eq, isNotNull, isNull } from "drizzle-orm";

function keyConditions(key: ProgressKey) {
  return and(
    eq(schema.readingProgress.readerId, key.readerId),
    eq(schema.readingProgress.bookId, key.bookId),
    key.contextId === null
      ? isNull(schema.readingProgress.contextId)
      : eq(schema.readingProgress.contextId, key.contextId),
  );
}

export function findProgress(
  executor: DbExecutor,
  key: ProgressKey,
): ProgressRecord | null {
  const row = executor
    .select()
    .from(schema.readingProgress)
    .where(keyConditions(key))
    .get();

  return row ? toProgressRecord(row) : null;
}

export function listMedia(executor: DbExecutor, progressId: string): MediumState[] {
  return executor
    .select()
    .from(schema.progressMedium)
    .where(eq(schema.progressMedium.progressId, progressId))
    .all()
    .map(toMediumState);
}

export function insertProgress(executor: DbExecutor, record: ProgressRecord): void {
  executor
    .insert(schema.readingProgress)
    .values({
      id: record.id,
      readerId: record.readerId,
      bookId: record.bookId,
      contextId: record.contextId,
      percent: record.percent.toFixed(2),
      activeFormats: record.activeFormats,
      customTotalPages: record.customTotalPages,
      audioPlaybackSpeed: record.audioPlaybackSpeed.toString(),
      currentPage: record.currentPage,
      finishedAt: record.finishedAt,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
    })
    .run();
}

export function saveProgress(executor: DbExecutor, record: ProgressRecord): void {
  executor
    .update(schema.readingProgress)
    .set({
      percent: record.percent.toFixed(2),
      activeFormats: record.activeFormats,
      customTotalPages: record.customTotalPages,
      audioPlaybackSpeed: record.audioPlaybackSpeed.toString(),
      currentPage: record.currentPage,
      finishedAt: record.finishedAt,
      updatedAt: record.updatedAt,
    })
    .where(eq(schema.readingProgress.id, record.id))
    .run();
}

/**
 * Write every medium of a record, inserting new ones.
 * Media missing from `media` are removed.
 */
export function saveMedia(
  executor: DbExecutor,
  progressId: string,
  media: MediumState[],
): void {
  const kept = new Set<Medium>(media.map((m) => m.medium));
  for (const existing of listMedia(executor, progressId)) {
    if (!kept.has(existing.medium)) {
      executor
        .delete(schema.progressMedium)
        .where(eq(schema.progressMedium.id, existing.id))
        .run();
    }
  }

  for (const m of media) {
    const values = {
      currentPage: m.currentPage,
      totalPagesOverride: m.totalPagesOverride,
      audioPositionSeconds: m.audioPositionSeconds,
      audioLengthSeconds: m.audioLengthSeconds,
      playbackSpeed: m.playbackSpeed === null ? null : m.playbackSpeed.toString(),
    };

    executor
      .insert(schema.progressMedium)
      .values({ id: m.id, progressId, medium: m.medium, ...values })
      .onConflictDoUpdate({
        target: [schema.progressMedium.progressId, schema.progressMedium.medium],
        set: values,
      })
      .run();
  }
}

export interface CompletionRow {
  progressId: string;
  bookId: string;
  /** Day the book was finished, in the reader's time zone */
  finishedOn: string;
}

/**
 * Books a reader finished, dated in `timeZone`, optionally limited to a range.
 */
export function listCompletions(
  executor: DbExecutor,
  readerId: string,
  timeZone: string,
  range?: DateRange,
): CompletionRow[] {
  return executor
    .select({
      progressId: schema.readingProgress.id,
      bookId: schema.readingProgress.bookId,
      finishedAt: schema.readingProgress.finishedAt,
    })
    .from(schema.readingProgress)
    .where(
      and(
        eq(schema.readingProgress.readerId, readerId),
        isNotNull(schema.readingProgress.finishedAt),
      ),
    )
    .all()
    .flatMap((row) =>
      row.finishedAt
        ? [
            {
              progressId: row.progressId,
              bookId: row.bookId,
              finishedOn: toLogDate(row.finishedAt, timeZone),
            },
          ]
        : [],
    )
    .filter((row) => !range || isWithinRange(row.finishedOn, range))
    .sort((a, b) => a.finishedOn.localeCompare(b.finishedOn));
}
