import { relations, sql } from "drizzle-orm";
import {
  index,
  integer,
  sqliteTable,
  text,
  unique,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";

export const MEDIUMS = ["paper", "ebook", "audio"] as const;
export type Medium = (typeof MEDIUMS)[number];

/**
 * One read-through of a book by a reader.
 * A reader has at most one record per book without a context, and at most one
 * per (book, context) for read-throughs bound to an event.
 */
export const readingProgress = sqliteTable(
  "reading_progress",
  {
    id: text("id").primaryKey(), // UUID generated server-side
    readerId: text("reader_id").notNull(),
    bookId: text("book_id").notNull(),
    contextId: text("context_id"), // e.g. an event id; null for the default read-through

    // Decimal stored as text ("42.50") to keep it exact
    percent: text("percent").default("0.00").notNull(),
    activeFormats: text("active_formats", { mode: "json" })
      .$type<Medium[]>()
      .notNull(),
    customTotalPages: integer("custom_total_pages"),
    audioPlaybackSpeed: text("audio_playback_speed").default("1.0").notNull(),
    currentPage: integer("current_page"),

    finishedAt: integer("finished_at", { mode: "timestamp_ms" }),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    uniqueIndex("uniq_progress_per_context")
      .on(t.readerId, t.bookId, t.contextId)
      .where(sql`${t.contextId} is not null`),
    uniqueIndex("uniq_progress_no_context")
      .on(t.readerId, t.bookId)
      .where(sql`${t.contextId} is null`),
    index("idx_progress_reader").on(t.readerId),
  ],
);

/**
 * Position of one active format within a read-through.
 * Paper and e-book rows use the page columns, audio rows the seconds columns.
 */
export const progressMedium = sqliteTable(
  "progress_medium",
  {
    id: text("id").primaryKey(),
    progressId: text("progress_id")
      .notNull()
      .references(() => readingProgress.id, { onDelete: "cascade" }),
    medium: text("medium", { enum: MEDIUMS }).notNull(),

    currentPage: integer("current_page"),
    totalPagesOverride: integer("total_pages_override"),

    audioPositionSeconds: integer("audio_position_seconds"),
    audioLengthSeconds: integer("audio_length_seconds"),
    playbackSpeed: text("playback_speed"),
  },
  (t) => [unique("progress_medium_unique").on(t.progressId, t.medium)],
);

/**
 * Append-only ledger of daily page-equivalent deltas.
 * Rows are inserted and never updated; several rows may share a day and medium.
 */
export const readingLedger = sqliteTable(
  "reading_ledger",
  {
    seq: integer("seq").primaryKey({ autoIncrement: true }),
    progressId: text("progress_id")
      .notNull()
      .references(() => readingProgress.id, { onDelete: "cascade" }),
    logDate: text("log_date").notNull(), // yyyy-MM-dd in the reader's time zone
    medium: text("medium", { enum: MEDIUMS }).notNull(),
    pagesEquivalent: text("pages_equivalent").notNull(),
    audioSeconds: integer("audio_seconds").default(0).notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    index("idx_ledger_progress_date").on(t.progressId, t.logDate),
    index("idx_ledger_date").on(t.logDate),
  ],
);

/**
 * A timed sitting with a paper or e-book copy, used for reading-speed
 * estimates. Pages are in the medium's own pagination.
 */
export const readingSession = sqliteTable(
  "reading_session",
  {
    id: text("id").primaryKey(),
    progressId: text("progress_id")
      .notNull()
      .references(() => readingProgress.id, { onDelete: "cascade" }),
    medium: text("medium", { enum: MEDIUMS }).notNull(),
    startPage: integer("start_page").notNull(),
    endPage: integer("end_page").notNull(),
    // Pages covered in the reference edition; null while the book length is unknown
    pagesEquivalent: text("pages_equivalent"),
    durationSeconds: integer("duration_seconds").default(0).notNull(),
    startedAt: integer("started_at", { mode: "timestamp_ms" }).notNull(),
    endedAt: integer("ended_at", { mode: "timestamp_ms" }).notNull(),
  },
  (t) => [index("idx_session_progress").on(t.progressId, t.startedAt)],
);

export const readingProgressRelations = relations(
  readingProgress,
  ({ many }) => ({
    media: many(progressMedium),
    ledger: many(readingLedger),
    sessions: many(readingSession),
  }),
);

export const progressMediumRelations = relations(progressMedium, ({ one }) => ({
  progress: one(readingProgress, {
    fields: [progressMedium.progressId],
    references: [readingProgress.id],
  }),
}));

export const readingLedgerRelations = relations(readingLedger, ({ one }) => ({
  progress: one(readingProgress, {
    fields: [readingLedger.progressId],
    references: [readingProgress.id],
  }),
}));

export const readingSessionRelations = relations(readingSession, ({ one }) => ({
  progress: one(readingProgress, {
    fields: [readingSession.progressId],
    references: [readingProgress.id],
  }),
}));

export type ReadingProgressRow = typeof readingProgress.$inferSelect;
export type ProgressMediumRow = typeof progressMedium.$inferSelect;
export type ReadingLedgerRow = typeof readingLedger.$inferSelect;
export type NewReadingLedgerRow = typeof readingLedger.$inferInsert;
export type ReadingSessionRow = typeof readingSession.$inferSelect;
