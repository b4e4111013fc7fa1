/**
 * Progress Engine
 *
 * Entry point for callers. Validates input, runs each write as one IMMEDIATE
 * transaction (load → synchronize → persist), then emits events once the
 * transaction has committed. Reads run outside transactions.
 */

import type { AppDatabase } from "@server/db/client";
import type { Medium } from "@server/db/schema";
import {
  buildCalendar,
  computeStreaks,
  dailyTotals,
  estimateCompletion,
  periodSummary,
  type CompletionEstimate,
  type DayTotal,
  type PeriodSummary,
  type ReadingCalendar,
  type StreakSummary,
} from "@server/lib/aggregator";
import type { EngineConfig } from "@server/lib/config";
import { toLogDate, yearRange } from "@server/lib/date-utils";
import {
  adjustedAudioLength,
  applyPlaybackSpeed,
  clampRawValue,
  exactPagesEquivalent,
  isPageMedium,
  percentOf,
  rawValueAtPercent,
  toPagesEquivalent,
} from "@server/lib/equivalence";
import {
  isProgressError,
  progressError,
  type ProgressError,
  type ProgressNotice,
} from "@server/lib/progress-errors";
import {
  ProgressEventEmitter,
  type BookCompletedEvent,
  type ProgressAdvancedEvent,
} from "@server/lib/progress-events";
import {
  effectiveTotalPages,
  findMedium,
  mediumTotal,
  playbackSpeedOf,
  rawValueOf,
  statusOf,
  withRawValue,
  type MediumState,
  type ProgressKey,
  type ProgressRecord,
  type ProgressState,
  type ProgressStatus,
} from "@server/lib/progress-record";
import {
  activateMediumSchema,
  calendarQuerySchema,
  customTotalPagesSchema,
  dateRangeSchema,
  deactivateMediumSchema,
  finishSchema,
  logListeningSchema,
  logPagesSchema,
  logSessionSchema,
  periodQuerySchema,
  progressKeySchema,
  readerIdSchema,
  reportProgressSchema,
  setPlaybackSpeedSchema,
  type ActivateMediumInput,
  type CalendarQueryInput,
  type CustomTotalPagesInput,
  type DateRangeInput,
  type DeactivateMediumInput,
  type FinishInput,
  type LogListeningInput,
  type LogPagesInput,
  type LogSessionInput,
  type PeriodQueryInput,
  type ProgressKeyInput,
  type ReportProgressInput,
  type SetPlaybackSpeedInput,
} from "@server/lib/progress-schemas";
import {
  findProgress,
  insertProgress,
  listCompletions,
  listMedia,
  saveMedia,
  saveProgress,
} from "@server/lib/progress-store";
import {
  appendLedgerEntries,
  listLedgerEntries,
  listProgressLedger,
} from "@server/lib/reading-ledger";
import {
  appendSession,
  listProgressSessions,
  type ReadingSession,
} from "@server/lib/reading-sessions";
import {
  applyActivation,
  applyDeactivation,
  applyFinish,
  applyUpdate,
  type SyncOutcome,
  type SyncResult,
} from "@server/lib/synchronizer";
import { randomUUID } from "node:crypto";
import { differenceInSeconds } from "date-fns";
import { Decimal } from "decimal.js";
import type { z } from "zod";

/**
 * Catalog collaborator: the page count of a book, or null when unknown.
 */
export interface BookCatalog {
  getEffectiveTotalPages(bookId: string): Promise<number | null>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export interface ProgressEngineOptions {
  db: AppDatabase;
  catalog: BookCatalog;
  config: Pick<EngineConfig, "timeZone" | "defaultPlaybackSpeed" | "logEvents">;
  clock?: Clock;
  generateId?: () => string;
}

export interface MediumSnapshot {
  medium: Medium;
  currentPage: number | null;
  totalPages: number | null;
  audioPositionSeconds: number | null;
  audioLengthSeconds: number | null;
  playbackSpeed: string | null;
  /** Completion of this medium on its own, null when its total is unknown */
  percent: string | null;
  /** Wall-clock listening left at the current speed; audio with a known length only */
  listeningSecondsRemaining: number | null;
}

export interface ProgressSnapshot {
  progressId: string;
  readerId: string;
  bookId: string;
  contextId: string | null;
  status: ProgressStatus;
  percent: string;
  currentPage: number | null;
  totalPages: number | null;
  customTotalPages: number | null;
  audioPlaybackSpeed: string;
  activeFormats: Medium[];
  media: MediumSnapshot[];
  estimate: CompletionEstimate;
  finishedAt: Date | null;
  updatedAt: Date;
}

export type ProgressUpdate = {
  snapshot: ProgressSnapshot;
  /** Page-equivalents appended to the ledger by this call */
  deltaEquivalent: string;
  notice?: ProgressNotice;
};

export type ProgressUpdateResult = ProgressUpdate | ProgressError;

type SessionDraft = Omit<ReadingSession, "id" | "progressId" | "pagesEquivalent">;

type CommittedChange = {
  update: ProgressUpdate;
  result: SyncResult;
  completed: boolean;
};

const KEY_FIELDS: PropertyKey[] = ["readerId", "bookId", "contextId"];

/**
 * Problems with the reader, book or context ids are reported as
 * `invalid-key`; anything else as `code`.
 */
function invalidInput(
  error: z.ZodError,
  code: ProgressError["error"] = "invalid-raw-value",
): ProgressError {
  const keyIssue = error.issues.some((issue) => KEY_FIELDS.includes(issue.path[0] ?? ""));
  return progressError(
    keyIssue ? "invalid-key" : code,
    error.issues.map((issue) => issue.message).join("; "),
  );
}

function toKey(input: ProgressKeyInput): ProgressKey {
  return {
    readerId: input.readerId,
    bookId: input.bookId,
    contextId: input.contextId ?? null,
  };
}

export class ProgressEngine {
  readonly events = new ProgressEventEmitter();

  private db: AppDatabase;
  private catalog: BookCatalog;
  private config: ProgressEngineOptions["config"];
  private clock: Clock;
  private generateId: () => string;

  constructor(options: ProgressEngineOptions) {
    this.db = options.db;
    this.catalog = options.catalog;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Record the reader's position in one format and synchronize the others.
   * Creates the read-through on first report.
   */
  async reportProgress(input: ReportProgressInput): Promise<ProgressUpdateResult> {
    const parsed = reportProgressSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error);

    const { medium, rawValue } = parsed.data;
    const key = toKey(parsed.data);
    const occurredAt = parsed.data.occurredAt ?? this.clock.now();

    return this.write(key, occurredAt, { createWith: medium }, (state) =>
      applyUpdate(state, medium, rawValue, occurredAt, this.config.timeZone),
    );
  }

  /**
   * Advance the audio position by wall-clock listening time. The listened
   * time is scaled by the playback speed before it is added.
   */
  async logListening(input: LogListeningInput): Promise<ProgressUpdateResult> {
    const parsed = logListeningSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error);

    const { amount } = parsed.data;
    const key = toKey(parsed.data);
    const occurredAt = parsed.data.occurredAt ?? this.clock.now();

    return this.write(key, occurredAt, { createWith: "audio" }, (state) => {
      const audio = findMedium(state, "audio");
      if (!audio) {
        return progressError("no-active-medium", 'Format "audio" is not active for this book');
      }

      const advance = applyPlaybackSpeed(amount, playbackSpeedOf(state, audio));
      return applyUpdate(
        state,
        "audio",
        rawValueOf(audio) + advance,
        occurredAt,
        this.config.timeZone,
      );
    });
  }

  /**
   * Advance a paper or e-book position by a number of pages read.
   */
  async logPages(input: LogPagesInput): Promise<ProgressUpdateResult> {
    const parsed = logPagesSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error);

    const { medium, amount } = parsed.data;
    const key = toKey(parsed.data);
    const occurredAt = parsed.data.occurredAt ?? this.clock.now();

    return this.write(key, occurredAt, { createWith: medium }, (state) => {
      const current = findMedium(state, medium);
      const from = current ? rawValueOf(current) : 0;
      return applyUpdate(state, medium, from + amount, occurredAt, this.config.timeZone);
    });
  }

  /**
   * Record a timed reading session on a paper or e-book copy and move that
   * copy to the session's end page. Sessions feed the reading-speed estimate.
   * The duration defaults to the time between start and end.
   */
  async logSession(input: LogSessionInput): Promise<ProgressUpdateResult> {
    const parsed = logSessionSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error);

    const { medium, startPage, endPage, startedAt } = parsed.data;
    const endedAt = parsed.data.endedAt ?? this.clock.now();
    if (endedAt.getTime() < startedAt.getTime()) {
      return progressError("invalid-raw-value", "Session must not end before it starts");
    }

    const session: SessionDraft = {
      medium,
      startPage,
      endPage,
      durationSeconds: parsed.data.durationSeconds ?? differenceInSeconds(endedAt, startedAt),
      startedAt,
      endedAt,
    };

    return this.write(toKey(parsed.data), endedAt, { createWith: medium, session }, (state) =>
      applyUpdate(state, medium, endPage, endedAt, this.config.timeZone),
    );
  }

  /**
   * Mark the read-through as finished. Calling it again is a no-op.
   */
  async markFinished(input: FinishInput): Promise<ProgressUpdateResult> {
    const parsed = finishSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error);

    const key = toKey(parsed.data);
    const occurredAt = parsed.data.occurredAt ?? this.clock.now();

    return this.write(key, occurredAt, { createWith: "paper" }, (state) =>
      applyFinish(state, occurredAt, this.config.timeZone),
    );
  }

  /**
   * Start tracking a format (or change its totals) and move it to the
   * current percent.
   */
  async activateMedium(input: ActivateMediumInput): Promise<ProgressUpdateResult> {
    const parsed = activateMediumSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const { medium, totalPagesOverride, audioLengthSeconds, playbackSpeed } = parsed.data;
    const key = toKey(parsed.data);
    const occurredAt = this.clock.now();

    return this.write(key, occurredAt, { createWith: medium }, (state) =>
      applyActivation(
        state,
        medium,
        {
          totalPagesOverride,
          audioLengthSeconds,
          playbackSpeed:
            playbackSpeed === undefined || playbackSpeed === null
              ? playbackSpeed
              : new Decimal(playbackSpeed),
        },
        this.generateId(),
        occurredAt,
      ),
    );
  }

  /**
   * Stop tracking a format. Its past ledger entries stay.
   */
  async deactivateMedium(input: DeactivateMediumInput): Promise<ProgressUpdateResult> {
    const parsed = deactivateMediumSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const { medium } = parsed.data;
    const occurredAt = this.clock.now();

    return this.write(toKey(parsed.data), occurredAt, { createWith: null }, (state) =>
      applyDeactivation(state, medium, occurredAt),
    );
  }

  /**
   * Set (or clear with null) the reader's own page count for the book.
   * Positions are re-clamped and the percent catches up with the furthest
   * format; nothing is written to the ledger.
   */
  async setCustomTotalPages(input: CustomTotalPagesInput): Promise<ProgressUpdateResult> {
    const parsed = customTotalPagesSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const { customTotalPages } = parsed.data;
    const occurredAt = this.clock.now();

    return this.write(toKey(parsed.data), occurredAt, { createWith: null }, (state) => {
      const record: ProgressRecord = { ...state.record, customTotalPages, updatedAt: occurredAt };
      return this.resettle({ ...state, record });
    });
  }

  async setPlaybackSpeed(input: SetPlaybackSpeedInput): Promise<ProgressUpdateResult> {
    const parsed = setPlaybackSpeedSchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const speed = new Decimal(parsed.data.playbackSpeed);
    const occurredAt = this.clock.now();

    return this.write(toKey(parsed.data), occurredAt, { createWith: null }, (state) => ({
      ...this.unchangedPlan(state),
      record: { ...state.record, audioPlaybackSpeed: speed, updatedAt: occurredAt },
      media: state.media.map((m) =>
        m.medium === "audio" ? { ...m, playbackSpeed: speed } : m,
      ),
    }));
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async getProgress(
    input: ProgressKeyInput,
  ): Promise<ProgressSnapshot | ProgressError | null> {
    const parsed = progressKeySchema.safeParse(input);
    if (!parsed.success) return invalidInput(parsed.error);

    const key = toKey(parsed.data);
    const bookTotalPages = await this.catalog.getEffectiveTotalPages(key.bookId);

    const record = findProgress(this.db, key);
    if (!record) return null;

    return this.snapshot({
      record,
      media: listMedia(this.db, record.id),
      bookTotalPages,
    });
  }

  async getDailyTotals(
    readerId: string,
    range: DateRangeInput,
  ): Promise<{ days: DayTotal[] } | ProgressError> {
    const reader = this.checkReader(readerId);
    if (reader) return reader;

    const parsed = dateRangeSchema.safeParse(range);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const facts = listLedgerEntries(this.db, readerId, parsed.data);
    return { days: dailyTotals(facts, parsed.data) };
  }

  /**
   * Summary of a day, week, month or year. The anchor defaults to today in
   * the reader's time zone.
   */
  async getPeriodSummary(
    readerId: string,
    query: PeriodQueryInput,
  ): Promise<PeriodSummary | ProgressError> {
    const reader = this.checkReader(readerId);
    if (reader) return reader;

    const parsed = periodQuerySchema.safeParse(query);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const anchor = parsed.data.anchor ?? this.today();
    const facts = listLedgerEntries(this.db, readerId);
    const completions = listCompletions(this.db, readerId, this.config.timeZone);

    return periodSummary(facts, completions, parsed.data.period, anchor);
  }

  async getCalendar(
    readerId: string,
    query: CalendarQueryInput,
  ): Promise<ReadingCalendar | ProgressError> {
    const reader = this.checkReader(readerId);
    if (reader) return reader;

    const parsed = calendarQuerySchema.safeParse(query);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const { year, month } = parsed.data;
    const range = yearRange(year);
    const facts = listLedgerEntries(this.db, readerId, range);
    const completions = listCompletions(this.db, readerId, this.config.timeZone, range);

    return buildCalendar(facts, completions, year, month);
  }

  async getStreaks(
    readerId: string,
    range: DateRangeInput,
  ): Promise<StreakSummary | ProgressError> {
    const reader = this.checkReader(readerId);
    if (reader) return reader;

    const parsed = dateRangeSchema.safeParse(range);
    if (!parsed.success) return invalidInput(parsed.error, "invalid-setting");

    const facts = listLedgerEntries(this.db, readerId, parsed.data);
    return computeStreaks(facts, parsed.data);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private checkReader(readerId: string): ProgressError | null {
    const parsed = readerIdSchema.safeParse(readerId);
    return parsed.success ? null : invalidInput(parsed.error, "invalid-key");
  }

  private today(): string {
    return toLogDate(this.clock.now(), this.config.timeZone);
  }

  private newRecord(key: ProgressKey, medium: Medium, now: Date): ProgressState["record"] {
    return {
      id: this.generateId(),
      ...key,
      percent: new Decimal(0),
      activeFormats: [medium],
      customTotalPages: null,
      audioPlaybackSpeed: new Decimal(this.config.defaultPlaybackSpeed),
      currentPage: null,
      finishedAt: null,
      createdAt: now,
      updatedAt: now,
    };
  }

  private newMedium(medium: Medium): MediumState {
    return {
      id: this.generateId(),
      medium,
      currentPage: isPageMedium(medium) ? 0 : null,
      totalPagesOverride: null,
      audioPositionSeconds: isPageMedium(medium) ? null : 0,
      audioLengthSeconds: null,
      playbackSpeed: null,
    };
  }

  /**
   * Re-clamp every medium after a total changed, raise the percent to the
   * furthest active medium and move the others forward to it. Writes no
   * ledger entries.
   */
  private resettle(state: ProgressState): SyncResult {
    const clamped = state.media.map((m) => {
      const total = mediumTotal(state, m);
      return total === null ? m : withRawValue(m, clampRawValue(rawValueOf(m), total));
    });

    const totalPages = effectiveTotalPages(state);
    if (totalPages === null) {
      return { ...this.unchangedPlan(state), media: clamped };
    }

    let percent = state.record.percent;
    for (const m of clamped) {
      if (!state.record.activeFormats.includes(m.medium)) continue;
      const exact = exactPagesEquivalent(m.medium, rawValueOf(m), totalPages, mediumTotal(state, m));
      if (exact !== null) percent = Decimal.max(percent, percentOf(exact, totalPages));
    }

    const media = clamped.map((m) => {
      const total = mediumTotal(state, m);
      if (total === null || !state.record.activeFormats.includes(m.medium)) return m;
      return withRawValue(m, Math.max(rawValueOf(m), rawValueAtPercent(total, percent)));
    });

    return {
      ...this.unchangedPlan(state),
      record: {
        ...state.record,
        percent,
        currentPage: rawValueAtPercent(totalPages, percent),
      },
      media,
    };
  }

  private unchangedPlan(state: ProgressState): SyncResult {
    return {
      record: state.record,
      media: state.media,
      ledger: [],
      previousPercent: state.record.percent,
      deltaEquivalent: new Decimal(0),
      projected: [],
    };
  }

  /**
   * Load, plan and persist one change atomically, then emit its events.
   *
   * @param createWith - Medium to create the record with when it does not
   *   exist yet; null when the operation needs an existing record
   * @param session - Timed session stored alongside the change
   */
  private async write(
    key: ProgressKey,
    occurredAt: Date,
    { createWith, session }: { createWith: Medium | null; session?: SessionDraft },
    plan: (state: ProgressState) => SyncOutcome,
  ): Promise<ProgressUpdateResult> {
    const bookTotalPages = await this.catalog.getEffectiveTotalPages(key.bookId);

    const committed = this.db.transaction(
      (tx): CommittedChange | ProgressError => {
        const existing = findProgress(tx, key);
        if (!existing && createWith === null) {
          return progressError("not-found", "This book is not being tracked yet");
        }

        const record = existing ?? this.newRecord(key, createWith ?? "paper", occurredAt);
        const state: ProgressState = {
          record,
          media: existing ? listMedia(tx, existing.id) : [this.newMedium(record.activeFormats[0])],
          bookTotalPages,
        };

        const result = plan(state);
        if (isProgressError(result)) return result;

        if (result.notice !== "already-complete") {
          if (existing) {
            saveProgress(tx, result.record);
          } else {
            insertProgress(tx, result.record);
          }
          saveMedia(tx, result.record.id, result.media);
          appendLedgerEntries(tx, result.record.id, result.ledger, occurredAt);
          if (session) {
            appendSession(tx, this.toSession(session, result, bookTotalPages));
          }
        }

        const snapshot = this.buildSnapshot(
          { record: result.record, media: result.media, bookTotalPages },
          listProgressLedger(tx, result.record.id),
          listProgressSessions(tx, result.record.id),
        );

        return {
          update: {
            snapshot,
            deltaEquivalent: result.deltaEquivalent.toFixed(2),
            notice: result.notice,
          },
          result,
          completed: !existing?.finishedAt && result.record.finishedAt !== null,
        };
      },
      { behavior: "immediate" },
    );

    if (isProgressError(committed)) return committed;

    if (committed.update.notice === "unknown-book-length") {
      console.warn(
        `[progress] No page count for book ${key.bookId}; position stored without page-equivalents`,
      );
    }

    await this.publish(committed, occurredAt);
    return committed.update;
  }

  private async publish(committed: CommittedChange, occurredAt: Date): Promise<void> {
    const { record, ledger, previousPercent } = committed.result;

    for (const delta of ledger) {
      const event: ProgressAdvancedEvent = {
        progressId: record.id,
        readerId: record.readerId,
        bookId: record.bookId,
        contextId: record.contextId,
        medium: delta.medium,
        pagesEquivalent: delta.pagesEquivalent.toFixed(2),
        previousPercent: previousPercent.toFixed(2),
        percent: record.percent.toFixed(2),
        logDate: delta.logDate,
        occurredAt,
      };
      if (this.config.logEvents) {
        console.log("[progress] progressAdvanced", event);
      }
      await this.events.emit("progressAdvanced", event);
    }

    if (committed.completed) {
      const event: BookCompletedEvent = {
        progressId: record.id,
        readerId: record.readerId,
        bookId: record.bookId,
        contextId: record.contextId,
        occurredAt,
      };
      if (this.config.logEvents) {
        console.log("[progress] bookCompleted", event);
      }
      await this.events.emit("bookCompleted", event);
    }
  }

  /**
   * Pages a session covered, converted with the totals in effect after the
   * change. Positions past the end count up to the end.
   */
  private toSession(
    draft: SessionDraft,
    result: SyncResult,
    bookTotalPages: number | null,
  ): ReadingSession {
    const state: ProgressState = { record: result.record, media: result.media, bookTotalPages };
    const medium = findMedium(state, draft.medium);
    const total = medium ? mediumTotal(state, medium) : null;
    const pages =
      clampRawValue(draft.endPage, total) - clampRawValue(draft.startPage, total);

    return {
      ...draft,
      id: this.generateId(),
      progressId: result.record.id,
      pagesEquivalent: toPagesEquivalent(draft.medium, pages, effectiveTotalPages(state), total),
    };
  }

  private snapshot(state: ProgressState): ProgressSnapshot {
    return this.buildSnapshot(
      state,
      listProgressLedger(this.db, state.record.id),
      listProgressSessions(this.db, state.record.id),
    );
  }

  private buildSnapshot(
    state: ProgressState,
    ledger: ReturnType<typeof listProgressLedger>,
    sessions: ReadingSession[],
  ): ProgressSnapshot {
    const { record } = state;
    const totalPages = effectiveTotalPages(state);

    const media = record.activeFormats.flatMap((medium): MediumSnapshot[] => {
      const m = findMedium(state, medium);
      if (!m) return [];

      const total = mediumTotal(state, m);
      const ownPercent =
        total === null || total <= 0 ? null : percentOf(rawValueOf(m), total).toFixed(2);

      return [
        {
          medium,
          currentPage: m.currentPage,
          totalPages: isPageMedium(medium) ? total : null,
          audioPositionSeconds: m.audioPositionSeconds,
          audioLengthSeconds: m.audioLengthSeconds,
          playbackSpeed: medium === "audio" ? playbackSpeedOf(state, m).toString() : null,
          percent: ownPercent,
          listeningSecondsRemaining:
            medium === "audio" && total !== null
              ? adjustedAudioLength(total - rawValueOf(m), playbackSpeedOf(state, m))
              : null,
        },
      ];
    });

    return {
      progressId: record.id,
      readerId: record.readerId,
      bookId: record.bookId,
      contextId: record.contextId,
      status: statusOf(record),
      percent: record.percent.toFixed(2),
      currentPage: record.currentPage,
      totalPages,
      customTotalPages: record.customTotalPages,
      audioPlaybackSpeed: record.audioPlaybackSpeed.toString(),
      activeFormats: record.activeFormats,
      media,
      estimate: estimateCompletion(totalPages, record.currentPage, ledger, sessions),
      finishedAt: record.finishedAt,
      updatedAt: record.updatedAt,
    };
  }
}
