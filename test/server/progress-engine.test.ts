import * as schema from "@server/db/schema";
import { isProgressError, type ProgressError } from "@server/lib/progress-errors";
import type {
  ProgressEngine,
  ProgressSnapshot,
  ProgressUpdate,
  ProgressUpdateResult,
} from "@server/lib/progress-engine";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BOOK, createTestEngine, READER, type TestEngine } from "./helpers";

function expectUpdate(result: ProgressUpdateResult): ProgressUpdate {
  if (isProgressError(result)) {
    throw new Error(`Expected an update, got ${result.error}: ${result.message}`);
  }
  return result;
}

function errorCode<T extends object>(result: T | ProgressError): string | null {
  return isProgressError(result) ? result.error : null;
}

const key = { readerId: READER, bookId: BOOK };

async function snapshotOf(
  engine: ProgressEngine,
  input: { readerId: string; bookId: string; contextId?: string } = key,
): Promise<ProgressSnapshot> {
  const result = await engine.getProgress(input);
  if (result === null || isProgressError(result)) {
    throw new Error(`Expected a tracked read-through for ${input.bookId}`);
  }
  return result;
}

describe("ProgressEngine", () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
    t.catalog.set(BOOK, 200);
  });

  afterEach(() => {
    t.database.close();
    vi.restoreAllMocks();
  });

  describe("reportProgress", () => {
    it("creates the read-through on the first report", async () => {
      const update = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 }),
      );

      expect(update.deltaEquivalent).toBe("50.00");
      expect(update.snapshot).toMatchObject({
        progressId: "id-1",
        status: "in-progress",
        percent: "25.00",
        currentPage: 50,
        totalPages: 200,
        activeFormats: ["paper"],
      });
    });

    it("follows a reader from first page to finish over three days", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 });

      t.clock.set("2024-03-02T12:00:00Z");
      const second = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 100 }),
      );
      expect(second.deltaEquivalent).toBe("50.00");
      expect(second.snapshot.percent).toBe("50.00");

      t.clock.set("2024-03-03T12:00:00Z");
      const finished = expectUpdate(await t.engine.markFinished(key));
      expect(finished.deltaEquivalent).toBe("100.00");
      expect(finished.snapshot.percent).toBe("100.00");
      expect(finished.snapshot.status).toBe("complete");

      const totals = await t.engine.getDailyTotals(READER, {
        start: "2024-03-01",
        end: "2024-03-03",
      });
      if (isProgressError(totals)) throw new Error(totals.message);
      expect(totals.days.map((day) => [day.date, day.pages])).toEqual([
        ["2024-03-01", "50.00"],
        ["2024-03-02", "50.00"],
        ["2024-03-03", "100.00"],
      ]);
    });

    it("estimates the days left at the reader's pace", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 });
      t.clock.set("2024-03-02T12:00:00Z");
      const update = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 100 }),
      );

      expect(update.snapshot.estimate).toEqual({
        pagesLeft: 100,
        averagePagesPerDay: "50.00",
        estimatedDaysRemaining: 2,
        secondsPerPage: null,
        etaSeconds: null,
      });
    });

    it("keeps the percent when a page is corrected downwards", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 100 });
      const update = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 90 }),
      );

      expect(update.deltaEquivalent).toBe("0.00");
      expect(update.snapshot.percent).toBe("50.00");
      expect(update.snapshot.media[0].currentPage).toBe(90);
    });

    it("rejects invalid positions without creating anything", async () => {
      expect(
        errorCode(await t.engine.reportProgress({ ...key, medium: "paper", rawValue: -3 })),
      ).toBe("invalid-raw-value");
      expect(
        errorCode(await t.engine.reportProgress({ ...key, medium: "audio", rawValue: "abc" })),
      ).toBe("invalid-raw-value");
      expect(await t.engine.getProgress(key)).toBeNull();
    });

    it("rejects formats the reader is not using", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 10 });

      expect(
        errorCode(await t.engine.reportProgress({ ...key, medium: "audio", rawValue: 60 })),
      ).toBe("no-active-medium");
    });

    it("stores positions for books without a known length", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      const update = expectUpdate(
        await t.engine.reportProgress({
          readerId: READER,
          bookId: "book-unknown",
          medium: "paper",
          rawValue: 40,
        }),
      );

      expect(update.notice).toBe("unknown-book-length");
      expect(update.snapshot.percent).toBe("0.00");
      expect(update.snapshot.totalPages).toBeNull();
      expect(update.snapshot.media[0].currentPage).toBe(40);
      expect(warn).toHaveBeenCalledWith(
        "[progress] No page count for book book-unknown; position stored without page-equivalents",
      );

      const totals = await t.engine.getDailyTotals(READER, {
        start: "2024-03-01",
        end: "2024-03-01",
      });
      expect(totals).toEqual({ days: [] });
    });

    it("keeps separate read-throughs per context", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 });
      await t.engine.reportProgress({ ...key, contextId: "club-1", medium: "paper", rawValue: 10 });

      const personal = await snapshotOf(t.engine);
      const club = await snapshotOf(t.engine, { ...key, contextId: "club-1" });

      expect(personal.percent).toBe("25.00");
      expect(club.percent).toBe("5.00");
      expect(club.progressId).not.toBe(personal.progressId);
    });

    it("dates ledger entries in the reader's time zone", async () => {
      t.database.close();
      t = createTestEngine({ timeZone: "America/New_York" });
      t.catalog.set(BOOK, 200);
      t.clock.set("2024-03-01T02:00:00Z");

      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 10 });

      const totals = await t.engine.getDailyTotals(READER, {
        start: "2024-02-29",
        end: "2024-03-01",
      });
      if (isProgressError(totals)) throw new Error(totals.message);
      expect(totals.days.map((day) => day.date)).toEqual(["2024-02-29"]);
    });

    it("serializes concurrent reports on the same book", async () => {
      const [first, second] = await Promise.all([
        t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 }),
        t.engine.reportProgress({ ...key, medium: "paper", rawValue: 80 }),
      ]);

      expect(expectUpdate(first).deltaEquivalent).toBe("50.00");
      expect(expectUpdate(second).deltaEquivalent).toBe("30.00");
      expect((await snapshotOf(t.engine)).percent).toBe("40.00");
    });

    it("appends nothing when the same report arrives twice", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 });
      const replay = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 }),
      );

      expect(replay.deltaEquivalent).toBe("0.00");
      expect(replay.snapshot.percent).toBe("25.00");
      expect(t.database.db.select().from(schema.readingLedger).all()).toHaveLength(1);
    });

    it("rounds the percent of a differently paginated copy once", async () => {
      await t.engine.activateMedium({ ...key, medium: "ebook", totalPagesOverride: 3 });
      const update = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "ebook", rawValue: 1 }),
      );

      expect(update.deltaEquivalent).toBe("66.67");
      expect(update.snapshot.percent).toBe("33.33");
      expect(update.snapshot.media[0].percent).toBe("33.33");
    });

    it("never lowers the percent across formats", async () => {
      const percents: string[] = [];
      const report = async (medium: "paper" | "ebook" | "audio", rawValue: number) => {
        percents.push(
          expectUpdate(await t.engine.reportProgress({ ...key, medium, rawValue })).snapshot.percent,
        );
      };

      await report("paper", 40);
      await t.engine.activateMedium({ ...key, medium: "audio", audioLengthSeconds: 12000 });
      await t.engine.activateMedium({ ...key, medium: "ebook", totalPagesOverride: 400 });
      await report("audio", 1200);
      await report("ebook", 200);
      await report("paper", 60);
      await report("audio", 9000);

      expect(percents).toEqual(["20.00", "20.00", "50.00", "50.00", "75.00"]);
    });

    it("rejects an empty reader id", async () => {
      expect(
        errorCode(
          await t.engine.reportProgress({ readerId: "", bookId: BOOK, medium: "paper", rawValue: 1 }),
        ),
      ).toBe("invalid-key");
    });
  });

  describe("audio", () => {
    it("applies playback speed to listened time", async () => {
      t.catalog.set(BOOK, 300);
      expectUpdate(
        await t.engine.activateMedium({
          ...key,
          medium: "audio",
          audioLengthSeconds: "10:00:00",
          playbackSpeed: 1.5,
        }),
      );

      const update = expectUpdate(await t.engine.logListening({ ...key, amount: "02:00:00" }));

      expect(update.deltaEquivalent).toBe("90.00");
      expect(update.snapshot.percent).toBe("30.00");
      expect(update.snapshot.media).toEqual([
        {
          medium: "audio",
          currentPage: null,
          totalPages: null,
          audioPositionSeconds: 10800,
          audioLengthSeconds: 36000,
          playbackSpeed: "1.5",
          percent: "30.00",
          listeningSecondsRemaining: 16800,
        },
      ]);
    });

    it("logs listening at double speed as pages and seconds", async () => {
      await t.engine.activateMedium({
        ...key,
        medium: "audio",
        audioLengthSeconds: 12000,
        playbackSpeed: 2,
      });
      await t.engine.logListening({ ...key, amount: 900 });

      const totals = await t.engine.getDailyTotals(READER, {
        start: "2024-03-01",
        end: "2024-03-01",
      });
      if (isProgressError(totals)) throw new Error(totals.message);
      expect(totals.days[0].byMedium.audio).toEqual({ pages: "30.00", audioSeconds: 900 });

      const calendar = await t.engine.getCalendar(READER, { year: 2024, month: 3 });
      if (isProgressError(calendar)) throw new Error(calendar.message);
      expect(calendar.days[0].audioMinutes).toBe(15);
    });

    it("moves the recording along with the paper copy", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 1 });
      await t.engine.activateMedium({ ...key, medium: "audio", audioLengthSeconds: 12000 });
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 20 });

      const snapshot = await snapshotOf(t.engine);
      expect(snapshot.activeFormats).toEqual(["paper", "audio"]);
      expect(snapshot.media.map((m) => [m.medium, m.currentPage ?? m.audioPositionSeconds])).toEqual([
        ["paper", 20],
        ["audio", 1200],
      ]);
    });

    it("rejects listening without an audio format", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 1 });

      expect(errorCode(await t.engine.logListening({ ...key, amount: 60 }))).toBe(
        "no-active-medium",
      );
    });
  });

  describe("logPages", () => {
    it("adds pages to the current position", async () => {
      await t.engine.logPages({ ...key, amount: 30 });
      const update = expectUpdate(await t.engine.logPages({ ...key, amount: 30 }));

      expect(update.deltaEquivalent).toBe("30.00");
      expect(update.snapshot.media[0].currentPage).toBe(60);
      expect(update.snapshot.percent).toBe("30.00");
    });

    it("scales e-book pages with their own pagination", async () => {
      await t.engine.activateMedium({ ...key, medium: "ebook", totalPagesOverride: 250 });
      const update = expectUpdate(await t.engine.logPages({ ...key, medium: "ebook", amount: 100 }));

      expect(update.deltaEquivalent).toBe("80.00");
      expect(update.snapshot.percent).toBe("40.00");
    });
  });

  describe("logSession", () => {
    it("moves the copy to the end page and measures reading speed", async () => {
      const update = expectUpdate(
        await t.engine.logSession({
          ...key,
          startPage: 0,
          endPage: 30,
          startedAt: new Date("2024-03-01T11:00:00Z"),
        }),
      );

      expect(update.deltaEquivalent).toBe("30.00");
      expect(update.snapshot.percent).toBe("15.00");
      expect(update.snapshot.estimate).toEqual({
        pagesLeft: 170,
        averagePagesPerDay: "30.00",
        estimatedDaysRemaining: 6,
        secondsPerPage: "120.00",
        etaSeconds: 20400,
      });
    });

    it("averages over every timed session", async () => {
      await t.engine.logSession({
        ...key,
        startPage: 0,
        endPage: 30,
        startedAt: new Date("2024-03-01T11:00:00Z"),
      });
      t.clock.set("2024-03-02T12:00:00Z");
      const update = expectUpdate(
        await t.engine.logSession({
          ...key,
          startPage: 30,
          endPage: 60,
          startedAt: new Date("2024-03-02T10:00:00Z"),
          durationSeconds: "45:00",
        }),
      );

      expect(update.snapshot.estimate.secondsPerPage).toBe("105.00");
      expect(update.snapshot.estimate.etaSeconds).toBe(14700);
      expect(t.database.db.select().from(schema.readingSession).all()).toHaveLength(2);
    });

    it("counts e-book sessions in reference pages", async () => {
      await t.engine.activateMedium({ ...key, medium: "ebook", totalPagesOverride: 400 });
      await t.engine.logSession({
        ...key,
        medium: "ebook",
        startPage: 0,
        endPage: 40,
        startedAt: new Date("2024-03-01T11:40:00Z"),
      });

      const [session] = t.database.db.select().from(schema.readingSession).all();
      expect(session).toMatchObject({ medium: "ebook", pagesEquivalent: "20.00", durationSeconds: 1200 });
    });

    it("rejects sessions that run backwards", async () => {
      expect(
        errorCode(
          await t.engine.logSession({
            ...key,
            startPage: 30,
            endPage: 10,
            startedAt: new Date("2024-03-01T11:00:00Z"),
          }),
        ),
      ).toBe("invalid-raw-value");
      expect(
        errorCode(
          await t.engine.logSession({
            ...key,
            startPage: 0,
            endPage: 10,
            startedAt: new Date("2024-03-01T13:00:00Z"),
          }),
        ),
      ).toBe("invalid-raw-value");
      expect(await t.engine.getProgress(key)).toBeNull();
    });
  });

  describe("markFinished", () => {
    it("is idempotent", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 150 });
      expectUpdate(await t.engine.markFinished(key));

      const again = expectUpdate(await t.engine.markFinished(key));
      expect(again.notice).toBe("already-complete");
      expect(again.deltaEquivalent).toBe("0.00");

      const after = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 10 }),
      );
      expect(after.notice).toBe("already-complete");
      expect(after.snapshot.percent).toBe("100.00");
      expect(after.snapshot.media[0].currentPage).toBe(200);
    });

    it("finishes a book that was never started", async () => {
      const update = expectUpdate(await t.engine.markFinished(key));

      expect(update.deltaEquivalent).toBe("200.00");
      expect(update.snapshot.finishedAt).toEqual(new Date("2024-03-01T12:00:00Z"));
    });

    it("does not finish a book at 100% until asked", async () => {
      const update = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 200 }),
      );

      expect(update.snapshot.percent).toBe("100.00");
      expect(update.snapshot.status).toBe("in-progress");
    });
  });

  describe("format settings", () => {
    it("keeps at least one active format", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 10 });
      await t.engine.activateMedium({ ...key, medium: "audio", audioLengthSeconds: 600 });

      const update = expectUpdate(await t.engine.deactivateMedium({ ...key, medium: "paper" }));
      expect(update.snapshot.activeFormats).toEqual(["audio"]);

      expect(errorCode(await t.engine.deactivateMedium({ ...key, medium: "audio" }))).toBe(
        "invalid-setting",
      );
    });

    it("counts against the reader's own page total", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 100 });

      const updated = expectUpdate(
        await t.engine.setCustomTotalPages({ ...key, customTotalPages: 150 }),
      );
      expect(updated.snapshot.totalPages).toBe(150);
      expect(updated.snapshot.percent).toBe("66.67");
      expect(updated.snapshot.currentPage).toBe(100);
      expect(updated.deltaEquivalent).toBe("0.00");

      const next = expectUpdate(
        await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 120 }),
      );
      expect(next.deltaEquivalent).toBe("20.00");
      expect(next.snapshot.percent).toBe("80.00");
    });

    it("places the reader once a page total becomes known", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const unknown = { readerId: READER, bookId: "book-unknown" };
      await t.engine.reportProgress({ ...unknown, medium: "paper", rawValue: 150 });

      const update = expectUpdate(
        await t.engine.setCustomTotalPages({ ...unknown, customTotalPages: 200 }),
      );

      expect(update.deltaEquivalent).toBe("0.00");
      expect(update.snapshot).toMatchObject({ percent: "75.00", currentPage: 150, totalPages: 200 });
      expect(update.snapshot.estimate.pagesLeft).toBe(50);
    });

    it("sets a new e-book to the page matching the current percent", async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 100 });
      const update = expectUpdate(
        await t.engine.activateMedium({ ...key, medium: "ebook", totalPagesOverride: 400 }),
      );

      expect(update.snapshot.media.map((m) => [m.medium, m.currentPage])).toEqual([
        ["paper", 100],
        ["ebook", 200],
      ]);
      expect(update.deltaEquivalent).toBe("0.00");
    });

    it("validates settings", async () => {
      expect(
        errorCode(await t.engine.setCustomTotalPages({ ...key, customTotalPages: 5 })),
      ).toBe("not-found");

      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 1 });
      expect(
        errorCode(await t.engine.setCustomTotalPages({ ...key, customTotalPages: 0 })),
      ).toBe("invalid-setting");
      expect(errorCode(await t.engine.setPlaybackSpeed({ ...key, playbackSpeed: 4 }))).toBe(
        "invalid-setting",
      );
      expect(
        errorCode(
          await t.engine.activateMedium({ ...key, medium: "audio", audioLengthSeconds: 0 }),
        ),
      ).toBe("invalid-setting");
    });

    it("stores the playback speed", async () => {
      await t.engine.activateMedium({ ...key, medium: "audio", audioLengthSeconds: 3600 });
      const update = expectUpdate(await t.engine.setPlaybackSpeed({ ...key, playbackSpeed: 1.25 }));

      expect(update.snapshot.audioPlaybackSpeed).toBe("1.25");
      expect((await snapshotOf(t.engine)).media[0].playbackSpeed).toBe("1.25");
    });
  });

  describe("reports", () => {
    beforeEach(async () => {
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 50 });
      t.clock.set("2024-03-02T12:00:00Z");
      await t.engine.reportProgress({ ...key, medium: "paper", rawValue: 100 });
      t.clock.set("2024-03-03T12:00:00Z");
      await t.engine.markFinished(key);
    });

    it("summarizes the week up to today", async () => {
      const summary = await t.engine.getPeriodSummary(READER, { period: "week" });
      if (isProgressError(summary)) throw new Error(summary.message);

      expect(summary.range).toEqual({ start: "2024-02-26", end: "2024-03-03" });
      expect(summary.totalPages).toBe("200.00");
      expect(summary.readingDays).toBe(3);
      expect(summary.booksCompleted).toBe(1);
    });

    it("marks the completion day on the calendar", async () => {
      const calendar = await t.engine.getCalendar(READER, { year: 2024, month: 3 });
      if (isProgressError(calendar)) throw new Error(calendar.message);

      expect(calendar.days[2]).toMatchObject({
        date: "2024-03-03",
        pages: "100.00",
        isCompletionDay: true,
        books: [{ bookId: BOOK, isCompletion: true }],
      });
    });

    it("finds the reading streak", async () => {
      const streaks = await t.engine.getStreaks(READER, {
        start: "2024-03-01",
        end: "2024-03-05",
      });
      if (isProgressError(streaks)) throw new Error(streaks.message);

      expect(streaks.longestStreak).toEqual({ length: 3, start: "2024-03-01", end: "2024-03-03" });
      expect(streaks.currentStreak).toBe(0);
    });

    it("rejects malformed queries", async () => {
      expect(
        errorCode(await t.engine.getDailyTotals(READER, { start: "2024-03-05", end: "2024-03-01" })),
      ).toBe("invalid-setting");
      expect(errorCode(await t.engine.getCalendar(READER, { year: 2024, month: 13 }))).toBe(
        "invalid-setting",
      );
      expect(errorCode(await t.engine.getStreaks(READER, { start: "2024-3-1", end: "2024-03-05" }))).toBe(
        "invalid-setting",
      );
    });

    it("rejects an empty reader id on every read", async () => {
      const range = { start: "2024-03-01", end: "2024-03-03" };
      const progress = await t.engine.getProgress({ readerId: "", bookId: BOOK });

      expect(progress && errorCode(progress)).toBe("invalid-key");
      expect(errorCode(await t.engine.getDailyTotals("", range))).toBe("invalid-key");
      expect(errorCode(await t.engine.getPeriodSummary("", { period: "week" }))).toBe("invalid-key");
      expect(errorCode(await t.engine.getCalendar("", { year: 2024, month: 3 }))).toBe("invalid-key");
      expect(errorCode(await t.engine.getStreaks("", range))).toBe("invalid-key");
    });

    it("keeps other readers apart", async () => {
      const totals = await t.engine.getDailyTotals("reader-2", {
        start: "2024-03-01",
        end: "2024-03-03",
      });
      expect(totals).toEqual({ days: [] });
    });
  });
});
