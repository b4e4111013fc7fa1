/**
 * Reading Aggregator
 *
 * Read-side rollups of the reading ledger: daily totals, period summaries,
 * month calendars, streaks and per-book estimates.
 *
 * Every function here is pure: the same ledger rows always produce the same
 * output, so results can be cached by callers and recomputed at any time.
 * Decimal amounts are returned as strings with 2 decimal places.
 */

import { MEDIUMS, type Medium } from "@server/db/schema";
import {
  addLogDays,
  eachLogDate,
  isWithinRange,
  monthRange,
  parseLogDate,
  yearRange,
  LOG_DATE_FORMAT,
  type DateRange,
} from "@server/lib/date-utils";
import { roundToCents } from "@server/lib/equivalence";
import { Decimal } from "decimal.js";
import { endOfISOWeek, format, startOfISOWeek } from "date-fns";

export type Period = "day" | "week" | "month" | "year";

/**
 * The ledger fields the aggregator reads.
 */
export interface LedgerFact {
  bookId: string;
  logDate: string;
  medium: Medium;
  pagesEquivalent: Decimal;
  audioSeconds: number;
}

export interface CompletionFact {
  bookId: string;
  finishedOn: string;
}

export interface MediumTotals {
  pages: string;
  audioSeconds: number;
}

export interface DayTotal {
  date: string;
  pages: string;
  audioSeconds: number;
  byMedium: Record<Medium, MediumTotals>;
  /** Distinct books read that day, sorted */
  bookIds: string[];
}

export interface MediumShare {
  medium: Medium;
  /** Share of the period's pages, in percent */
  percent: string;
}

export interface PeriodSummary {
  period: Period;
  range: DateRange;
  totalPages: string;
  audioSeconds: number;
  readingDays: number;
  /** totalPages / readingDays; null without reading days */
  averagePagesPerDay: string | null;
  bestDay: { date: string; pages: string } | null;
  mediumShares: MediumShare[];
  booksCompleted: number;
  bookIds: string[];
}

export interface CalendarBook {
  bookId: string;
  isCompletion: boolean;
}

export interface CalendarDay {
  date: string;
  inMonth: boolean;
  pages: string;
  audioMinutes: number;
  books: CalendarBook[];
  isCompletionDay: boolean;
}

export interface ReadingCalendar {
  year: number;
  month: number;
  /** Days of the month, in order */
  days: CalendarDay[];
  /** Monday-first weeks covering the month, padded with neighbouring days */
  weeks: CalendarDay[][];
  hasActivity: boolean;
  previousMonth: { year: number; month: number };
  nextMonth: { year: number; month: number };
}

export interface DayRun {
  length: number;
  start: string;
  end: string;
}

export interface StreakSummary {
  range: DateRange;
  longestStreak: DayRun | null;
  longestGap: DayRun | null;
  /** Reading days in a row ending on the last day of the range */
  currentStreak: number;
}

/**
 * The session fields reading-speed estimates read.
 */
export interface SessionFact {
  durationSeconds: number;
  pagesEquivalent: Decimal | null;
}

export interface CompletionEstimate {
  pagesLeft: number | null;
  averagePagesPerDay: string | null;
  estimatedDaysRemaining: number | null;
  /** Average time per reference page over timed sessions */
  secondsPerPage: string | null;
  /** Reading time left at that speed, in whole seconds */
  etaSeconds: number | null;
}

// ============================================================================
// Grouping
// ============================================================================

interface DayAccumulator {
  pages: Decimal;
  audioSeconds: number;
  byMedium: Record<Medium, { pages: Decimal; audioSeconds: number }>;
  bookIds: Set<string>;
}

function emptyDay(): DayAccumulator {
  return {
    pages: new Decimal(0),
    audioSeconds: 0,
    byMedium: {
      paper: { pages: new Decimal(0), audioSeconds: 0 },
      ebook: { pages: new Decimal(0), audioSeconds: 0 },
      audio: { pages: new Decimal(0), audioSeconds: 0 },
    },
    bookIds: new Set(),
  };
}

function groupByDay(
  facts: LedgerFact[],
  range: DateRange,
): Map<string, DayAccumulator> {
  const days = new Map<string, DayAccumulator>();

  for (const fact of facts) {
    if (!isWithinRange(fact.logDate, range)) continue;

    const day = days.get(fact.logDate) ?? emptyDay();
    day.pages = day.pages.plus(fact.pagesEquivalent);
    day.audioSeconds += fact.audioSeconds;
    day.byMedium[fact.medium].pages = day.byMedium[fact.medium].pages.plus(
      fact.pagesEquivalent,
    );
    day.byMedium[fact.medium].audioSeconds += fact.audioSeconds;
    day.bookIds.add(fact.bookId);
    days.set(fact.logDate, day);
  }

  return days;
}

function toDayTotal(date: string, day: DayAccumulator): DayTotal {
  return {
    date,
    pages: day.pages.toFixed(2),
    audioSeconds: day.audioSeconds,
    byMedium: {
      paper: { pages: day.byMedium.paper.pages.toFixed(2), audioSeconds: day.byMedium.paper.audioSeconds },
      ebook: { pages: day.byMedium.ebook.pages.toFixed(2), audioSeconds: day.byMedium.ebook.audioSeconds },
      audio: { pages: day.byMedium.audio.pages.toFixed(2), audioSeconds: day.byMedium.audio.audioSeconds },
    },
    bookIds: [...day.bookIds].sort(),
  };
}

// ============================================================================
// Daily totals & period summaries
// ============================================================================

/**
 * Totals for every day of `range` that has ledger activity, oldest first.
 */
export function dailyTotals(facts: LedgerFact[], range: DateRange): DayTotal[] {
  return [...groupByDay(facts, range).entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, day]) => toDayTotal(date, day));
}

/**
 * Date range a period covers around `anchor`:
 * - day: the anchor itself
 * - week: the 7 days ending on the anchor
 * - month / year: the calendar month / year containing the anchor
 */
export function periodRange(period: Period, anchor: string): DateRange {
  const anchorDate = parseLogDate(anchor);

  switch (period) {
    case "day":
      return { start: anchor, end: anchor };
    case "week":
      return { start: addLogDays(anchor, -6), end: anchor };
    case "month":
      return monthRange(anchorDate.getFullYear(), anchorDate.getMonth() + 1);
    case "year":
      return yearRange(anchorDate.getFullYear());
  }
}

export function periodSummary(
  facts: LedgerFact[],
  completions: CompletionFact[],
  period: Period,
  anchor: string,
): PeriodSummary {
  const range = periodRange(period, anchor);
  const days = dailyTotals(facts, range);

  let totalPages = new Decimal(0);
  let audioSeconds = 0;
  let bestDay: { date: string; pages: Decimal } | null = null;
  const mediumPages: Record<Medium, Decimal> = {
    paper: new Decimal(0),
    ebook: new Decimal(0),
    audio: new Decimal(0),
  };
  const bookIds = new Set<string>();

  for (const day of days) {
    const pages = new Decimal(day.pages);
    totalPages = totalPages.plus(pages);
    audioSeconds += day.audioSeconds;
    for (const medium of MEDIUMS) {
      mediumPages[medium] = mediumPages[medium].plus(day.byMedium[medium].pages);
    }
    day.bookIds.forEach((id) => bookIds.add(id));
    if (!bestDay || pages.gt(bestDay.pages)) {
      bestDay = { date: day.date, pages };
    }
  }

  const mediumShares: MediumShare[] = totalPages.gt(0)
    ? MEDIUMS.filter((medium) => mediumPages[medium].gt(0)).map((medium) => ({
        medium,
        percent: roundToCents(mediumPages[medium].mul(100).div(totalPages)).toFixed(2),
      }))
    : [];

  return {
    period,
    range,
    totalPages: totalPages.toFixed(2),
    audioSeconds,
    readingDays: days.length,
    averagePagesPerDay:
      days.length > 0 ? roundToCents(totalPages.div(days.length)).toFixed(2) : null,
    bestDay: bestDay ? { date: bestDay.date, pages: bestDay.pages.toFixed(2) } : null,
    mediumShares,
    booksCompleted: completions.filter((c) => isWithinRange(c.finishedOn, range)).length,
    bookIds: [...bookIds].sort(),
  };
}

// ============================================================================
// Calendar
// ============================================================================

function shiftMonth(year: number, month: number, amount: number) {
  const index = year * 12 + (month - 1) + amount;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

/**
 * Month calendar of reading activity and completed books.
 *
 * @param month - 1-12
 */
export function buildCalendar(
  facts: LedgerFact[],
  completions: CompletionFact[],
  year: number,
  month: number,
): ReadingCalendar {
  const range = monthRange(year, month);
  const grouped = groupByDay(facts, range);

  const completedByDay = new Map<string, Set<string>>();
  for (const completion of completions) {
    if (!isWithinRange(completion.finishedOn, range)) continue;
    const ids = completedByDay.get(completion.finishedOn) ?? new Set<string>();
    ids.add(completion.bookId);
    completedByDay.set(completion.finishedOn, ids);
  }

  const dayFor = (date: string): CalendarDay => {
    const inMonth = isWithinRange(date, range);
    const day = inMonth ? grouped.get(date) : undefined;
    const completed = (inMonth && completedByDay.get(date)) || new Set<string>();
    const bookIds = new Set([...(day?.bookIds ?? []), ...completed]);

    return {
      date,
      inMonth,
      pages: (day?.pages ?? new Decimal(0)).toFixed(2),
      audioMinutes: Math.ceil((day?.audioSeconds ?? 0) / 60),
      books: [...bookIds].sort().map((bookId) => ({
        bookId,
        isCompletion: completed.has(bookId),
      })),
      isCompletionDay: completed.size > 0,
    };
  };

  const days = eachLogDate(range).map(dayFor);

  const gridStart = format(startOfISOWeek(parseLogDate(range.start)), LOG_DATE_FORMAT);
  const gridEnd = format(endOfISOWeek(parseLogDate(range.end)), LOG_DATE_FORMAT);
  const grid = eachLogDate({ start: gridStart, end: gridEnd }).map(dayFor);
  const weeks: CalendarDay[][] = [];
  for (let i = 0; i < grid.length; i += 7) {
    weeks.push(grid.slice(i, i + 7));
  }

  return {
    year,
    month,
    days,
    weeks,
    hasActivity: days.some((d) => d.books.length > 0),
    previousMonth: shiftMonth(year, month, -1),
    nextMonth: shiftMonth(year, month, 1),
  };
}

// ============================================================================
// Streaks
// ============================================================================

/**
 * Longest run of reading days, longest run without reading, and the streak
 * that is still running at the end of `range`.
 * Ties keep the earliest run.
 */
export function computeStreaks(facts: LedgerFact[], range: DateRange): StreakSummary {
  const readingDays = new Set(
    facts.filter((f) => isWithinRange(f.logDate, range)).map((f) => f.logDate),
  );

  let longestStreak: DayRun | null = null;
  let longestGap: DayRun | null = null;
  let run: { reading: boolean; start: string; length: number } | null = null;

  const closeRun = (end: string) => {
    if (!run) return;
    const finished: DayRun = { length: run.length, start: run.start, end };
    if (run.reading) {
      if (!longestStreak || finished.length > longestStreak.length) longestStreak = finished;
    } else if (!longestGap || finished.length > longestGap.length) {
      longestGap = finished;
    }
  };

  let previous: string | null = null;
  for (const date of eachLogDate(range)) {
    const reading = readingDays.has(date);
    if (run && run.reading === reading) {
      run.length += 1;
    } else {
      if (previous) closeRun(previous);
      run = { reading, start: date, length: 1 };
    }
    previous = date;
  }
  if (previous) closeRun(previous);

  let currentStreak = 0;
  if (run && run.reading) {
    currentStreak = run.length;
  }

  return { range, longestStreak, longestGap, currentStreak };
}

// ============================================================================
// Per-book estimates
// ============================================================================

/**
 * Seconds per reference page across sessions that took time and covered a
 * known number of pages. Null when those sessions cover no pages.
 */
export function secondsPerPage(sessions: SessionFact[]): Decimal | null {
  let seconds = 0;
  let pages = new Decimal(0);

  for (const session of sessions) {
    if (session.durationSeconds <= 0 || session.pagesEquivalent === null) continue;
    seconds += session.durationSeconds;
    pages = pages.plus(session.pagesEquivalent);
  }

  if (seconds === 0 || pages.lte(0)) return null;
  return new Decimal(seconds).div(pages);
}

/**
 * Pages left, average pages per reading day, days left at that pace, and
 * reading time left at the speed measured by timed sessions, for a single
 * read-through.
 */
export function estimateCompletion(
  totalPages: number | null,
  currentPage: number | null,
  facts: LedgerFact[],
  sessions: SessionFact[] = [],
): CompletionEstimate {
  const pagesLeft =
    totalPages === null || currentPage === null ? null : Math.max(0, totalPages - currentPage);

  const perDay = new Map<string, Decimal>();
  for (const fact of facts) {
    perDay.set(fact.logDate, (perDay.get(fact.logDate) ?? new Decimal(0)).plus(fact.pagesEquivalent));
  }
  const days = [...perDay.values()].filter((pages) => pages.gt(0));
  const total = days.reduce((sum, pages) => sum.plus(pages), new Decimal(0));
  const average = days.length > 0 ? roundToCents(total.div(days.length)) : null;

  let estimatedDaysRemaining: number | null = null;
  if (pagesLeft !== null && average !== null && average.gt(0)) {
    estimatedDaysRemaining =
      pagesLeft === 0 ? 0 : Math.max(1, new Decimal(pagesLeft).div(average).ceil().toNumber());
  }

  const speed = secondsPerPage(sessions);

  return {
    pagesLeft,
    averagePagesPerDay: average ? average.toFixed(2) : null,
    estimatedDaysRemaining,
    secondsPerPage: speed ? roundToCents(speed).toFixed(2) : null,
    etaSeconds:
      pagesLeft === null || speed === null ? null : speed.mul(pagesLeft).floor().toNumber(),
  };
}
