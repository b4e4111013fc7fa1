/**
 * Synchronizer
 *
 * Plans the effect of one position change on a read-through without touching
 * storage. The engine loads a ProgressState, calls one of these functions and
 * persists the returned plan inside a single transaction.
 *
 * Rules:
 * - A medium may move backwards (readers correct mistyped pages), the overall
 *   percent never does
 * - Only forward movement of the reported medium is written to the ledger
 * - Other media are moved forward to the new percent, never backwards
 */

import type { Medium } from "@server/db/schema";
import { toLogDate } from "@server/lib/date-utils";
import {
  adjustedAudioLength,
  clampRawValue,
  exactPagesEquivalent,
  isPageMedium,
  percentOf,
  rawValueAtPercent,
  roundToCents,
  toPagesEquivalent,
} from "@server/lib/equivalence";
import {
  progressError,
  type ProgressError,
  type ProgressNotice,
} from "@server/lib/progress-errors";
import {
  effectiveTotalPages,
  findMedium,
  mediumTotal,
  playbackSpeedOf,
  rawValueOf,
  withRawValue,
  type MediumState,
  type ProgressRecord,
  type ProgressState,
} from "@server/lib/progress-record";
import { Decimal } from "decimal.js";

export interface LedgerDelta {
  medium: Medium;
  logDate: string;
  pagesEquivalent: Decimal;
  audioSeconds: number;
}

export interface SyncResult {
  record: ProgressRecord;
  /** Every medium of the record after the update */
  media: MediumState[];
  ledger: LedgerDelta[];
  previousPercent: Decimal;
  /** Page-equivalents added to the ledger by this update */
  deltaEquivalent: Decimal;
  /** Media moved forward by projection */
  projected: Medium[];
  notice?: ProgressNotice;
}

export type SyncOutcome = SyncResult | ProgressError;

export interface ActivationOptions {
  totalPagesOverride?: number | null;
  audioLengthSeconds?: number | null;
  playbackSpeed?: Decimal | null;
}

function unchanged(state: ProgressState, notice?: ProgressNotice): SyncResult {
  return {
    record: state.record,
    media: state.media,
    ledger: [],
    previousPercent: state.record.percent,
    deltaEquivalent: new Decimal(0),
    projected: [],
    notice,
  };
}

/**
 * Move every medium except `source` forward to `percent`.
 */
function projectPercent(
  state: ProgressState,
  media: MediumState[],
  source: Medium | null,
  percent: Decimal,
): { media: MediumState[]; projected: Medium[] } {
  const projected: Medium[] = [];

  const next = media.map((m) => {
    if (m.medium === source || !state.record.activeFormats.includes(m.medium)) {
      return m;
    }
    const total = mediumTotal(state, m);
    if (total === null) return m;

    const target = rawValueAtPercent(total, percent);
    if (target <= rawValueOf(m)) return m;

    projected.push(m.medium);
    return withRawValue(m, target);
  });

  return { media: next, projected };
}

/**
 * Wall-clock seconds spent listening to move `recordingSeconds` through the
 * recording at the medium's playback speed.
 */
function listenedSeconds(
  state: ProgressState,
  audio: MediumState,
  recordingSeconds: number,
): number {
  return adjustedAudioLength(Math.max(0, recordingSeconds), playbackSpeedOf(state, audio));
}

/**
 * Representative page in the reference edition for `percent`.
 */
function representativePage(
  totalPages: number | null,
  percent: Decimal,
  fallback: number | null,
): number | null {
  return totalPages === null ? fallback : rawValueAtPercent(totalPages, percent);
}

/**
 * Plan a position change reported for one medium.
 *
 * @param rawValue - New page (paper/ebook) or audio position in seconds
 * @param occurredAt - When the reader was at this position; dates the ledger entry
 * @param timeZone - Reader's time zone
 */
export function applyUpdate(
  state: ProgressState,
  medium: Medium,
  rawValue: number,
  occurredAt: Date,
  timeZone: string,
): SyncOutcome {
  if (!Number.isInteger(rawValue) || rawValue < 0) {
    return progressError(
      "invalid-raw-value",
      `${isPageMedium(medium) ? "Page" : "Audio position"} must be a non-negative whole number, got ${rawValue}`,
    );
  }

  const target = findMedium(state, medium);
  if (!target || !state.record.activeFormats.includes(medium)) {
    return progressError(
      "no-active-medium",
      `Format "${medium}" is not active for this book`,
    );
  }

  if (state.record.finishedAt) {
    return unchanged(state, "already-complete");
  }

  const total = mediumTotal(state, target);
  const previousRaw = rawValueOf(target);
  const nextRaw = clampRawValue(rawValue, total);
  const media = state.media.map((m) =>
    m.medium === medium ? withRawValue(m, nextRaw) : m,
  );

  const totalPages = effectiveTotalPages(state);
  const previousEquivalent = toPagesEquivalent(medium, previousRaw, totalPages, total);
  const exactNext = exactPagesEquivalent(medium, nextRaw, totalPages, total);

  if (totalPages === null || previousEquivalent === null || exactNext === null) {
    return {
      ...unchanged(state, "unknown-book-length"),
      record: { ...state.record, updatedAt: occurredAt },
      media,
    };
  }

  const previousPercent = state.record.percent;
  const nextPercent = percentOf(exactNext, totalPages);
  const deltaEquivalent = Decimal.max(0, roundToCents(exactNext).minus(previousEquivalent));

  const ledger: LedgerDelta[] = [];
  if (deltaEquivalent.gt(0)) {
    ledger.push({
      medium,
      logDate: toLogDate(occurredAt, timeZone),
      pagesEquivalent: deltaEquivalent,
      audioSeconds: medium === "audio" ? listenedSeconds(state, target, nextRaw - previousRaw) : 0,
    });
  }

  const projection = projectPercent(state, media, medium, nextPercent);
  const percent = Decimal.max(previousPercent, nextPercent);

  return {
    record: {
      ...state.record,
      percent,
      currentPage: representativePage(totalPages, percent, state.record.currentPage),
      updatedAt: occurredAt,
    },
    media: projection.media,
    ledger,
    previousPercent,
    deltaEquivalent,
    projected: projection.projected,
  };
}

/**
 * Plan the manual "mark as read": every medium jumps to its end, percent
 * becomes 100 and the remaining equivalence is written as one final delta on
 * the medium that was furthest along.
 */
export function applyFinish(
  state: ProgressState,
  occurredAt: Date,
  timeZone: string,
): SyncResult {
  if (state.record.finishedAt) {
    return unchanged(state, "already-complete");
  }

  const totalPages = effectiveTotalPages(state);
  const active = state.media.filter((m) =>
    state.record.activeFormats.includes(m.medium),
  );

  let leading: { media: MediumState; equivalent: Decimal } | null = null;
  for (const m of active) {
    const equivalent = toPagesEquivalent(
      m.medium,
      rawValueOf(m),
      totalPages,
      mediumTotal(state, m),
    );
    if (equivalent !== null && (!leading || equivalent.gt(leading.equivalent))) {
      leading = { media: m, equivalent };
    }
  }

  const ledger: LedgerDelta[] = [];
  let deltaEquivalent = new Decimal(0);

  if (totalPages !== null && leading) {
    const counted = Decimal.max(
      leading.equivalent,
      new Decimal(totalPages).mul(state.record.percent).div(100),
    );
    deltaEquivalent = Decimal.max(0, new Decimal(totalPages).minus(counted)).toDecimalPlaces(
      2,
      Decimal.ROUND_HALF_UP,
    );

    if (deltaEquivalent.gt(0)) {
      const length = mediumTotal(state, leading.media);
      ledger.push({
        medium: leading.media.medium,
        logDate: toLogDate(occurredAt, timeZone),
        pagesEquivalent: deltaEquivalent,
        audioSeconds:
          leading.media.medium === "audio" && length !== null
            ? listenedSeconds(state, leading.media, length - rawValueOf(leading.media))
            : 0,
      });
    }
  }

  const projected: Medium[] = [];
  const media = state.media.map((m) => {
    const total = mediumTotal(state, m);
    if (!state.record.activeFormats.includes(m.medium) || total === null) return m;
    if (rawValueOf(m) < total) projected.push(m.medium);
    return withRawValue(m, total);
  });

  const percent = new Decimal(100);

  return {
    record: {
      ...state.record,
      percent,
      currentPage: representativePage(totalPages, percent, state.record.currentPage),
      finishedAt: occurredAt,
      updatedAt: occurredAt,
    },
    media,
    ledger,
    previousPercent: state.record.percent,
    deltaEquivalent,
    projected,
  };
}

/**
 * Plan activating `medium` (or changing its totals when already active).
 * The medium is moved forward to the record's current percent; no ledger
 * entry is written since no reading happened.
 *
 * @param newMediumId - Id for the medium row when it does not exist yet
 */
export function applyActivation(
  state: ProgressState,
  medium: Medium,
  options: ActivationOptions,
  newMediumId: string,
  occurredAt: Date,
): SyncOutcome {
  if (
    options.totalPagesOverride !== undefined &&
    options.totalPagesOverride !== null &&
    (!Number.isInteger(options.totalPagesOverride) || options.totalPagesOverride <= 0)
  ) {
    return progressError("invalid-setting", "Total pages must be a positive whole number");
  }
  if (
    options.audioLengthSeconds !== undefined &&
    options.audioLengthSeconds !== null &&
    (!Number.isInteger(options.audioLengthSeconds) || options.audioLengthSeconds <= 0)
  ) {
    return progressError("invalid-setting", "Audio length must be a positive number of seconds");
  }

  const existing = findMedium(state, medium);
  const base: MediumState = existing ?? {
    id: newMediumId,
    medium,
    currentPage: isPageMedium(medium) ? 0 : null,
    totalPagesOverride: null,
    audioPositionSeconds: isPageMedium(medium) ? null : 0,
    audioLengthSeconds: null,
    playbackSpeed: null,
  };

  const configured: MediumState = {
    ...base,
    totalPagesOverride:
      isPageMedium(medium) && options.totalPagesOverride !== undefined
        ? options.totalPagesOverride
        : base.totalPagesOverride,
    audioLengthSeconds:
      !isPageMedium(medium) && options.audioLengthSeconds !== undefined
        ? options.audioLengthSeconds
        : base.audioLengthSeconds,
    playbackSpeed:
      !isPageMedium(medium) && options.playbackSpeed !== undefined
        ? options.playbackSpeed
        : base.playbackSpeed,
  };

  const activeFormats = state.record.activeFormats.includes(medium)
    ? state.record.activeFormats
    : [...state.record.activeFormats, medium];

  const record: ProgressRecord = { ...state.record, activeFormats, updatedAt: occurredAt };
  const nextState: ProgressState = {
    ...state,
    record,
    media: existing
      ? state.media.map((m) => (m.medium === medium ? configured : m))
      : [...state.media, configured],
  };

  // Keep the stored position inside the (possibly new) total
  const total = mediumTotal(nextState, configured);
  const clamped = withRawValue(configured, clampRawValue(rawValueOf(configured), total));
  const media = nextState.media.map((m) => (m.medium === medium ? clamped : m));

  const projection = projectPercent(nextState, media, null, record.percent);

  return {
    record,
    media: projection.media,
    ledger: [],
    previousPercent: state.record.percent,
    deltaEquivalent: new Decimal(0),
    projected: projection.projected,
  };
}

/**
 * Plan deactivating `medium`. Its ledger history stays; its position is dropped.
 */
export function applyDeactivation(
  state: ProgressState,
  medium: Medium,
  occurredAt: Date,
): SyncOutcome {
  if (!state.record.activeFormats.includes(medium)) {
    return progressError("no-active-medium", `Format "${medium}" is not active for this book`);
  }
  if (state.record.activeFormats.length === 1) {
    return progressError("invalid-setting", "A book needs at least one active format");
  }

  return {
    ...unchanged(state),
    record: {
      ...state.record,
      activeFormats: state.record.activeFormats.filter((m) => m !== medium),
      updatedAt: occurredAt,
    },
    media: state.media.filter((m) => m.medium !== medium),
  };
}
