/**
 * Progress Record Types
 *
 * In-memory shape of a read-through and its per-format positions, plus the
 * lookups shared by the synchronizer and the engine.
 */

import type {
  Medium,
  ProgressMediumRow,
  ReadingProgressRow,
} from "@server/db/schema";
import { isPageMedium } from "@server/lib/equivalence";
import { Decimal } from "decimal.js";

export type ProgressStatus = "unstarted" | "in-progress" | "complete";

export interface ProgressKey {
  readerId: string;
  bookId: string;
  contextId: string | null;
}

export interface MediumState {
  id: string;
  medium: Medium;
  currentPage: number | null;
  totalPagesOverride: number | null;
  audioPositionSeconds: number | null;
  audioLengthSeconds: number | null;
  playbackSpeed: Decimal | null;
}

export interface ProgressRecord extends ProgressKey {
  id: string;
  percent: Decimal;
  activeFormats: Medium[];
  customTotalPages: number | null;
  audioPlaybackSpeed: Decimal;
  currentPage: number | null;
  finishedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Everything the synchronizer needs to plan one update.
 */
export interface ProgressState {
  record: ProgressRecord;
  media: MediumState[];
  /** Page count reported by the catalog, null when unknown */
  bookTotalPages: number | null;
}

export function toProgressRecord(row: ReadingProgressRow): ProgressRecord {
  return {
    id: row.id,
    readerId: row.readerId,
    bookId: row.bookId,
    contextId: row.contextId,
    percent: new Decimal(row.percent),
    activeFormats: row.activeFormats,
    customTotalPages: row.customTotalPages,
    audioPlaybackSpeed: new Decimal(row.audioPlaybackSpeed),
    currentPage: row.currentPage,
    finishedAt: row.finishedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toMediumState(row: ProgressMediumRow): MediumState {
  return {
    id: row.id,
    medium: row.medium,
    currentPage: row.currentPage,
    totalPagesOverride: row.totalPagesOverride,
    audioPositionSeconds: row.audioPositionSeconds,
    audioLengthSeconds: row.audioLengthSeconds,
    playbackSpeed: row.playbackSpeed === null ? null : new Decimal(row.playbackSpeed),
  };
}

export function statusOf(record: ProgressRecord | null): ProgressStatus {
  if (!record) return "unstarted";
  return record.finishedAt ? "complete" : "in-progress";
}

/**
 * Page count of the reference edition: the reader's override wins over the
 * catalog's count.
 */
export function effectiveTotalPages(state: ProgressState): number | null {
  return state.record.customTotalPages ?? state.bookTotalPages;
}

/**
 * Total of a medium in its own unit: pages for paper/ebook, seconds for audio.
 */
export function mediumTotal(state: ProgressState, media: MediumState): number | null {
  if (isPageMedium(media.medium)) {
    return media.totalPagesOverride ?? effectiveTotalPages(state);
  }
  return media.audioLengthSeconds;
}

export function rawValueOf(media: MediumState): number {
  return (
    (isPageMedium(media.medium) ? media.currentPage : media.audioPositionSeconds) ?? 0
  );
}

export function withRawValue(media: MediumState, rawValue: number): MediumState {
  return isPageMedium(media.medium)
    ? { ...media, currentPage: rawValue }
    : { ...media, audioPositionSeconds: rawValue };
}

/**
 * Playback speed of an audio medium, falling back to the record's speed.
 */
export function playbackSpeedOf(state: ProgressState, media: MediumState): Decimal {
  return media.playbackSpeed ?? state.record.audioPlaybackSpeed;
}

export function findMedium(
  state: ProgressState,
  medium: Medium,
): MediumState | undefined {
  return state.media.find((m) => m.medium === medium);
}
