/**
 * Page Equivalence
 *
 * Converts a position in any format into "page-equivalents": pages of the
 * reference (paper) edition. All arithmetic is exact decimal arithmetic.
 *
 * - Percentages and equivalents round to 2 places, half-up
 * - Page positions used for clamping and projection round to whole pages, half-up
 * - Playback speed is applied once, when listened time is captured
 */

import type { Medium } from "@server/db/schema";
import { Decimal } from "decimal.js";

const HUNDRED = new Decimal(100);

export function isPageMedium(medium: Medium): medium is "paper" | "ebook" {
  return medium === "paper" || medium === "ebook";
}

/**
 * Round to 2 decimal places, half-up.
 */
export function roundToCents(value: Decimal.Value): Decimal {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/**
 * Round to a whole number, half-up.
 */
export function roundToWhole(value: Decimal.Value): number {
  return new Decimal(value).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Convert a raw medium position into page-equivalents, unrounded.
 * Percent is derived from this value so that it is rounded only once.
 *
 * @param rawValue - Current page (paper/ebook) or position in the recording
 *   in seconds (audio)
 * @param totalPages - Page count of the reference edition, null when unknown
 * @param mediumTotal - Total of the medium itself: its own page count for an
 *   edition with different pagination, or the audio length in seconds.
 *   Page media without an override pass `totalPages`.
 * @returns The equivalent, or null when it cannot be computed
 */
export function exactPagesEquivalent(
  medium: Medium,
  rawValue: Decimal.Value,
  totalPages: number | null,
  mediumTotal: number | null,
): Decimal | null {
  if (totalPages === null || totalPages <= 0) return null;

  const raw = new Decimal(rawValue);
  if (isPageMedium(medium) && (mediumTotal === null || mediumTotal === totalPages)) {
    return raw;
  }

  if (mediumTotal === null || mediumTotal <= 0) return null;

  return new Decimal(totalPages).mul(raw).div(mediumTotal);
}

/**
 * Page-equivalents rounded to cents, as written to the ledger.
 */
export function toPagesEquivalent(
  medium: Medium,
  rawValue: Decimal.Value,
  totalPages: number | null,
  mediumTotal: number | null,
): Decimal | null {
  const exact = exactPagesEquivalent(medium, rawValue, totalPages, mediumTotal);
  return exact === null ? null : roundToCents(exact);
}

/**
 * Completion percent of `equivalent` against `totalPages`, rounded once and
 * clamped to [0, 100]. Pass an unrounded equivalent.
 */
export function percentOf(equivalent: Decimal.Value, totalPages: number): Decimal {
  if (totalPages <= 0) return new Decimal(0);

  const percent = roundToCents(new Decimal(equivalent).mul(HUNDRED).div(totalPages));
  return Decimal.max(0, Decimal.min(HUNDRED, percent));
}

/**
 * Raw position of a medium with `mediumTotal` units at `percent` completion,
 * rounded to a whole page or second.
 */
export function rawValueAtPercent(mediumTotal: number, percent: Decimal.Value): number {
  return roundToWhole(new Decimal(mediumTotal).mul(percent).div(HUNDRED));
}

/**
 * Clamp a raw position to [0, total], or [0, ∞) when the total is unknown.
 */
export function clampRawValue(rawValue: number, total: number | null): number {
  const lower = Math.max(0, rawValue);
  return total === null ? lower : Math.min(lower, total);
}

/**
 * Position advance in the recording for `listenedSeconds` of wall-clock
 * listening at `speed`.
 */
export function applyPlaybackSpeed(
  listenedSeconds: number,
  speed: Decimal.Value,
): number {
  return roundToWhole(new Decimal(listenedSeconds).mul(speed));
}

/**
 * Wall-clock time needed to listen to `lengthSeconds` of audio at `speed`.
 * Non-positive speeds leave the length unchanged.
 */
export function adjustedAudioLength(
  lengthSeconds: number,
  speed: Decimal.Value,
): number {
  const rate = new Decimal(speed);
  if (rate.lte(0)) return lengthSeconds;
  return roundToWhole(new Decimal(lengthSeconds).div(rate));
}

const DURATION_PATTERN = /^(?:(\d+):)?([0-5]?\d):([0-5]\d)$/;

/**
 * Parse a duration given as whole seconds or as "HH:MM:SS" / "MM:SS".
 *
 * @returns Seconds, or null when the input is not a valid duration
 */
export function parseDuration(input: string | number): number | null {
  if (typeof input === "number") {
    return Number.isInteger(input) && input >= 0 ? input : null;
  }

  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);

  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) return null;

  const hours = match[1] ? parseInt(match[1], 10) : 0;
  const minutes = parseInt(match[2], 10);
  const seconds = parseInt(match[3], 10);
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Format seconds as "HH:MM:SS".
 */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds]
    .map((part) => part.toString().padStart(2, "0"))
    .join(":");
}
