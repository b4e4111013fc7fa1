import { MEDIUMS } from "@server/db/schema";
import { MAX_PLAYBACK_SPEED, MIN_PLAYBACK_SPEED } from "@server/lib/config";
import { isLogDate } from "@server/lib/date-utils";
import { parseDuration } from "@server/lib/equivalence";
import { z } from "zod";

export const mediumSchema = z.enum(MEDIUMS);

export const pageMediumSchema = z.enum(["paper", "ebook"]);

export const readerIdSchema = z.string().min(1);

export const progressKeySchema = z.object({
  readerId: readerIdSchema,
  bookId: z.string().min(1),
  contextId: z.string().min(1).nullable().default(null),
});

export const pageSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

/**
 * Seconds, as a whole number or "HH:MM:SS" / "MM:SS".
 */
export const durationSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const parsed = parseDuration(value);
    if (parsed === null) {
      ctx.addIssue({
        code: "custom",
        message: `Expected a non-negative whole number of seconds or HH:MM:SS, got ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return parsed;
  })
  .pipe(z.number().max(Number.MAX_SAFE_INTEGER));

const reportBaseSchema = progressKeySchema.extend({
  occurredAt: z.date().optional(),
});

/**
 * Pages are whole numbers; audio positions are seconds or a duration string.
 */
export const reportProgressSchema = z.discriminatedUnion("medium", [
  reportBaseSchema.extend({ medium: pageMediumSchema, rawValue: pageSchema }),
  reportBaseSchema.extend({ medium: z.literal("audio"), rawValue: durationSchema }),
]);

export const logListeningSchema = reportBaseSchema.extend({
  amount: durationSchema,
});

export const logPagesSchema = reportBaseSchema.extend({
  medium: pageMediumSchema.default("paper"),
  amount: pageSchema,
});

export const logSessionSchema = progressKeySchema
  .extend({
    medium: pageMediumSchema.default("paper"),
    startPage: pageSchema,
    endPage: pageSchema,
    startedAt: z.date(),
    endedAt: z.date().optional(),
    durationSeconds: durationSchema.optional(),
  })
  .refine((session) => session.endPage >= session.startPage, {
    message: "End page must not be before the start page",
    path: ["endPage"],
  })
  .refine(
    (session) => !session.endedAt || session.endedAt.getTime() >= session.startedAt.getTime(),
    { message: "Session must not end before it starts", path: ["endedAt"] },
  );

export const finishSchema = reportBaseSchema;

export const playbackSpeedSchema = z
  .number()
  .min(MIN_PLAYBACK_SPEED)
  .max(MAX_PLAYBACK_SPEED);

export const activateMediumSchema = progressKeySchema.extend({
  medium: mediumSchema,
  totalPagesOverride: pageSchema.positive().nullable().optional(),
  audioLengthSeconds: durationSchema
    .pipe(z.number().positive())
    .nullable()
    .optional(),
  playbackSpeed: playbackSpeedSchema.nullable().optional(),
});

export const deactivateMediumSchema = progressKeySchema.extend({
  medium: mediumSchema,
});

export const customTotalPagesSchema = progressKeySchema.extend({
  customTotalPages: pageSchema.positive().nullable(),
});

export const setPlaybackSpeedSchema = progressKeySchema.extend({
  playbackSpeed: playbackSpeedSchema,
});

export const logDateSchema = z.string().refine(isLogDate, {
  message: "Expected a date formatted as yyyy-MM-dd",
});

export const dateRangeSchema = z
  .object({ start: logDateSchema, end: logDateSchema })
  .refine((range) => range.start <= range.end, {
    message: "Range start must not be after its end",
  });

export const periodQuerySchema = z.object({
  period: z.enum(["day", "week", "month", "year"]),
  anchor: logDateSchema.optional(),
});

export const calendarQuerySchema = z.object({
  year: z.number().int().min(1).max(9999),
  month: z.number().int().min(1).max(12),
});

export type ReportProgressInput = z.input<typeof reportProgressSchema>;
export type LogListeningInput = z.input<typeof logListeningSchema>;
export type LogPagesInput = z.input<typeof logPagesSchema>;
export type LogSessionInput = z.input<typeof logSessionSchema>;
export type FinishInput = z.input<typeof finishSchema>;
export type ActivateMediumInput = z.input<typeof activateMediumSchema>;
export type DeactivateMediumInput = z.input<typeof deactivateMediumSchema>;
export type CustomTotalPagesInput = z.input<typeof customTotalPagesSchema>;
export type SetPlaybackSpeedInput = z.input<typeof setPlaybackSpeedSchema>;
export type ProgressKeyInput = z.input<typeof progressKeySchema>;
export type DateRangeInput = z.input<typeof dateRangeSchema>;
export type PeriodQueryInput = z.input<typeof periodQuerySchema>;
export type CalendarQueryInput = z.input<typeof calendarQuerySchema>;
