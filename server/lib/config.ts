import { z } from "zod";

export const MIN_PLAYBACK_SPEED = 0.5;
export const MAX_PLAYBACK_SPEED = 3;

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const configSchema = z.object({
  DATABASE_PATH: z.string().min(1).default(":memory:"),
  READER_TIME_ZONE: z
    .string()
    .default("UTC")
    .refine(isTimeZone, { message: "Unknown IANA time zone" }),
  DEFAULT_PLAYBACK_SPEED: z.coerce
    .number()
    .min(MIN_PLAYBACK_SPEED)
    .max(MAX_PLAYBACK_SPEED)
    .default(1),
  LOG_EVENTS: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((val) => val === "true" || val === "1"),
});

export type EngineConfig = {
  databasePath: string;
  /** Time zone used to turn update timestamps into ledger dates */
  timeZone: string;
  defaultPlaybackSpeed: number;
  /** Log every emitted progress event to the console */
  logEvents: boolean;
};

/**
 * Read engine configuration from environment variables.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = configSchema.parse(env);

  return {
    databasePath: parsed.DATABASE_PATH,
    timeZone: parsed.READER_TIME_ZONE,
    defaultPlaybackSpeed: parsed.DEFAULT_PLAYBACK_SPEED,
    logEvents: parsed.LOG_EVENTS,
  };
}
