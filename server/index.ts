import { openDatabase, type DatabaseHandle } from "@server/db/client";
import { loadConfig, type EngineConfig } from "@server/lib/config";
import {
  ProgressEngine,
  type BookCatalog,
  type Clock,
} from "@server/lib/progress-engine";

export interface CreateProgressEngineOptions {
  catalog: BookCatalog;
  /** Defaults to configuration read from the environment */
  config?: EngineConfig;
  clock?: Clock;
  generateId?: () => string;
}

export interface ProgressEngineHandle {
  engine: ProgressEngine;
  database: DatabaseHandle;
  close(): void;
}

/**
 * Open the configured database and build an engine on top of it.
 */
export function createProgressEngine(
  options: CreateProgressEngineOptions,
): ProgressEngineHandle {
  const config = options.config ?? loadConfig();
  const database = openDatabase(config.databasePath);

  const engine = new ProgressEngine({
    db: database.db,
    catalog: options.catalog,
    config,
    clock: options.clock,
    generateId: options.generateId,
  });

  return {
    engine,
    database,
    close: () => {
      engine.events.removeAllListeners();
      database.close();
    },
  };
}

export { ProgressEngine, systemClock } from "@server/lib/progress-engine";
export type {
  BookCatalog,
  Clock,
  MediumSnapshot,
  ProgressEngineOptions,
  ProgressSnapshot,
  ProgressUpdate,
  ProgressUpdateResult,
} from "@server/lib/progress-engine";
export { loadConfig } from "@server/lib/config";
export type { EngineConfig } from "@server/lib/config";
export { openDatabase } from "@server/db/client";
export type { AppDatabase, DatabaseHandle } from "@server/db/client";
export { MEDIUMS } from "@server/db/schema";
export type { Medium } from "@server/db/schema";
export { isProgressError } from "@server/lib/progress-errors";
export type {
  ProgressError,
  ProgressErrorCode,
  ProgressNotice,
} from "@server/lib/progress-errors";
export { ProgressEventEmitter } from "@server/lib/progress-events";
export type {
  BookCompletedEvent,
  ProgressAdvancedEvent,
  ProgressEventMap,
} from "@server/lib/progress-events";
export { formatDuration, parseDuration } from "@server/lib/equivalence";
export type {
  CalendarDay,
  CompletionEstimate,
  DayTotal,
  Period,
  PeriodSummary,
  ReadingCalendar,
  StreakSummary,
} from "@server/lib/aggregator";
export type { ProgressStatus } from "@server/lib/progress-record";
export type {
  ActivateMediumInput,
  LogListeningInput,
  LogPagesInput,
  LogSessionInput,
  ReportProgressInput,
} from "@server/lib/progress-schemas";
