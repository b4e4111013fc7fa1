import { openDatabase, type DatabaseHandle } from "@server/db/client";
import {
  ProgressEngine,
  type BookCatalog,
  type Clock,
} from "@server/lib/progress-engine";

/**
 * In-memory catalog. Books not registered have no known length.
 */
export class TestCatalog implements BookCatalog {
  private pages = new Map<string, number | null>();

  set(bookId: string, totalPages: number | null): this {
    this.pages.set(bookId, totalPages);
    return this;
  }

  async getEffectiveTotalPages(bookId: string): Promise<number | null> {
    return this.pages.get(bookId) ?? null;
  }
}

/**
 * Clock that only moves when told to.
 */
export class TestClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return this.current;
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }
}

export function sequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export interface TestEngine {
  engine: ProgressEngine;
  catalog: TestCatalog;
  clock: TestClock;
  database: DatabaseHandle;
}

/**
 * Engine over a fresh in-memory database, in UTC, at 1x default speed.
 */
export function createTestEngine(
  config: Partial<{ timeZone: string; defaultPlaybackSpeed: number; logEvents: boolean }> = {},
): TestEngine {
  const database = openDatabase(":memory:");
  const catalog = new TestCatalog();
  const clock = new TestClock(new Date("2024-03-01T12:00:00Z"));

  const engine = new ProgressEngine({
    db: database.db,
    catalog,
    clock,
    generateId: sequentialIds(),
    config: {
      timeZone: "UTC",
      defaultPlaybackSpeed: 1,
      logEvents: false,
      ...config,
    },
  });

  return { engine, catalog, clock, database };
}

export const READER = "reader-1";
export const BOOK = "book-1";
