import type {
  BookCompletedEvent,
  ProgressAdvancedEvent,
} from "@server/lib/progress-events";
import { ProgressEventEmitter } from "@server/lib/progress-events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { BOOK, createTestEngine, READER } from "./helpers";

const completed: BookCompletedEvent = {
  progressId: "p-1",
  readerId: READER,
  bookId: BOOK,
  contextId: null,
  occurredAt: new Date("2024-03-01T12:00:00Z"),
};

describe("ProgressEventEmitter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("calls handlers in subscription order", async () => {
    const emitter = new ProgressEventEmitter();
    const calls: string[] = [];
    emitter.on("bookCompleted", () => {
      calls.push("first");
    });
    emitter.on("bookCompleted", async () => {
      calls.push("second");
    });

    await emitter.emit("bookCompleted", completed);

    expect(calls).toEqual(["first", "second"]);
  });

  it("stops calling a handler once unsubscribed", async () => {
    const emitter = new ProgressEventEmitter();
    const handler = vi.fn();
    const unsubscribe = emitter.on("bookCompleted", handler);

    unsubscribe();
    await emitter.emit("bookCompleted", completed);

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount("bookCompleted")).toBe(0);
  });

  it("logs a failing handler and keeps going", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const emitter = new ProgressEventEmitter();
    const failure = new Error("boom");
    const after = vi.fn();
    emitter.on("bookCompleted", () => {
      throw failure;
    });
    emitter.on("bookCompleted", after);

    await emitter.emit("bookCompleted", completed);

    expect(error).toHaveBeenCalledWith("[progress] Error in 'bookCompleted' handler:", failure);
    expect(after).toHaveBeenCalledWith(completed);
  });
});

describe("engine events", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("announces every ledger delta and the completion", async () => {
    const { engine, catalog, clock, database } = createTestEngine();
    catalog.set(BOOK, 200);
    const advanced: ProgressAdvancedEvent[] = [];
    const finished: BookCompletedEvent[] = [];
    engine.events.on("progressAdvanced", (event) => {
      advanced.push(event);
    });
    engine.events.on("bookCompleted", (event) => {
      finished.push(event);
    });

    await engine.reportProgress({ readerId: READER, bookId: BOOK, medium: "paper", rawValue: 50 });
    clock.set("2024-03-02T09:30:00Z");
    await engine.markFinished({ readerId: READER, bookId: BOOK });
    await engine.markFinished({ readerId: READER, bookId: BOOK });

    expect(advanced).toEqual([
      {
        progressId: "id-1",
        readerId: READER,
        bookId: BOOK,
        contextId: null,
        medium: "paper",
        pagesEquivalent: "50.00",
        previousPercent: "0.00",
        percent: "25.00",
        logDate: "2024-03-01",
        occurredAt: new Date("2024-03-01T12:00:00Z"),
      },
      {
        progressId: "id-1",
        readerId: READER,
        bookId: BOOK,
        contextId: null,
        medium: "paper",
        pagesEquivalent: "150.00",
        previousPercent: "25.00",
        percent: "100.00",
        logDate: "2024-03-02",
        occurredAt: new Date("2024-03-02T09:30:00Z"),
      },
    ]);
    expect(finished).toEqual([
      {
        progressId: "id-1",
        readerId: READER,
        bookId: BOOK,
        contextId: null,
        occurredAt: new Date("2024-03-02T09:30:00Z"),
      },
    ]);

    database.close();
  });

  it("stays quiet when nothing was read", async () => {
    const { engine, catalog, database } = createTestEngine();
    catalog.set(BOOK, 200);
    const handler = vi.fn();
    engine.events.on("progressAdvanced", handler);

    await engine.reportProgress({ readerId: READER, bookId: BOOK, medium: "paper", rawValue: 0 });
    await engine.reportProgress({ readerId: READER, bookId: BOOK, medium: "paper", rawValue: -1 });

    expect(handler).not.toHaveBeenCalled();
    database.close();
  });

  it("logs events when configured to", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { engine, catalog, database } = createTestEngine({ logEvents: true });
    catalog.set(BOOK, 200);

    await engine.reportProgress({ readerId: READER, bookId: BOOK, medium: "paper", rawValue: 20 });

    expect(log).toHaveBeenCalledWith(
      "[progress] progressAdvanced",
      expect.objectContaining({ pagesEquivalent: "20.00", percent: "10.00" }),
    );
    database.close();
  });
});
