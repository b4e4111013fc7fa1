/**
 * Progress Events
 *
 * Explicit notifications for collaborators (gamification, leaderboards,
 * challenges). Subscribers register with `on`; the engine emits after the
 * update that caused the event has been committed.
 */

import type { Medium } from "@server/db/schema";

export interface ProgressAdvancedEvent {
  progressId: string;
  readerId: string;
  bookId: string;
  contextId: string | null;
  medium: Medium;
  /** Page-equivalents added to the ledger */
  pagesEquivalent: string;
  previousPercent: string;
  percent: string;
  logDate: string;
  occurredAt: Date;
}

export interface BookCompletedEvent {
  progressId: string;
  readerId: string;
  bookId: string;
  contextId: string | null;
  occurredAt: Date;
}

export interface ProgressEventMap {
  progressAdvanced: ProgressAdvancedEvent;
  bookCompleted: BookCompletedEvent;
}

type EventHandler<T> = (data: T) => void | Promise<void>;

type HandlerRegistry = {
  [K in keyof ProgressEventMap]: Set<EventHandler<ProgressEventMap[K]>>;
};

export class ProgressEventEmitter {
  private handlers: HandlerRegistry = {
    progressAdvanced: new Set(),
    bookCompleted: new Set(),
  };

  /**
   * Subscribe to an event.
   * @returns Function that removes the subscription
   */
  on<K extends keyof ProgressEventMap>(
    event: K,
    handler: EventHandler<ProgressEventMap[K]>,
  ): () => void {
    this.handlers[event].add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof ProgressEventMap>(
    event: K,
    handler: EventHandler<ProgressEventMap[K]>,
  ): void {
    this.handlers[event].delete(handler);
  }

  /**
   * Call every handler of `event` in subscription order.
   * A failing handler is logged and does not stop the others.
   */
  async emit<K extends keyof ProgressEventMap>(
    event: K,
    data: ProgressEventMap[K],
  ): Promise<void> {
    for (const handler of [...this.handlers[event]]) {
      try {
        await handler(data);
      } catch (error) {
        console.error(`[progress] Error in '${event}' handler:`, error);
      }
    }
  }

  listenerCount(event: keyof ProgressEventMap): number {
    return this.handlers[event].size;
  }

  removeAllListeners(): void {
    this.handlers.progressAdvanced.clear();
    this.handlers.bookCompleted.clear();
  }
}
