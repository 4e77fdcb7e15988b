import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { QueryLogEntry, QueryLogger } from './query-logger.js';

/**
 * Deregistration token returned by `StatementEvents.on`. Calling it more
 * than once has no further effect.
 */
export type Unsubscribe = () => void;

/**
 * Post-execution hook of an engine. Every statement issued through a session
 * of the engine is published here after it completed.
 *
 * Listeners observe only: one that throws is logged and skipped, the
 * statement's caller never sees the error.
 */
export class StatementEvents {
  private listeners: QueryLogger[] = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  get listenerCount(): number {
    return this.listeners.length;
  }

  on(listener: QueryLogger): Unsubscribe {
    // Wrapped so that registering the same function twice yields two
    // independent subscriptions.
    const entry: QueryLogger = e => listener(e);
    this.listeners = [...this.listeners, entry];

    let active = true;
    return () => {
      if (!active) return;
      active = false;
      this.listeners = this.listeners.filter(l => l !== entry);
    };
  }

  emit(entry: QueryLogEntry): void {
    // Snapshot: listeners may unsubscribe while being notified.
    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err) {
        this.logger.warn('Statement listener failed; statement result is unaffected', err);
      }
    }
  }
}
