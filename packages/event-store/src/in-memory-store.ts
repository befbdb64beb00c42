/**
 * @tollgate/event-store — In-memory EventStore implementation.
 *
 * Suitable for tests and for a node that runs without EVENT_LOG_PATH.
 * All state is lost on process exit.
 */

import { IndexedEventStore } from "./indexed-store.js";
import type { StoredEvent } from "./types.js";

export class InMemoryEventStore extends IndexedEventStore {
  protected persist(_events: readonly StoredEvent[]): void {
    // The index is the only copy.
  }
}
