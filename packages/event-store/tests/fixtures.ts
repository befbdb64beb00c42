/**
 * Shared fixtures for @tollgate/event-store tests.
 */

import type { DomainEvent } from "@tollgate/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "test",
      correlationId: `corr-${counter}`,
      source: "host",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
