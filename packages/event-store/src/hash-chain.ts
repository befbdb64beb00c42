/**
 * @tollgate/event-store — Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * Only the structural fields take part, so a StoredEvent hashes the same
 * as the UnhashedEvent it was built from.
 */
export function computeEventHash(event: UnhashedEvent, previousHash: string): string {
  const content = canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Link an event onto the chain.
 */
export function sealEvent(event: UnhashedEvent, previousHash: string): StoredEvent {
  return Object.freeze({
    ...event,
    hash: computeEventHash(event, previousHash),
    previousHash,
  });
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 *
 * Reports every break: a previousHash that does not match the preceding
 * event's hash, a hash that does not match the event's content, or a gap
 * in global positions.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;
  let lastVerifiedPosition = 0;

  for (const event of events) {
    const position = event.globalPosition;

    if (position !== expectedPosition) {
      errors.push({
        position,
        reason: `Expected global position ${expectedPosition}, found ${position}`,
      });
    }

    if (event.previousHash !== previousHash) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${position}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${position}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    previousHash = event.hash;
    expectedPosition = position + 1;
    lastVerifiedPosition = position;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
