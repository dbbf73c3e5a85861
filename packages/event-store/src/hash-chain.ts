/**
 * @capvault/event-store: Hash chain for tamper-evident notification logs.
 *
 * Events are canonicalized with RFC 8785 (JCS) and hashed together with
 * their predecessor's hash:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { EventStoreIntegrityResult, IntegrityError, StoredEvent } from "./types.js";
import { isHashedEvent } from "./types.js";

/** `previousHash` of the first event. */
export const GENESIS_HASH = "genesis";

/**
 * Only the structural fields are hashed, so a stored event re-hashes to
 * its own `hash`.
 */
function canonicalEventContent(event: StoredEvent): string {
  return canonicalize({
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
}

/** Hex SHA-256 of the event's canonical content followed by `previousHash`. */
export function computeEventHash(event: StoredEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

function linkErrors(event: StoredEvent, expectedPrevious: string): IntegrityError[] {
  const position = event.globalPosition;
  if (!isHashedEvent(event)) {
    return [{ position, reason: `Event at position ${position} is missing hash fields` }];
  }

  const errors: IntegrityError[] = [];
  if (event.previousHash !== expectedPrevious) {
    errors.push({
      position,
      reason: `previousHash mismatch at position ${position}: expected "${expectedPrevious}", got "${event.previousHash}"`,
    });
  }
  const recomputed = computeEventHash(event, event.previousHash);
  if (event.hash !== recomputed) {
    errors.push({
      position,
      reason: `Hash mismatch at position ${position}: expected "${recomputed}", got "${event.hash}"`,
    });
  }
  return errors;
}

/**
 * Walk events in global position order. An event without hash fields is
 * reported and skipped; the next event is still checked against the last
 * hash seen.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    errors.push(...linkErrors(event, previousHash));
    if (isHashedEvent(event)) {
      previousHash = event.hash;
      lastVerifiedPosition = event.globalPosition;
    }
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
