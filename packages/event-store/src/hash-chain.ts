/**
 * @swapvault/event-store — Hash chain for a tamper-evident log.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to the hash of the event before it:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  HashableEvent,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: HashableEvent): string {
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

/**
 * Hex-encoded SHA-256 of an event chained to its predecessor's hash.
 */
export function computeEventHash(event: HashableEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify a sequence of events in global position order.
 *
 * Reports every broken link and every hash that does not match the
 * recomputed one. Verification continues past a break so that all
 * damaged positions are listed.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    if (stored.previousHash !== previousHash) {
      errors.push({
        position: stored.globalPosition,
        reason: `previousHash mismatch at position ${String(stored.globalPosition)}: expected "${previousHash}", got "${stored.previousHash}"`,
      });
    }

    const expected = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== expected) {
      errors.push({
        position: stored.globalPosition,
        reason: `Hash mismatch at position ${String(stored.globalPosition)}: expected "${expected}", got "${stored.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = stored.globalPosition;
    }
    previousHash = stored.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
