import { canonicalize, deepFreeze, digestHex, type HashAlgorithm } from '../canonical/json.js';
import { hashedContentOf, type AuditEvent, type UnsealedAuditEvent } from './schema.js';

export function computeEventHash(event: UnsealedAuditEvent, algorithm: HashAlgorithm): string {
    return digestHex(canonicalize(hashedContentOf(event)) + event.prevHash, algorithm);
}

/**
 * Computes the hash and freezes the event.
 */
export function sealEvent(event: UnsealedAuditEvent, algorithm: HashAlgorithm): AuditEvent {
    return deepFreeze({ ...event, hash: computeEventHash(event, algorithm) });
}
