/**
 * src/modules/auth/policies/rotation-outcome.policy.ts
 *
 * WHY:
 * - The decision "what does presenting this refresh secret mean" is pure; TokenIssuer
 *   performs the reads and writes around it.
 *
 * RULES:
 * - `consumed` is the row the atomic DELETE … RETURNING removed (null if none).
 * - `tombstone` is only consulted when nothing was consumed.
 * - An expired tombstone is treated as INVALID: that secret could not have been used anyway.
 */

export type RotationDecision = 'ROTATE' | 'INVALID' | 'EXPIRED' | 'REUSED';

export function decideRotationOutcome(input: {
  consumed: { expiresAt: Date } | null;
  tombstone: { expiresAt: Date } | null;
  now: Date;
}): RotationDecision {
  const nowMs = input.now.getTime();

  if (input.consumed) {
    return input.consumed.expiresAt.getTime() <= nowMs ? 'EXPIRED' : 'ROTATE';
  }

  if (input.tombstone && input.tombstone.expiresAt.getTime() > nowMs) return 'REUSED';

  return 'INVALID';
}
