/**
 * backend/src/modules/accounts/policies/anonymize.policy.ts
 *
 * WHY:
 * - A withdrawn row keeps its id (content still points at it) but must stop identifying
 *   anyone, and must free its email and nickname for re-registration.
 *
 * RULES:
 * - Pure. The random suffix is injected so tests can pin it.
 * - `.invalid` is a reserved TLD: the replacement email can never receive mail.
 */

import { randomBytes } from 'node:crypto';

export const WITHDRAWN_EMAIL_DOMAIN = 'deleted.invalid';
export const WITHDRAWN_NICKNAME_PREFIX = 'del_';

export type AnonymizedIdentity = {
  email: string;
  nickname: string;
};

export function randomAnonymizationSuffix(): string {
  return randomBytes(8).toString('hex');
}

export function buildAnonymizedIdentity(
  suffix: string = randomAnonymizationSuffix(),
): AnonymizedIdentity {
  return {
    email: `withdrawn+${suffix}@${WITHDRAWN_EMAIL_DOMAIN}`,
    nickname: `${WITHDRAWN_NICKNAME_PREFIX}${suffix}`,
  };
}
