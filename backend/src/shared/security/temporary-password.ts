/**
 * backend/src/shared/security/temporary-password.ts
 *
 * WHY:
 * - Password recovery mails a generated password. It must pass the same policy a user's own
 *   password does, so it always carries every character class.
 *
 * HOW TO USE:
 * - const plain = generateTemporaryPassword()   // 12 chars, e.g. "k7R!..."
 */

import { randomInt } from 'node:crypto';

import { PASSWORD_SPECIAL_CHARACTERS } from './password-policy';

export const TEMPORARY_PASSWORD_LENGTH = 12;

const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';
const REQUIRED_SETS = [LOWER, UPPER, DIGITS, PASSWORD_SPECIAL_CHARACTERS] as const;
const FULL_POOL = REQUIRED_SETS.join('');

function pick(alphabet: string): string {
  return alphabet.charAt(randomInt(alphabet.length));
}

export function generateTemporaryPassword(length: number = TEMPORARY_PASSWORD_LENGTH): string {
  if (length < REQUIRED_SETS.length) {
    throw new Error(`Temporary password needs at least ${REQUIRED_SETS.length} characters`);
  }

  const chars = REQUIRED_SETS.map(pick);
  while (chars.length < length) chars.push(pick(FULL_POOL));

  // Fisher-Yates, so the required characters do not sit at fixed positions.
  for (let i = chars.length - 1; i > 0; i -= 1) {
    const j = randomInt(i + 1);
    const a = chars[i] ?? '';
    chars[i] = chars[j] ?? '';
    chars[j] = a;
  }

  return chars.join('');
}
