/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * SHA-256 is enough here: the inputs are 256-bit random secrets, not passwords.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
