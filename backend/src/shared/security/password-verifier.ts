/**
 * backend/src/shared/security/password-verifier.ts
 *
 * WHY:
 * - "Unknown email" must cost the same as "wrong password". Otherwise response latency
 *   tells an attacker which emails are registered.
 *
 * HOW IT WORKS:
 * - create() hashes a random throwaway secret once at startup with the configured hasher,
 *   so the dummy hash carries the same cost factor as real ones.
 * - verify(plain, null) runs a full comparison against that dummy hash, then returns false.
 */

import type { PasswordHasher } from './password-hasher';
import { generateSecureToken } from './token';

export class PasswordVerifier {
  private constructor(
    private readonly hasher: PasswordHasher,
    private readonly dummyHash: string,
  ) {}

  static async create(hasher: PasswordHasher): Promise<PasswordVerifier> {
    const dummyHash = await hasher.hash(generateSecureToken(16));
    return new PasswordVerifier(hasher, dummyHash);
  }

  async verify(plain: string, storedHash: string | null): Promise<boolean> {
    if (storedHash === null) {
      await this.hasher.verify(plain, this.dummyHash);
      return false;
    }

    return this.hasher.verify(plain, storedHash);
  }

  hash(plain: string): Promise<string> {
    return this.hasher.hash(plain);
  }
}
