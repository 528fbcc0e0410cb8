/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * bcrypt: slow, salted, one-way. The cost factor is fixed per deployment (BCRYPT_COST,
 * default 12) and embedded in every hash it produces.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
