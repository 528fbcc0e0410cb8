/**
 * src/modules/auth/credentials/access-token.ts
 *
 * WHY:
 * - Short-lived access grants are self-contained HS256 JWTs. Validation needs only the key,
 *   never the database.
 *
 * RULES:
 * - The only identity claim is `sub` (numeric user id as a string). No roles, no email.
 * - `iss` is pinned on sign and checked on verify.
 * - Verification reports EXPIRED vs MALFORMED; callers never show the difference to clients.
 */

import jwt from 'jsonwebtoken';

export type AccessTokenFailure = 'EXPIRED' | 'MALFORMED';

export type AccessTokenCheck =
  | { ok: true; userId: number }
  | { ok: false; reason: AccessTokenFailure };

export type SignedAccessToken = {
  token: string;
  expiresAt: Date;
};

const SUBJECT_PATTERN = /^[1-9]\d*$/;

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class AccessTokenSigner {
  constructor(
    private readonly opts: {
      secret: string;
      issuer: string;
      ttlSeconds: number;
    },
  ) {}

  sign(userId: number, now: Date): SignedAccessToken {
    const iat = toEpochSeconds(now);
    const exp = iat + this.opts.ttlSeconds;

    const token = jwt.sign({ sub: String(userId), iat, exp }, this.opts.secret, {
      algorithm: 'HS256',
      issuer: this.opts.issuer,
    });

    return { token, expiresAt: new Date(exp * 1000) };
  }

  verify(token: string, now: Date): AccessTokenCheck {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.opts.secret, {
        algorithms: ['HS256'],
        issuer: this.opts.issuer,
        clockTimestamp: toEpochSeconds(now),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) return { ok: false, reason: 'EXPIRED' };
      return { ok: false, reason: 'MALFORMED' };
    }

    if (typeof payload === 'string') return { ok: false, reason: 'MALFORMED' };

    const sub = payload.sub;
    if (typeof sub !== 'string' || !SUBJECT_PATTERN.test(sub)) {
      return { ok: false, reason: 'MALFORMED' };
    }

    return { ok: true, userId: Number(sub) };
  }
}
