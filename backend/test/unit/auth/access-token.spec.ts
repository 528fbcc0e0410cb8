import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { AccessTokenSigner } from '../../../src/modules/auth/credentials/access-token';

const SECRET = 'test-secret-test-secret-test-secret-0001';
const NOW = new Date('2026-03-01T12:00:00.000Z');

function signer(overrides: { secret?: string; issuer?: string } = {}) {
  return new AccessTokenSigner({
    secret: overrides.secret ?? SECRET,
    issuer: overrides.issuer ?? 'forum-core-test',
    ttlSeconds: 1800,
  });
}

describe('AccessTokenSigner', () => {
  it('signs a token whose expiry is now + ttl and that verifies to the user id', () => {
    const s = signer();
    const { token, expiresAt } = s.sign(42, NOW);

    expect(expiresAt.toISOString()).toBe('2026-03-01T12:30:00.000Z');
    expect(s.verify(token, NOW)).toEqual({ ok: true, userId: 42 });
  });

  it('carries only sub, iat, exp and iss claims', () => {
    const { token } = signer().sign(7, NOW);
    const decoded = jwt.decode(token);
    expect(decoded).toEqual({
      sub: '7',
      iat: 1772366400,
      exp: 1772368200,
      iss: 'forum-core-test',
    });
  });

  it('reports EXPIRED from the expiry instant on', () => {
    const s = signer();
    const { token } = s.sign(42, NOW);

    expect(s.verify(token, new Date(NOW.getTime() + 1799_000))).toEqual({ ok: true, userId: 42 });
    expect(s.verify(token, new Date(NOW.getTime() + 1800_000))).toEqual({
      ok: false,
      reason: 'EXPIRED',
    });
  });

  it('reports MALFORMED for a foreign key, a foreign issuer or garbage', () => {
    const { token } = signer({ secret: 'another-test-secret-another-test-secret' }).sign(42, NOW);
    expect(signer().verify(token, NOW)).toEqual({ ok: false, reason: 'MALFORMED' });

    const { token: otherIssuer } = signer({ issuer: 'someone-else' }).sign(42, NOW);
    expect(signer().verify(otherIssuer, NOW)).toEqual({ ok: false, reason: 'MALFORMED' });

    expect(signer().verify('not.a.jwt', NOW)).toEqual({ ok: false, reason: 'MALFORMED' });
  });

  it('rejects a subject that is not a positive integer', () => {
    const iat = Math.floor(NOW.getTime() / 1000);
    const token = jwt.sign({ sub: 'admin', iat, exp: iat + 60 }, SECRET, {
      algorithm: 'HS256',
      issuer: 'forum-core-test',
    });
    expect(signer().verify(token, NOW)).toEqual({ ok: false, reason: 'MALFORMED' });
  });
});
