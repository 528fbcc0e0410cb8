import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { logger } from '../../src/shared/logger/logger';
import { purgeExpiredCredentials } from '../../src/modules/auth/maintenance/purge-expired-credentials';
import type { RotationResult } from '../../src/modules/auth/credentials/credential.types';
import {
  createDalFixture,
  REFRESH_TTL_SECONDS,
  SESSION_TTL_SECONDS,
  type DalFixture,
} from '../helpers/dal-fixture';

describe('TokenIssuer (refresh secrets)', () => {
  let f: DalFixture;
  let userId: number;

  beforeEach(async () => {
    f = await createDalFixture();
    userId = await f.insertUser('alice@example.com', 'alice');
  });

  afterEach(async () => {
    await f.close();
  });

  const issue = (uid: number) =>
    f.coordinator.runAtomic((trx) => f.tokenIssuer.issue(trx, uid), { label: 'test.issue' });

  const rotate = (token: string) =>
    f.coordinator.runAtomic((trx) => f.tokenIssuer.rotate(trx, token), { label: 'test.rotate' });

  const refreshRows = () =>
    f.db.selectFrom('refresh_tokens').select(['user_id', 'token_hash', 'expires_at']).execute();

  const tombstoneRows = () =>
    f.db.selectFrom('refresh_token_rotations').select(['token_hash', 'expires_at']).execute();

  it('stores only the hash of an issued refresh secret', async () => {
    const pair = await issue(userId);
    const rows = await refreshRows();

    expect(rows).toHaveLength(1);
    expect(rows[0]?.token_hash).toBe(f.tokenHasher.hash(pair.refreshToken));
    expect(rows[0]?.token_hash).not.toBe(pair.refreshToken);
    expect(pair.refreshExpiresAt.toISOString()).toBe('2026-03-08T12:00:00.000Z');
    expect(f.tokenIssuer.validateAccess(pair.accessToken)).toEqual({ ok: true, userId });
  });

  it('rotation replaces the record and leaves a tombstone with the old expiry', async () => {
    const first = await issue(userId);
    f.advanceSeconds(60);

    const result = await rotate(first.refreshToken);
    expect(result.outcome).toBe('ROTATED');
    if (result.outcome !== 'ROTATED') return;

    expect(result.userId).toBe(userId);
    expect(result.credentials.refreshToken).not.toBe(first.refreshToken);

    const rows = await refreshRows();
    expect(rows.map((r) => r.token_hash)).toEqual([
      f.tokenHasher.hash(result.credentials.refreshToken),
    ]);

    const tombstones = await tombstoneRows();
    expect(tombstones).toHaveLength(1);
    expect(tombstones[0]?.token_hash).toBe(f.tokenHasher.hash(first.refreshToken));
    expect(tombstones[0]?.expires_at.toISOString()).toBe(first.refreshExpiresAt.toISOString());
  });

  it('replaying a rotated secret is REUSED and revokes every credential of the user', async () => {
    const first = await issue(userId);
    const rotated = await rotate(first.refreshToken);
    if (rotated.outcome !== 'ROTATED') throw new Error('expected ROTATED');

    await f.coordinator.runAtomic((trx) => f.sessionStore.create(trx, userId), {
      label: 'test.session',
    });

    const replay = await rotate(first.refreshToken);
    expect(replay).toEqual({
      outcome: 'REUSED',
      userId,
      revokedRefreshTokens: 1,
      revokedSessions: 1,
    });

    // The successor was revoked with everything else; with no tombstone of its own it is unknown.
    await expect(rotate(rotated.credentials.refreshToken)).resolves.toEqual({ outcome: 'INVALID' });
    expect(await refreshRows()).toHaveLength(0);
  });

  it('an unknown secret is INVALID and changes nothing', async () => {
    await issue(userId);
    await expect(rotate('never-issued')).resolves.toEqual({ outcome: 'INVALID' });
    expect(await refreshRows()).toHaveLength(1);
  });

  it('an expired secret is EXPIRED and its record is removed', async () => {
    const pair = await issue(userId);
    f.advanceSeconds(REFRESH_TTL_SECONDS);

    await expect(rotate(pair.refreshToken)).resolves.toEqual({ outcome: 'EXPIRED', userId });
    expect(await refreshRows()).toHaveLength(0);
    expect(await tombstoneRows()).toHaveLength(0);
  });

  it('a tombstone stops signalling reuse once the original secret would have expired', async () => {
    const first = await issue(userId);
    await rotate(first.refreshToken);
    f.advanceSeconds(REFRESH_TTL_SECONDS);

    await expect(rotate(first.refreshToken)).resolves.toEqual({ outcome: 'INVALID' });
  });

  // PGlite has one connection and the test pool serializes units, so the two rotations below
  // run one after the other. Row-lock contention between real connections is not exercised.
  it('rotating one secret twice in a row: the first rotates, the second is treated as reuse', async () => {
    const pair = await issue(userId);

    const results: RotationResult[] = [];
    results.push(await rotate(pair.refreshToken));
    results.push(await rotate(pair.refreshToken));

    expect(results.map((r) => r.outcome)).toEqual(['ROTATED', 'REUSED']);
    // The reuse signal revoked the secret the first call issued.
    expect(await refreshRows()).toHaveLength(0);
  });

  it('revoke is idempotent', async () => {
    const pair = await issue(userId);
    const revokeOnce = () =>
      f.coordinator.runAtomic((trx) => f.tokenIssuer.revoke(trx, pair.refreshToken), {
        label: 'test.revoke',
      });

    await expect(revokeOnce()).resolves.toBe(true);
    await expect(revokeOnce()).resolves.toBe(false);
  });

  it('revokeAll only touches the given user', async () => {
    const bobId = await f.insertUser('bob@example.com', 'bob');
    await issue(userId);
    await issue(userId);
    await issue(bobId);
    await f.coordinator.runAtomic((trx) => f.sessionStore.create(trx, userId), {
      label: 'test.session',
    });

    const revoked = await f.coordinator.runAtomic((trx) => f.tokenIssuer.revokeAll(trx, userId), {
      label: 'test.revoke_all',
    });

    expect(revoked).toEqual({ refreshTokens: 2, sessions: 1 });
    const remaining = await refreshRows();
    expect(remaining.map((r) => r.user_id)).toEqual([bobId]);
  });

  it('purgeExpiredCredentials removes expired records, tombstones and sessions', async () => {
    const first = await issue(userId);
    await rotate(first.refreshToken);
    await f.coordinator.runAtomic((trx) => f.sessionStore.create(trx, userId), {
      label: 'test.session',
    });

    f.advanceSeconds(SESSION_TTL_SECONDS);
    const early = await purgeExpiredCredentials(
      { coordinator: f.coordinator, sessionStore: f.sessionStore, logger },
      f.clock.now,
    );
    expect(early).toEqual({ refreshTokens: 0, tombstones: 0, sessions: 1 });

    f.advanceSeconds(REFRESH_TTL_SECONDS);
    const late = await purgeExpiredCredentials(
      { coordinator: f.coordinator, sessionStore: f.sessionStore, logger },
      f.clock.now,
    );
    expect(late).toEqual({ refreshTokens: 1, tombstones: 1, sessions: 0 });
  });
});
