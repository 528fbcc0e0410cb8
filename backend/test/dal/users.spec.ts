import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { selectActiveUserByEmailSql } from '../../src/modules/users/dal/user.query-sql';
import {
  getActivePasswordHash,
  getActiveUserById,
  getLoginCredentialsByEmail,
  getUserById,
} from '../../src/modules/users/queries/user.queries';
import { UserErrors } from '../../src/modules/users/user.errors';
import { createDalFixture, type DalFixture } from '../helpers/dal-fixture';

describe('users DAL', () => {
  let f: DalFixture;

  beforeEach(async () => {
    f = await createDalFixture();
  });

  afterEach(async () => {
    await f.close();
  });

  const inUnit = <T>(work: (repo: UserRepo) => Promise<T>) =>
    f.coordinator.runAtomic((trx) => work(new UserRepo(trx)), {
      label: 'test.users',
      onUniqueViolation: UserErrors.fromUniqueViolation,
    });

  it('insertUser normalizes the email and the active lookup ignores case', async () => {
    const created = await inUnit((repo) =>
      repo.insertUser({ email: 'Bob@Example.COM', nickname: 'bob', passwordHash: 'h' }),
    );

    expect(created.email).toBe('bob@example.com');
    expect(created.deleted_at).toBeNull();

    const row = await selectActiveUserByEmailSql(f.db, 'BOB@EXAMPLE.COM');
    expect(row?.id).toBe(created.id);
  });

  it('getLoginCredentialsByEmail returns id, nickname and hash for active users only', async () => {
    const id = await f.insertUser('carol@example.com', 'carol');

    await expect(getLoginCredentialsByEmail(f.db, 'carol@example.com')).resolves.toEqual({
      userId: id,
      nickname: 'carol',
      passwordHash: 'not-a-real-hash',
    });
    await expect(getActivePasswordHash(f.db, id)).resolves.toBe('not-a-real-hash');
    await expect(getLoginCredentialsByEmail(f.db, 'nobody@example.com')).resolves.toBeUndefined();
  });

  it('duplicate active email maps to "Email is already in use."', async () => {
    await f.insertUser('dana@example.com', 'dana');

    await expect(
      inUnit((repo) =>
        repo.insertUser({ email: 'DANA@example.com', nickname: 'dana2', passwordHash: 'h' }),
      ),
    ).rejects.toMatchObject({ code: 'CONFLICT', message: 'Email is already in use.' });
  });

  it('duplicate active nickname maps to "Nickname is already in use."', async () => {
    await f.insertUser('erin@example.com', 'erin');

    await expect(
      inUnit((repo) =>
        repo.insertUser({ email: 'erin2@example.com', nickname: 'erin', passwordHash: 'h' }),
      ),
    ).rejects.toMatchObject({ code: 'CONFLICT', message: 'Nickname is already in use.' });
  });

  it('anonymizeAndSoftDelete frees email and nickname and only succeeds once', async () => {
    const id = await f.insertUser('frank@example.com', 'frank');
    const deletedAt = new Date('2026-03-01T12:00:00.000Z');
    const replacement = {
      email: 'withdrawn+00000000000000aa@deleted.invalid',
      nickname: 'del_00000000000000aa',
      deletedAt,
    };

    await expect(inUnit((repo) => repo.anonymizeAndSoftDelete(id, replacement))).resolves.toBe(true);
    await expect(inUnit((repo) => repo.anonymizeAndSoftDelete(id, replacement))).resolves.toBe(
      false,
    );

    const withdrawn = await getUserById(f.db, id);
    expect(withdrawn).toMatchObject({
      id,
      email: replacement.email,
      nickname: replacement.nickname,
      profileImageUrl: null,
      deletedAt,
    });
    await expect(getActiveUserById(f.db, id)).resolves.toBeUndefined();

    const again = await f.insertUser('frank@example.com', 'frank');
    expect(again).not.toBe(id);
  });

  it('updateFields returns the updated row and skips withdrawn users', async () => {
    const id = await f.insertUser('gina@example.com', 'gina');

    const updated = await inUnit((repo) =>
      repo.updateFields(id, { nickname: 'gina_2', profile_image_url: 'https://img.example/g.png' }),
    );
    expect(updated?.nickname).toBe('gina_2');
    expect(updated?.profile_image_url).toBe('https://img.example/g.png');

    await inUnit((repo) =>
      repo.anonymizeAndSoftDelete(id, {
        email: 'withdrawn+00000000000000bb@deleted.invalid',
        nickname: 'del_00000000000000bb',
        deletedAt: new Date(),
      }),
    );

    await expect(inUnit((repo) => repo.updateFields(id, { nickname: 'zombie' }))).resolves.toBe(
      undefined,
    );
    await expect(inUnit((repo) => repo.updatePasswordHash(id, 'h2'))).resolves.toBe(false);
  });
});
