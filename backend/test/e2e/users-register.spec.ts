import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { TestClient, readJson, setCookieNamed, type ErrorBody } from '../helpers/test-client';
import { TEST_PASSWORD, type OwnProfileBody } from '../helpers/accounts';
import { auditEvents } from '../helpers/audit';

function register(client: TestClient, payload: Record<string, unknown>) {
  return client.request({ method: 'POST', url: '/v1/users', payload });
}

describe('POST /v1/users', () => {
  it('creates the account without logging in', async () => {
    const { app, deps, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const res = await register(client, {
        email: 'Alice@Example.com',
        nickname: 'alice',
        password: TEST_PASSWORD,
      });

      expect(res.statusCode).toBe(201);
      const { user } = readJson<OwnProfileBody>(res);
      expect(user).toMatchObject({
        email: 'alice@example.com',
        nickname: 'alice',
        profileImageUrl: null,
      });
      expect(setCookieNamed(res, 'refresh_token')).toBeUndefined();
      expect(setCookieNamed(res, 'sid')).toBeUndefined();

      const row = await deps.db
        .selectFrom('users')
        .select(['password_hash'])
        .where('id', '=', user.id)
        .executeTakeFirstOrThrow();
      expect(row.password_hash.startsWith('$2')).toBe(true);

      const events = await auditEvents(deps.db);
      expect(events.map((e) => [e.action, e.user_id, e.metadata])).toEqual([
        ['user.registered', user.id, { userId: user.id, email: 'alice@example.com' }],
      ]);
    } finally {
      await close();
    }
  });

  it('rejects an email already used by an active account, ignoring case', async () => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      await register(client, { email: 'bob@example.com', nickname: 'bob', password: TEST_PASSWORD });
      const res = await register(client, {
        email: 'BOB@example.com',
        nickname: 'bobby',
        password: TEST_PASSWORD,
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorBody>(res).error).toMatchObject({
        code: 'CONFLICT',
        message: 'Email is already in use.',
      });
    } finally {
      await close();
    }
  });

  it('rejects a nickname already used by an active account', async () => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      await register(client, { email: 'c1@example.com', nickname: 'carol', password: TEST_PASSWORD });
      const res = await register(client, {
        email: 'c2@example.com',
        nickname: 'carol',
        password: TEST_PASSWORD,
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorBody>(res).error.message).toBe('Nickname is already in use.');
    } finally {
      await close();
    }
  });

  it.each([
    ['weak password', { email: 'd@example.com', nickname: 'dave', password: 'password' }],
    ['long password', { email: 'd@example.com', nickname: 'dave', password: 'Passw0rd!Passw0rd!Pa1' }],
    ['bad nickname', { email: 'd@example.com', nickname: 'd!', password: TEST_PASSWORD }],
    ['bad email', { email: 'not-an-email', nickname: 'dave', password: TEST_PASSWORD }],
    ['missing field', { email: 'd@example.com', password: TEST_PASSWORD }],
  ])('rejects a %s', async (_label, payload) => {
    const { app, deps, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const res = await register(client, payload);

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorBody>(res).error).toMatchObject({
        code: 'VALIDATION',
        message: 'Invalid request body',
      });

      const users = await deps.db.selectFrom('users').select('id').execute();
      expect(users).toHaveLength(0);
    } finally {
      await close();
    }
  });
});
