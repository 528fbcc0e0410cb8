import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { TestClient, readJson, type ErrorBody } from '../helpers/test-client';
import { registerUser, signUpAndLogin, type OwnProfileBody } from '../helpers/accounts';
import { auditEvents } from '../helpers/audit';

type PublicProfileBody = {
  user: { id: number; nickname: string; profileImageUrl: string | null; createdAt: string };
};

describe('/v1/users/me', () => {
  it('returns the own profile including the email', async () => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const { user, accessToken } = await signUpAndLogin(client, {
        email: 'alice@example.com',
        nickname: 'alice',
      });

      const res = await client.request({ method: 'GET', url: '/v1/users/me', bearer: accessToken });
      expect(res.statusCode).toBe(200);
      expect(readJson<OwnProfileBody>(res).user).toMatchObject({
        id: user.id,
        email: 'alice@example.com',
        nickname: 'alice',
      });
    } finally {
      await close();
    }
  });

  it('requires an identity', async () => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const res = await client.request({ method: 'GET', url: '/v1/users/me' });
      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorBody>(res).error.code).toBe('UNAUTHENTICATED');
    } finally {
      await close();
    }
  });

  it('applies a partial update and audits the changed columns', async () => {
    const { app, deps, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const { user, accessToken } = await signUpAndLogin(client, {
        email: 'bob@example.com',
        nickname: 'bob',
      });

      const res = await client.request({
        method: 'PATCH',
        url: '/v1/users/me',
        bearer: accessToken,
        payload: { nickname: 'bobby', profileImageUrl: 'https://img.example.com/bob.png' },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<OwnProfileBody>(res).user).toMatchObject({
        id: user.id,
        email: 'bob@example.com',
        nickname: 'bobby',
        profileImageUrl: 'https://img.example.com/bob.png',
      });

      const updates = (await auditEvents(deps.db)).filter(
        (e) => e.action === 'user.profile_updated',
      );
      expect(updates.map((e) => e.metadata)).toEqual([
        { userId: user.id, fields: ['nickname', 'profile_image_url'] },
      ]);
    } finally {
      await close();
    }
  });

  it('rejects unknown keys and empty patches', async () => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const { accessToken } = await signUpAndLogin(client, {
        email: 'carol@example.com',
        nickname: 'carol',
      });

      const unknownKey = await client.request({
        method: 'PATCH',
        url: '/v1/users/me',
        bearer: accessToken,
        payload: { passwordHash: 'x' },
      });
      expect(unknownKey.statusCode).toBe(400);
      expect(readJson<ErrorBody>(unknownKey).error.message).toBe('Invalid request body');

      const empty = await client.request({
        method: 'PATCH',
        url: '/v1/users/me',
        bearer: accessToken,
        payload: {},
      });
      expect(empty.statusCode).toBe(400);
      expect(readJson<ErrorBody>(empty).error).toMatchObject({
        code: 'VALIDATION',
        message: 'No fields to update.',
      });
    } finally {
      await close();
    }
  });

  it("taking an active user's email conflicts, a withdrawn user's does not", async () => {
    const { app, deps, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const other = await registerUser(client, { email: 'erin@example.com', nickname: 'erin' });
      const { accessToken } = await signUpAndLogin(client, {
        email: 'dave@example.com',
        nickname: 'dave',
      });

      const taken = await client.request({
        method: 'PATCH',
        url: '/v1/users/me',
        bearer: accessToken,
        payload: { email: 'ERIN@example.com' },
      });
      expect(taken.statusCode).toBe(409);
      expect(readJson<ErrorBody>(taken).error.message).toBe('Email is already in use.');

      await deps.accounts.accountService.forceWithdraw(other.id, 'test cleanup');

      const freed = await client.request({
        method: 'PATCH',
        url: '/v1/users/me',
        bearer: accessToken,
        payload: { email: 'ERIN@example.com', nickname: 'erin' },
      });
      expect(freed.statusCode).toBe(200);
      expect(readJson<OwnProfileBody>(freed).user).toMatchObject({
        email: 'erin@example.com',
        nickname: 'erin',
      });
    } finally {
      await close();
    }
  });
});

describe('GET /v1/users/:userId', () => {
  it('returns the public profile without the email', async () => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const user = await registerUser(client, { email: 'frank@example.com', nickname: 'frank' });

      const res = await client.request({ method: 'GET', url: `/v1/users/${user.id}` });
      expect(res.statusCode).toBe(200);

      const body = readJson<PublicProfileBody>(res);
      expect(Object.keys(body.user).sort()).toEqual([
        'createdAt',
        'id',
        'nickname',
        'profileImageUrl',
      ]);
      expect(body.user).toMatchObject({ id: user.id, nickname: 'frank', profileImageUrl: null });
    } finally {
      await close();
    }
  });

  it.each(['abc', '0', '99999'])('answers 404 for /v1/users/%s', async (id) => {
    const { app, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const res = await client.request({ method: 'GET', url: `/v1/users/${id}` });
      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorBody>(res).error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'User not found.',
      });
    } finally {
      await close();
    }
  });

  it('hides withdrawn users', async () => {
    const { app, deps, close } = await buildTestApp();
    const client = new TestClient(app);

    try {
      const user = await registerUser(client, { email: 'gina@example.com', nickname: 'gina' });
      await deps.accounts.accountService.forceWithdraw(user.id, 'spam');

      const res = await client.request({ method: 'GET', url: `/v1/users/${user.id}` });
      expect(res.statusCode).toBe(404);
    } finally {
      await close();
    }
  });
});
