import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { TestClient, readJson, type ErrorBody } from '../helpers/test-client';
import { CountingHasher } from '../helpers/fake-hasher';

function attempt(client: TestClient, opts: { remoteAddress?: string; forwardedFor?: string } = {}) {
  return client.request({
    method: 'POST',
    url: '/v1/auth/session',
    payload: { email: 'nobody@example.com', password: 'Wr0ng!pass' },
    remoteAddress: opts.remoteAddress,
    headers: opts.forwardedFor ? { 'x-forwarded-for': opts.forwardedFor } : undefined,
  });
}

describe('rate limiting', () => {
  it('the sixth login attempt in a window is rejected before any password work', async () => {
    const hasher = new CountingHasher();
    const { app, close } = await buildTestApp({
      rateLimit: { enabled: true },
      passwordHasher: hasher,
    });
    const client = new TestClient(app);

    try {
      for (let i = 0; i < 5; i += 1) {
        const res = await attempt(client);
        expect(res.statusCode).toBe(401);
      }
      expect(hasher.verifyCalls).toBe(5);

      const limited = await attempt(client);
      expect(limited.statusCode).toBe(429);
      expect(readJson<ErrorBody>(limited).error).toMatchObject({
        code: 'RATE_LIMITED',
        message: 'Too many requests. Try again later.',
      });

      const retryAfter = Number(limited.headers['retry-after']);
      expect(retryAfter).toBeGreaterThanOrEqual(1);
      expect(retryAfter).toBeLessThanOrEqual(60);
      expect(Number(limited.headers['x-ratelimit-limit'])).toBe(5);
      expect(Number(limited.headers['x-ratelimit-remaining'])).toBe(0);
      expect(hasher.verifyCalls).toBe(5);
    } finally {
      await close();
    }
  });

  it('budgets are per client address', async () => {
    const { app, close } = await buildTestApp({
      rateLimit: { enabled: true },
      passwordHasher: new CountingHasher(),
    });
    const client = new TestClient(app);

    try {
      for (let i = 0; i < 5; i += 1) await attempt(client, { remoteAddress: '198.51.100.1' });
      expect((await attempt(client, { remoteAddress: '198.51.100.1' })).statusCode).toBe(429);
      expect((await attempt(client, { remoteAddress: '198.51.100.2' })).statusCode).toBe(401);
    } finally {
      await close();
    }
  });

  it('believes X-Forwarded-For from a trusted proxy', async () => {
    const { app, close } = await buildTestApp({
      rateLimit: { enabled: true, trustedProxies: ['127.0.0.1'] },
      passwordHasher: new CountingHasher(),
    });
    const client = new TestClient(app);

    try {
      for (let i = 0; i < 5; i += 1) await attempt(client, { forwardedFor: '203.0.113.7' });
      expect((await attempt(client, { forwardedFor: '203.0.113.7' })).statusCode).toBe(429);
      expect((await attempt(client, { forwardedFor: '203.0.113.8' })).statusCode).toBe(401);
    } finally {
      await close();
    }
  });

  it('ignores X-Forwarded-For from an untrusted peer', async () => {
    const { app, close } = await buildTestApp({
      rateLimit: { enabled: true },
      passwordHasher: new CountingHasher(),
    });
    const client = new TestClient(app);

    try {
      for (let i = 0; i < 5; i += 1) {
        await attempt(client, { forwardedFor: `203.0.113.${10 + i}` });
      }
      expect((await attempt(client, { forwardedFor: '203.0.113.99' })).statusCode).toBe(429);
    } finally {
      await close();
    }
  });

  it('does not limit reads', async () => {
    const { app, close } = await buildTestApp({
      rateLimit: { enabled: true },
    });
    const client = new TestClient(app);

    try {
      for (let i = 0; i < 120; i += 1) {
        const res = await client.request({ method: 'GET', url: '/health' });
        expect(res.statusCode).toBe(200);
      }
    } finally {
      await close();
    }
  });
});
