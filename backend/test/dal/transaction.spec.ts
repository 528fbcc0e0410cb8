import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { withReadRetry } from '../../src/shared/db/transaction';
import { logger } from '../../src/shared/logger/logger';
import { AppError } from '../../src/shared/http/errors';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { UserErrors } from '../../src/modules/users/user.errors';
import { createDalFixture, type DalFixture } from '../helpers/dal-fixture';

async function countUsers(f: DalFixture): Promise<number> {
  const rows = await f.db.selectFrom('users').select('id').execute();
  return rows.length;
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe('TransactionCoordinator.runAtomic', () => {
  let f: DalFixture;

  beforeEach(async () => {
    f = await createDalFixture();
  });

  afterEach(async () => {
    await f.close();
  });

  it('commits every statement of a successful unit', async () => {
    await f.coordinator.runAtomic(
      async (trx) => {
        const repo = new UserRepo(trx);
        await repo.insertUser({ email: 'a@example.com', nickname: 'alice', passwordHash: 'h' });
        await repo.insertUser({ email: 'b@example.com', nickname: 'bob', passwordHash: 'h' });
      },
      { label: 'test.commit' },
    );

    expect(await countUsers(f)).toBe(2);
  });

  it('rolls back the whole unit on a unique violation and maps it to CONFLICT', async () => {
    const run = f.coordinator.runAtomic(
      async (trx) => {
        const repo = new UserRepo(trx);
        await repo.insertUser({ email: 'a@example.com', nickname: 'alice', passwordHash: 'h' });
        await repo.insertUser({ email: 'A@example.com', nickname: 'alice2', passwordHash: 'h' });
      },
      { label: 'test.unique', onUniqueViolation: UserErrors.fromUniqueViolation },
    );

    await expect(run).rejects.toMatchObject({
      code: 'CONFLICT',
      status: 409,
      message: 'Email is already in use.',
    });
    expect(await countUsers(f)).toBe(0);
  });

  it('uses a generic conflict when no mapper is given', async () => {
    const run = f.coordinator.runAtomic(
      async (trx) => {
        const repo = new UserRepo(trx);
        await repo.insertUser({ email: 'a@example.com', nickname: 'alice', passwordHash: 'h' });
        await repo.insertUser({ email: 'b@example.com', nickname: 'alice', passwordHash: 'h' });
      },
      { label: 'test.unique_generic' },
    );

    await expect(run).rejects.toMatchObject({
      code: 'CONFLICT',
      message: 'Resource already exists.',
    });
  });

  it('passes domain errors through untouched and still rolls back', async () => {
    const run = f.coordinator.runAtomic(
      async (trx) => {
        await new UserRepo(trx).insertUser({
          email: 'a@example.com',
          nickname: 'alice',
          passwordHash: 'h',
        });
        throw AppError.forbidden('nope');
      },
      { label: 'test.domain_error' },
    );

    await expect(run).rejects.toMatchObject({ code: 'FORBIDDEN', message: 'nope' });
    expect(await countUsers(f)).toBe(0);
  });

  it('maps other storage failures to IO_ERROR', async () => {
    const run = f.coordinator.runAtomic(
      async (trx) => {
        // author 999 does not exist: foreign key violation
        await trx
          .insertInto('posts')
          .values({ author_id: 999, title: 't', content: 'c', deleted_at: null })
          .execute();
      },
      { label: 'test.fk' },
    );

    await expect(run).rejects.toMatchObject({ code: 'IO_ERROR', status: 503 });
  });

  it('rolls back a unit that outlives its deadline', async () => {
    const run = f.coordinator.runAtomic(
      async (trx) => {
        const repo = new UserRepo(trx);
        await repo.insertUser({ email: 'a@example.com', nickname: 'alice', passwordHash: 'h' });
        await sleep(300);
        await repo.insertUser({ email: 'b@example.com', nickname: 'bob', passwordHash: 'h' });
      },
      { label: 'test.deadline', deadlineAt: Date.now() + 100 },
    );

    await expect(run).rejects.toMatchObject({
      code: 'IO_ERROR',
      message: 'Request deadline exceeded.',
    });
    expect(await countUsers(f)).toBe(0);
  });

  it('refuses to start a unit whose deadline already passed', async () => {
    let ran = false;
    const run = f.coordinator.runAtomic(
      async () => {
        ran = true;
      },
      { label: 'test.late', deadlineAt: Date.now() - 1 },
    );

    await expect(run).rejects.toMatchObject({ code: 'IO_ERROR' });
    expect(ran).toBe(false);
  });
});

describe('withReadRetry', () => {
  const ctx = { label: 'test.read', logger };

  function flakyRead<T>(failures: unknown[], value: T) {
    const state = { calls: 0 };
    const read = async (): Promise<T> => {
      const failure = failures[state.calls];
      state.calls += 1;
      if (failure !== undefined) throw failure;
      return value;
    };
    return { read, state };
  }

  it('retries a read that fails once and returns the second result', async () => {
    const { read, state } = flakyRead([new Error('connection reset')], 42);

    await expect(withReadRetry(read, ctx)).resolves.toBe(42);
    expect(state.calls).toBe(2);
  });

  it('gives up after the second failure with IO_ERROR', async () => {
    const second = new Error('connection refused');
    const { read, state } = flakyRead([new Error('connection reset'), second], 42);

    const err = await withReadRetry(read, ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({
      code: 'IO_ERROR',
      status: 503,
      message: 'Service temporarily unavailable',
      meta: { flow: 'test.read' },
    });
    expect(err instanceof Error ? err.cause : undefined).toBe(second);
    expect(state.calls).toBe(2);
  });

  it('never retries a domain error', async () => {
    const notFound = AppError.notFound('Post not found.');
    const { read, state } = flakyRead([notFound], 42);

    await expect(withReadRetry(read, ctx)).rejects.toBe(notFound);
    expect(state.calls).toBe(1);
  });
});
