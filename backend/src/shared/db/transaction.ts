/**
 * backend/src/shared/db/transaction.ts
 *
 * WHY:
 * - Every mutation that touches credentials or account state runs as ONE atomic unit:
 *   all statements commit together or none do.
 * - Isolation is READ COMMITTED. Concurrent readers never see half of a unit; we do not
 *   pay for SERIALIZABLE retries.
 *
 * HOW TO USE:
 *   const user = await coordinator.runAtomic(
 *     async (trx) => new UserRepo(trx).updateFields(userId, patch),
 *     { label: 'users.update_profile', deadlineAt: req.requestContext.deadlineAt },
 *   );
 *
 * RULES:
 * - `work` receives the only TxExecutor. Repos are built from it, so "update, then return
 *   the updated row" always happens on the unit's own connection.
 * - Do not touch the pool `db` inside `work`. The unit already holds a connection.
 * - Success is returned only after COMMIT resolves.
 * - Deadline: once `deadlineAt` passes, the unit rejects, every further query on `trx` is
 *   refused, and Kysely rolls the unit back.
 * - Failures leave as AppError: unique violation → CONFLICT, everything else → IO_ERROR.
 */

import type {
  KyselyPlugin,
  PluginTransformQueryArgs,
  PluginTransformResultArgs,
  QueryResult,
  RootOperationNode,
  UnknownRow,
} from 'kysely';

import type { Db, TxExecutor } from './db';
import { asUniqueViolation } from './pg-errors';
import { AppError } from '../http/errors';
import type { Logger } from '../logger/logger';

export class DeadlineExceededError extends Error {
  constructor(readonly label: string) {
    super(`Deadline exceeded: ${label}`);
    this.name = 'DeadlineExceededError';
  }
}

/** Refuses to start any query once the unit's deadline has fired. */
class DeadlineGuardPlugin implements KyselyPlugin {
  constructor(
    private readonly signal: AbortSignal,
    private readonly label: string,
  ) {}

  transformQuery(args: PluginTransformQueryArgs): RootOperationNode {
    if (this.signal.aborted) throw new DeadlineExceededError(this.label);
    return args.node;
  }

  async transformResult(args: PluginTransformResultArgs): Promise<QueryResult<UnknownRow>> {
    return args.result;
  }
}

export type AtomicOptions = Readonly<{
  /** Stable name for logs, e.g. 'auth.rotate'. */
  label: string;
  /** Epoch millis. Defaults to now + the coordinator's default timeout. */
  deadlineAt?: number;
  /** Maps a unique violation to a domain error (e.g. "email taken"). */
  onUniqueViolation?: (constraint: string | null) => AppError;
}>;

export class TransactionCoordinator {
  constructor(
    private readonly db: Db,
    private readonly opts: { defaultTimeoutMs: number; logger: Logger },
  ) {}

  async runAtomic<T>(work: (trx: TxExecutor) => Promise<T>, opts: AtomicOptions): Promise<T> {
    const deadlineAt = opts.deadlineAt ?? Date.now() + this.opts.defaultTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      return await this.db
        .transaction()
        .setIsolationLevel('read committed')
        .execute(async (trx) => {
          const remainingMs = deadlineAt - Date.now();
          if (remainingMs <= 0) throw new DeadlineExceededError(opts.label);

          const controller = new AbortController();
          const deadline = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => {
              controller.abort();
              reject(new DeadlineExceededError(opts.label));
            }, remainingMs);
          });

          const guarded = trx.withPlugin(new DeadlineGuardPlugin(controller.signal, opts.label));
          return Promise.race([work(guarded), deadline]);
        });
    } catch (err) {
      throw this.toAppError(err, opts);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  private toAppError(err: unknown, opts: AtomicOptions): AppError {
    if (err instanceof AppError) return err;

    const unique = asUniqueViolation(err);
    if (unique) {
      this.opts.logger.warn('tx.unique_violation', {
        flow: opts.label,
        constraint: unique.constraint,
      });
      return opts.onUniqueViolation
        ? opts.onUniqueViolation(unique.constraint)
        : AppError.conflict('Resource already exists.', { constraint: unique.constraint });
    }

    if (err instanceof DeadlineExceededError) {
      this.opts.logger.warn('tx.deadline_exceeded', { flow: opts.label });
      return AppError.ioError('Request deadline exceeded.', { flow: opts.label }, err);
    }

    this.opts.logger.error('tx.failed', { flow: opts.label, err });
    return AppError.ioError(undefined, { flow: opts.label }, err);
  }
}

/**
 * Idempotent reads only: one retry on a storage failure, then IO_ERROR.
 * AppErrors are domain outcomes, not storage failures, and are never retried.
 */
export async function withReadRetry<T>(
  read: () => Promise<T>,
  ctx: { label: string; logger: Logger },
): Promise<T> {
  try {
    return await read();
  } catch (err) {
    if (err instanceof AppError) throw err;
    ctx.logger.warn('db.read_retry', { flow: ctx.label, err });
  }

  try {
    return await read();
  } catch (err) {
    if (err instanceof AppError) throw err;
    ctx.logger.error('db.read_failed', { flow: ctx.label, err });
    throw AppError.ioError(undefined, { flow: ctx.label }, err);
  }
}
