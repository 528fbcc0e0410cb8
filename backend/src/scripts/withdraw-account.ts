/**
 * backend/src/scripts/withdraw-account.ts
 *
 * WHY:
 * - Operator path for removing an account without the owner's password
 *   (abuse handling, legal requests). Runs the same withdrawal procedure as the
 *   self-service endpoint, so the end state is identical.
 *
 * HOW TO USE:
 * - npm run account:withdraw -- --user-id 42 --reason "abuse report 2291"
 */

import { z } from 'zod';

import { buildConfig } from '../app/config';
import { buildDeps } from '../app/di';
import { logger } from '../shared/logger/logger';

const ArgsSchema = z.object({
  userId: z.coerce.number().int().positive(),
  reason: z.string().trim().min(1).max(500),
});

function parseWithdrawArgs(argv: readonly string[]) {
  const raw: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === '--user-id' && next !== undefined) {
      raw.userId = next;
      i += 1;
    } else if (arg === '--reason' && next !== undefined) {
      raw.reason = next;
      i += 1;
    }
  }
  return ArgsSchema.parse(raw);
}

async function main(): Promise<void> {
  const args = parseWithdrawArgs(process.argv.slice(2));
  const config = buildConfig();
  const deps = await buildDeps({ ...config, tokenCleanupIntervalSeconds: 0 });

  try {
    const result = await deps.accounts.accountService.forceWithdraw(args.userId, args.reason);
    logger.info('accounts.force_withdraw.done', {
      flow: 'accounts.force_withdraw',
      userId: result.userId,
      revokedRefreshTokens: result.revokedRefreshTokens,
      revokedSessions: result.revokedSessions,
    });
  } finally {
    await deps.close();
  }
}

main().catch((err: unknown) => {
  logger.error('accounts.force_withdraw.failed', { err });
  process.exit(1);
});
