/**
 * backend/src/modules/auth/flows/recovery/find-email-flow.ts
 *
 * WHY:
 * - "Which address did I sign up with?" answered by nickname, masked.
 *
 * RULES:
 * - Unknown nicknames get UNKNOWN_NICKNAME_MASK with the same 200, never a 404.
 * - The full address is never logged.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { withReadRetry } from '../../../../shared/db/transaction';
import type { Logger } from '../../../../shared/logger/logger';

import { getActiveUserByNickname } from '../../../users';

import { UNKNOWN_NICKNAME_MASK, maskEmail } from '../../policies/email-mask.policy';
import type { FindEmailParams } from '../../auth.types';

export async function findEmailFlow(
  deps: { db: DbExecutor; logger: Logger },
  params: FindEmailParams,
): Promise<{ email: string }> {
  const user = await withReadRetry(() => getActiveUserByNickname(deps.db, params.nickname), {
    label: 'auth.find_email.lookup',
    logger: deps.logger,
  });

  deps.logger.info('auth.find_email', {
    flow: 'auth.find_email',
    requestId: params.requestId,
    found: user !== undefined,
  });

  return { email: user ? maskEmail(user.email) : UNKNOWN_NICKNAME_MASK };
}
