/**
 * backend/src/modules/accounts/account.schemas.ts
 *
 * Withdrawal needs the current password and an explicit `agree: true`.
 */

import { z } from 'zod';

export const withdrawSchema = z.object({
  password: z.string().min(1, 'Password is required').max(128),
  agree: z.literal(true, {
    errorMap: () => ({ message: 'Withdrawal must be explicitly agreed to' }),
  }),
});

export type WithdrawInput = z.infer<typeof withdrawSchema>;
