/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Login does NOT apply the password policy: a policy change must not lock out accounts
 *   whose passwords predate it. It only bounds the size.
 * - Email normalized to lowercase in the service, not here.
 */

import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().trim().email('Invalid email address').max(255),
  password: z.string().min(1, 'Password is required').max(128),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const resetPasswordSchema = z.object({
  email: z.string().trim().email('Invalid email address').max(255),
});

export const findEmailSchema = z.object({
  nickname: z.string().trim().min(1, 'Nickname is required').max(10),
});
