/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request validation for the Users module.
 * - Password rules come from config, so the schemas are built once in the module factory.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - The profile patch is strict: an unknown key is a VALIDATION error, never a column.
 * - Email normalized to lowercase in the service/policy, not here.
 */

import { z } from 'zod';

import { buildPasswordSchema, type PasswordPolicy } from '../../shared/security/password-policy';

export const NICKNAME_PATTERN = /^[A-Za-z0-9_]{3,10}$/;

const emailSchema = z.string().trim().email('Invalid email address').max(255);

const nicknameSchema = z
  .string()
  .regex(NICKNAME_PATTERN, 'Nickname must be 3-10 letters, digits or underscores');

const profileImageUrlSchema = z.string().url('Invalid profile image URL').max(2048);

export function buildUserSchemas(policy: PasswordPolicy) {
  const passwordSchema = buildPasswordSchema(policy);

  const registerSchema = z.object({
    email: emailSchema,
    password: passwordSchema,
    nickname: nicknameSchema,
  });

  const patchProfileSchema = z
    .object({
      email: emailSchema.optional(),
      nickname: nicknameSchema.optional(),
      profileImageUrl: profileImageUrlSchema.nullable().optional(),
    })
    .strict();

  const changePasswordSchema = z
    .object({
      currentPassword: z.string().min(1, 'Current password is required').max(128),
      newPassword: passwordSchema,
      newPasswordConfirm: z.string(),
    })
    .superRefine((value, ctx) => {
      if (value.newPassword !== value.newPasswordConfirm) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['newPasswordConfirm'],
          message: 'Password confirmation does not match.',
        });
      }
      if (value.newPassword === value.currentPassword) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['newPassword'],
          message: 'New password must differ from the current password.',
        });
      }
    });

  return { registerSchema, patchProfileSchema, changePasswordSchema };
}

export type UserSchemas = ReturnType<typeof buildUserSchemas>;
export type RegisterInput = z.infer<UserSchemas['registerSchema']>;
export type PatchProfileInput = z.infer<UserSchemas['patchProfileSchema']>;
export type ChangePasswordInput = z.infer<UserSchemas['changePasswordSchema']>;

export const userIdParamsSchema = z.object({
  userId: z.coerce.number().int().positive().max(2_147_483_647),
});
