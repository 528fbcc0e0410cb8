/**
 * src/shared/security/password-policy.ts
 *
 * WHY:
 * - Length bounds and required character classes come from config, so the policy is a
 *   value, not a hard-coded regex in every schema.
 *
 * HOW TO USE:
 * - const schema = buildPasswordSchema(config.passwordPolicy)
 * - schema.safeParse(body.password)
 */

import { z } from 'zod';

export const PASSWORD_CHARACTER_CLASSES = ['lower', 'upper', 'digit', 'special'] as const;

export type PasswordCharacterClass = (typeof PASSWORD_CHARACTER_CLASSES)[number];

export type PasswordPolicy = Readonly<{
  minLength: number;
  maxLength: number;
  requiredClasses: readonly PasswordCharacterClass[];
}>;

export const PASSWORD_SPECIAL_CHARACTERS = '@$!%*?&';

const CLASS_RULES: Record<PasswordCharacterClass, { pattern: RegExp; message: string }> = {
  lower: { pattern: /[a-z]/, message: 'Password must contain a lowercase letter.' },
  upper: { pattern: /[A-Z]/, message: 'Password must contain an uppercase letter.' },
  digit: { pattern: /\d/, message: 'Password must contain a digit.' },
  special: {
    pattern: /[@$!%*?&]/,
    message: `Password must contain one of ${PASSWORD_SPECIAL_CHARACTERS}.`,
  },
};

export function passwordPolicyViolations(password: string, policy: PasswordPolicy): string[] {
  const violations: string[] = [];

  if (password.length < policy.minLength || password.length > policy.maxLength) {
    violations.push(
      `Password must be between ${policy.minLength} and ${policy.maxLength} characters.`,
    );
  }

  for (const cls of policy.requiredClasses) {
    const rule = CLASS_RULES[cls];
    if (!rule.pattern.test(password)) violations.push(rule.message);
  }

  return violations;
}

export function buildPasswordSchema(policy: PasswordPolicy) {
  return z.string().superRefine((value, ctx) => {
    for (const message of passwordPolicyViolations(value, policy)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });
}
