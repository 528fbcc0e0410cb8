import { describe, it, expect } from 'vitest';
import {
  buildPasswordSchema,
  passwordPolicyViolations,
  type PasswordPolicy,
} from '../../../../src/shared/security/password-policy';

const POLICY: PasswordPolicy = {
  minLength: 8,
  maxLength: 20,
  requiredClasses: ['lower', 'upper', 'digit', 'special'],
};

describe('password policy', () => {
  it('accepts a password that meets every rule', () => {
    expect(passwordPolicyViolations('Passw0rd!', POLICY)).toEqual([]);
  });

  it('lists each missing character class', () => {
    expect(passwordPolicyViolations('password', POLICY)).toEqual([
      'Password must contain an uppercase letter.',
      'Password must contain a digit.',
      'Password must contain one of @$!%*?&.',
    ]);
  });

  it('enforces both length bounds', () => {
    const expected = 'Password must be between 8 and 20 characters.';
    expect(passwordPolicyViolations('Pw0!', POLICY)).toEqual([expected]);
    expect(passwordPolicyViolations('Passw0rd!Passw0rd!xyz', POLICY)).toEqual([expected]);
  });

  it('only checks the classes the policy requires', () => {
    const relaxed: PasswordPolicy = { minLength: 6, maxLength: 64, requiredClasses: ['digit'] };
    expect(passwordPolicyViolations('abcdef1', relaxed)).toEqual([]);
  });

  it('buildPasswordSchema reports every violation as an issue', () => {
    const result = buildPasswordSchema(POLICY).safeParse('PASSWORD');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.message)).toEqual([
        'Password must contain a lowercase letter.',
        'Password must contain a digit.',
        'Password must contain one of @$!%*?&.',
      ]);
    }
  });
});
