import { describe, it, expect } from 'vitest';
import {
  checkRequestIntegrity,
  constantTimeEquals,
} from '../../../../src/shared/security/request-integrity';

describe('checkRequestIntegrity', () => {
  it('passes safe methods without any token', () => {
    expect(checkRequestIntegrity(null, null, 'GET')).toEqual({ ok: true });
    expect(checkRequestIntegrity(null, null, 'OPTIONS')).toEqual({ ok: true });
  });

  it('reports MISSING when either side is absent', () => {
    expect(checkRequestIntegrity(null, 'abc', 'POST')).toEqual({ ok: false, reason: 'MISSING' });
    expect(checkRequestIntegrity('abc', undefined, 'DELETE')).toEqual({
      ok: false,
      reason: 'MISSING',
    });
    expect(checkRequestIntegrity('', '', 'PATCH')).toEqual({ ok: false, reason: 'MISSING' });
  });

  it('reports MISMATCH when the header differs from the cookie', () => {
    expect(checkRequestIntegrity('abc', 'abd', 'PUT')).toEqual({ ok: false, reason: 'MISMATCH' });
    expect(checkRequestIntegrity('abc', 'abcd', 'post')).toEqual({
      ok: false,
      reason: 'MISMATCH',
    });
  });

  it('passes when header and cookie match', () => {
    expect(checkRequestIntegrity('tok-123', 'tok-123', 'POST')).toEqual({ ok: true });
  });
});

describe('constantTimeEquals', () => {
  it('compares values of different lengths without throwing', () => {
    expect(constantTimeEquals('a', 'a-much-longer-value')).toBe(false);
    expect(constantTimeEquals('same', 'same')).toBe(true);
  });
});
