import { describe, it, expect } from 'vitest';

import { checkRegex, scanRegex } from '../check.js';

describe('scanRegex', () => {
  it('finds look-around outside character classes', () => {
    expect(scanRegex('a(?=b)')).toEqual({ hasLookAround: true, hasBackReference: false });
    expect(scanRegex('(?<!x)y')).toEqual({ hasLookAround: true, hasBackReference: false });
    expect(scanRegex('[(?=]')).toEqual({ hasLookAround: false, hasBackReference: false });
    expect(scanRegex('\\(?=')).toEqual({ hasLookAround: false, hasBackReference: false });
  });

  it('finds numbered and named back-references', () => {
    expect(scanRegex('(a)\\1').hasBackReference).toBe(true);
    expect(scanRegex('(?<n>a)\\k<n>').hasBackReference).toBe(true);
    expect(scanRegex('\\\\1').hasBackReference).toBe(false);
  });
});

describe('checkRegex', () => {
  it('accepts plain patterns', () => {
    expect(checkRegex('^[a-z]+(-[a-z]+)*$')).toEqual({ ok: true });
  });

  it('marks untranslatable syntax as unsupported', () => {
    expect(checkRegex('(a)\\1')).toEqual({
      ok: false,
      unsupported: true,
      message: 'unsupported Perl regexp syntax in "(a)\\\\1": back-reference',
    });
  });

  it('rejects patterns that do not compile', () => {
    const check = checkRegex('(');

    expect(check.ok).toBe(false);
    expect(!check.ok && check.unsupported).toBe(false);
    expect(!check.ok && check.message.startsWith('invalid regexp "(": ')).toBe(true);
  });
});
