import { describe, it, expect } from 'vitest';
import { fixTermLength } from '../src/core/term-name.js';
import { AclErrorCode } from '../src/core/errors.js';
import { catchAclError } from './helpers.js';

describe('fixTermLength', () => {
  it('returns names that already fit unchanged', () => {
    expect(fixTermLength('short-name', { abbreviate: true, truncate: true })).toBe('short-name');
  });

  it('leaves a fitting name alone even when it contains abbreviable words', () => {
    expect(fixTermLength('global-internal', { abbreviate: true, maxLength: 15 })).toBe('global-internal');
  });

  it('applies abbreviations in table order and stops once the name fits', () => {
    // 29 chars -> GBL (26) -> INT (21) -> BDR (18); router is never reached
    const name = 'global-internal-router-border';
    expect(fixTermLength(name, { abbreviate: true, maxLength: 20 })).toBe('GBL-INT-router-BDR');
  });

  it('stops after the first substitution when that is enough', () => {
    expect(fixTermLength('global-internal-router-border', { abbreviate: true, maxLength: 26 }))
      .toBe('GBL-internal-router-border');
  });

  it('shortens google to GOOG', () => {
    const name = 'permit-google-' + 'z'.repeat(50);
    expect(fixTermLength(name, { abbreviate: true })).toBe('permit-GOOG-' + 'z'.repeat(50));
  });

  it('replaces every occurrence of a word', () => {
    expect(fixTermLength('deny-bogons-src-bogons-dst', { abbreviate: true, maxLength: 24 }))
      .toBe('deny-BGN-src-BGN-dst');
  });

  it('prefers the longer entry listed first', () => {
    expect(fixTermLength('drop-bogons-inbound', { abbreviate: true, maxLength: 16 })).toBe('drop-BGN-inbound');
  });

  it('fails when abbreviation alone cannot make the name fit', () => {
    const name = 'x'.repeat(70);
    const err = catchAclError(() => fixTermLength(name, { abbreviate: true }));
    expect(err.code).toBe(AclErrorCode.TERM_NAME_TOO_LONG);
    expect(err.details).toEqual({ name, original: name, maxLength: 62, length: 70 });
  });

  it('fails when both strategies are disabled', () => {
    const name = 'permit-internal-customer-traffic';
    const err = catchAclError(() => fixTermLength(name, { maxLength: 20 }));
    expect(err.details).toEqual({ name, original: name, maxLength: 20, length: 32 });
    expect(err.message).toBe(
      `Term ${name} (originally ${name}) is too long. Limit is 20 characters (vs. 32) ` +
        'and no abbreviations remain or abbreviations disabled.',
    );
  });

  it('reports the abbreviated attempt alongside the original name', () => {
    const name = 'global-' + 'y'.repeat(60);
    const err = catchAclError(() => fixTermLength(name, { abbreviate: true }));
    expect(err.details).toEqual({ name: 'GBL-' + 'y'.repeat(60), original: name, maxLength: 62, length: 64 });
  });

  it('truncates to exactly the limit', () => {
    const name = 'x'.repeat(70);
    expect(fixTermLength(name, { abbreviate: true, truncate: true })).toBe('x'.repeat(62));
    expect(fixTermLength('permit-internal-customer-traffic', { truncate: true, maxLength: 20 }))
      .toBe('permit-internal-cust');
  });

  it('truncates after abbreviating', () => {
    const name = 'established-' + 'a'.repeat(60);
    expect(fixTermLength(name, { abbreviate: true, truncate: true })).toBe('EST-' + 'a'.repeat(58));
  });

  it('is deterministic', () => {
    const name = 'accept-internet-service-request-replies-from-customer-border-routers';
    const first = fixTermLength(name, { abbreviate: true, truncate: true, maxLength: 30 });
    expect(fixTermLength(name, { abbreviate: true, truncate: true, maxLength: 30 })).toBe(first);
    expect(first.length).toBeLessThanOrEqual(30);
  });
});
