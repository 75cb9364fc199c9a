import { describe, expect, it } from 'vitest';

import { fromSafeFileName, toSafeFileName } from '../file-names.js';

describe('toSafeFileName', () => {
  it('should leave simple ids untouched', () => {
    expect(toSafeFileName('order-42_a')).toBe('order-42_a');
  });

  it('should encode separators and dots', () => {
    expect(toSafeFileName('../etc/passwd')).toBe('%2E%2E%2Fetc%2Fpasswd');
    expect(toSafeFileName('a b')).toBe('a%20b');
  });

  it('should encode multi-byte characters and decode them back', () => {
    expect(toSafeFileName('café')).toBe('caf%C3%A9');
    expect(fromSafeFileName(toSafeFileName('tenant:ü/1'))).toBe('tenant:ü/1');
  });
});
