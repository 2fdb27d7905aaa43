import { describe, it, expect } from 'vitest';
import { safeReturnTo } from '../http/return-to.js';
import { readForwardedFingerprint } from '../middleware/client-certificate.js';

describe('safeReturnTo', () => {
  it('should accept a local path with a query', () => {
    expect(safeReturnTo('/auth/authorize?client_id=academic-api')).toBe('/auth/authorize?client_id=academic-api');
  });

  it.each(['https://evil.example/', '//evil.example/', '/\\evil.example/', 'relative/path', '', undefined, null])(
    'should reject %s',
    (value) => {
      expect(safeReturnTo(value)).toBeNull();
    }
  );

  it('should reject control characters', () => {
    expect(safeReturnTo('/next\r\nSet-Cookie: a=b')).toBeNull();
  });
});

describe('readForwardedFingerprint', () => {
  const fingerprint = 'ab'.repeat(32);

  it('should read and normalize the fingerprint header', () => {
    const headers: Record<string, string> = { 'X-Client-Cert-Fingerprint': fingerprint.toUpperCase() };

    expect(readForwardedFingerprint((name) => headers[name])).toBe(fingerprint);
  });

  it('should return null when nothing usable is forwarded', () => {
    const headers: Record<string, string> = { 'X-Client-Cert-Fingerprint': 'garbage' };

    expect(readForwardedFingerprint((name) => headers[name])).toBeNull();
    expect(readForwardedFingerprint(() => undefined)).toBeNull();
  });
});
