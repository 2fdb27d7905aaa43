import { X509Certificate } from 'node:crypto';
import { constantTimeCompare } from './hash.js';

const HEX_FINGERPRINT = /^[0-9a-f]{40,128}$/;

/**
 * Normalize a certificate fingerprint to lowercase hex without separators
 *
 * Accepts the `AB:CD:...` form Node reports for peer certificates as well as
 * the bare hex a TLS terminator forwards. Returns null for anything else.
 */
export function normalizeFingerprint(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }

  const normalized = raw.trim().replace(/[:\s]/g, '').toLowerCase();
  return HEX_FINGERPRINT.test(normalized) ? normalized : null;
}

/**
 * SHA-256 fingerprint of a PEM certificate (as forwarded in `X-Client-Cert`)
 *
 * Proxies usually URL-encode the PEM; both forms are accepted.
 */
export function fingerprintFromPem(pem: string): string | null {
  let decoded = pem;
  if (decoded.includes('%')) {
    try {
      decoded = decodeURIComponent(decoded);
    } catch {
      return null;
    }
  }

  try {
    return normalizeFingerprint(new X509Certificate(decoded).fingerprint256);
  } catch {
    return null;
  }
}

/**
 * Timing-insensitive fingerprint equality
 */
export function fingerprintsMatch(expected: string, presented: string | null | undefined): boolean {
  const normalized = normalizeFingerprint(presented);
  if (!normalized) {
    return false;
  }
  return constantTimeCompare(expected, normalized);
}
