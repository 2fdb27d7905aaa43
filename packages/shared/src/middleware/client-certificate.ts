import type { MiddlewareHandler } from 'hono';
import type { HttpBindings } from '@hono/node-server';
import { TLSSocket } from 'node:tls';
import { normalizeFingerprint, fingerprintFromPem } from '../crypto/fingerprint.js';

export const HEADER_CLIENT_CERT_FINGERPRINT = 'X-Client-Cert-Fingerprint';
export const HEADER_CLIENT_CERT = 'X-Client-Cert';

export interface ClientCertificateVariables {
  certFingerprint?: string;
}

export interface ClientCertificateOptions {
  /**
   * Accept fingerprints forwarded by a TLS-terminating proxy
   * (`X-Client-Cert-Fingerprint`, or the PEM in `X-Client-Cert`)
   */
  trustProxyHeaders?: boolean;
}

/**
 * Fingerprint of a CA-verified peer certificate on the underlying TLS socket
 */
export function readPeerFingerprint(bindings: HttpBindings | undefined): string | null {
  const socket = bindings?.incoming?.socket;
  if (!(socket instanceof TLSSocket) || !socket.authorized) {
    return null;
  }

  // An empty object comes back when the peer sent no certificate
  const certificate = socket.getPeerCertificate();
  return normalizeFingerprint(certificate.fingerprint256);
}

/**
 * Fingerprint forwarded by a proxy in request headers
 */
export function readForwardedFingerprint(header: (name: string) => string | undefined): string | null {
  const forwarded = normalizeFingerprint(header(HEADER_CLIENT_CERT_FINGERPRINT));
  if (forwarded) {
    return forwarded;
  }

  const pem = header(HEADER_CLIENT_CERT);
  return pem ? fingerprintFromPem(pem) : null;
}

/**
 * Resolve the fingerprint of the client certificate presented with this request
 *
 * Sets `certFingerprint` in context variables when one is found; requests
 * without a certificate pass through untouched.
 */
export function clientCertificate(options: ClientCertificateOptions = {}): MiddlewareHandler<{
  Bindings: HttpBindings;
  Variables: ClientCertificateVariables;
}> {
  const { trustProxyHeaders = true } = options;

  return async (c, next) => {
    const fingerprint =
      readPeerFingerprint(c.env) ??
      (trustProxyHeaders ? readForwardedFingerprint((name) => c.req.header(name)) : null);

    if (fingerprint) {
      c.set('certFingerprint', fingerprint);
    }

    await next();
  };
}
