/**
 * Accept a post-login destination only when it is a path on this host
 *
 * Rejects absolute URLs, protocol-relative `//host` and `/\host` forms.
 */
export function safeReturnTo(value: string | null | undefined): string | null {
  if (!value || !value.startsWith('/')) {
    return null;
  }

  const second = value.charAt(1);
  if (second === '/' || second === '\\') {
    return null;
  }

  // Control characters never belong in a Location header
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) < 0x20 || value.charCodeAt(i) === 0x7f) {
      return null;
    }
  }

  return value;
}
