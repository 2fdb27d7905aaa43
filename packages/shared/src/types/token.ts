/**
 * Token pair as held by a resource server
 *
 * Only ever stored server-side; the browser sees the local session id.
 */
export interface HeldTokenPair {
  accessToken: string;
  refreshToken: string;
  subject: string;
  clientId: string;
  scope: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
}
