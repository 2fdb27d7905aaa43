import {
  OAuthError,
  createLogger,
  normalizeFingerprint,
  fingerprintsMatch,
  type Logger,
} from '@campus-sso/shared';
import type { IUserStorage, ISsoSessionStorage } from '../storage/interfaces/index.js';
import type { EstablishedSession, SessionIdentity } from '../types/session.js';
import type { User } from '../types/user.js';

export interface SessionManagerOptions {
  users: IUserStorage;
  sessions: ISsoSessionStorage;
  /** Session lifetime in seconds */
  sessionTtl: number;
  logger?: Logger;
}

/**
 * Establishes and resolves SSO sessions at the identity provider
 */
export class SessionManager {
  private readonly users: IUserStorage;
  private readonly sessions: ISsoSessionStorage;
  private readonly sessionTtl: number;
  private readonly logger: Logger;

  constructor(options: SessionManagerOptions) {
    this.users = options.users;
    this.sessions = options.sessions;
    this.sessionTtl = options.sessionTtl;
    this.logger = options.logger ?? createLogger('session-manager');
  }

  /**
   * Authenticate a user and start an SSO session
   *
   * A bound user presenting a different certificate is refused; a bound user
   * presenting none is let through on the password alone.
   */
  async login(username: string, password: string, certFingerprint?: string): Promise<EstablishedSession> {
    const user = await this.users.verifyPassword(username, password);
    if (!user) {
      this.logger.info('Login rejected', { username, reason: 'invalid_credentials' });
      throw OAuthError.invalidCredentials();
    }

    const presented = normalizeFingerprint(certFingerprint) ?? undefined;
    if (user.certFingerprint && presented && !fingerprintsMatch(user.certFingerprint, presented)) {
      this.logger.warn('Login rejected', { subject: user.subject, reason: 'certificate_mismatch' });
      throw OAuthError.certificateMismatch();
    }

    const expiresAt = new Date(Date.now() + this.sessionTtl * 1000);
    const { value, replaced } = await this.sessions.create({
      subject: user.subject,
      certFingerprint: presented,
      expiresAt,
    });

    this.logger.info('Login succeeded', {
      subject: user.subject,
      certificate: presented !== undefined,
      replacedSession: replaced,
    });

    return { sessionId: value, subject: user.subject, expiresAt };
  }

  /**
   * Resolve the subject behind a session id
   */
  async currentSubject(sessionId: string | undefined): Promise<SessionIdentity> {
    if (!sessionId) {
      throw OAuthError.noSession();
    }

    const session = await this.sessions.findByValue(sessionId);
    if (!session) {
      throw OAuthError.noSession();
    }

    if (session.expiresAt <= new Date()) {
      await this.sessions.delete(sessionId);
      throw OAuthError.noSession('Session has expired');
    }

    const user = await this.users.findBySubject(session.subject);
    if (!user) {
      throw OAuthError.noSession();
    }

    return {
      subject: user.subject,
      role: user.role,
      certFingerprint: session.certFingerprint,
    };
  }

  /**
   * Replace the password of the signed-in user after checking the current one
   */
  async changePassword(sessionId: string | undefined, currentPassword: string, newPassword: string): Promise<void> {
    const identity = await this.currentSubject(sessionId);

    const user = await this.users.verifyPassword(identity.subject, currentPassword);
    if (!user) {
      this.logger.info('Password change rejected', { subject: identity.subject, reason: 'invalid_credentials' });
      throw OAuthError.invalidCredentials();
    }

    await this.users.updatePassword(user.subject, newPassword);
    this.logger.info('Password changed', { subject: user.subject });
  }

  /**
   * Bind the signed-in user to a certificate, or with null remove the binding
   *
   * A user who is already bound must have signed in with that certificate.
   */
  async bindCertificate(sessionId: string | undefined, certFingerprint: string | null): Promise<User> {
    const identity = await this.currentSubject(sessionId);

    const user = await this.users.findBySubject(identity.subject);
    if (!user) {
      throw OAuthError.noSession();
    }

    if (
      user.certFingerprint &&
      !(identity.certFingerprint && fingerprintsMatch(user.certFingerprint, identity.certFingerprint))
    ) {
      this.logger.warn('Certificate change rejected', { subject: user.subject, reason: 'certificate_mismatch' });
      throw OAuthError.certificateMismatch('Sign in with the bound certificate to change it.');
    }

    const updated = await this.users.bindFingerprint(user.subject, certFingerprint);
    if (!updated) {
      throw OAuthError.noSession();
    }

    this.logger.info(certFingerprint ? 'Certificate bound' : 'Certificate unbound', { subject: user.subject });
    return updated;
  }

  /**
   * End a session. Unknown or missing ids are ignored.
   */
  async logout(sessionId: string | undefined): Promise<void> {
    if (!sessionId) {
      return;
    }

    const deleted = await this.sessions.delete(sessionId);
    if (deleted) {
      this.logger.info('Logout');
    }
  }
}
