import {
  OAuthError,
  createLogger,
  generateJti,
  generateFamilyId,
  normalizeFingerprint,
  fingerprintsMatch,
  type Logger,
  type TokenResponse,
} from '@campus-sso/shared';
import type { IAccessTokenStorage, IRefreshTokenStorage, IUserStorage } from '../storage/interfaces/index.js';
import type { AccessTokenPayload, TokenPair, ValidatedToken } from '../types/token.js';
import { createSigningKey, signAccessToken, verifyAccessToken } from '../crypto/jwt.js';
import { TOKEN_TYPE_BEARER } from '../config/constants.js';

export interface TokenServiceOptions {
  accessTokens: IAccessTokenStorage;
  refreshTokens: IRefreshTokenStorage;
  users: IUserStorage;
  signingSecret: string;
  issuer: string;
  /** Access token lifetime in seconds */
  accessTokenTtl: number;
  /** Refresh token lifetime in seconds */
  refreshTokenTtl: number;
  logger?: Logger;
}

export interface IssueTokensInput {
  subject: string;
  clientId: string;
  scope: string;
  certFingerprint?: string;
}

interface PairInput {
  subject: string;
  clientId: string;
  scope: string;
  familyId: string;
  certFingerprint?: string;
  parentTokenId?: string;
}

/**
 * Issues, validates, rotates and revokes token pairs
 *
 * Every pair belongs to a family created when a code is redeemed. Rotation
 * keeps the family; replaying a rotated refresh token revokes all of it.
 */
export class TokenService {
  private readonly accessTokens: IAccessTokenStorage;
  private readonly refreshTokens: IRefreshTokenStorage;
  private readonly users: IUserStorage;
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly accessTokenTtl: number;
  private readonly refreshTokenTtl: number;
  private readonly logger: Logger;

  constructor(options: TokenServiceOptions) {
    this.accessTokens = options.accessTokens;
    this.refreshTokens = options.refreshTokens;
    this.users = options.users;
    this.key = createSigningKey(options.signingSecret);
    this.issuer = options.issuer;
    this.accessTokenTtl = options.accessTokenTtl;
    this.refreshTokenTtl = options.refreshTokenTtl;
    this.logger = options.logger ?? createLogger('token-service');
  }

  /**
   * Issue a new pair in a new family
   *
   * The fingerprint presented at login wins over the one bound to the user.
   */
  async issueTokens(input: IssueTokensInput): Promise<TokenPair> {
    const user = await this.users.findBySubject(input.subject);
    if (!user) {
      throw OAuthError.serverError('Subject no longer exists');
    }

    const certFingerprint = normalizeFingerprint(input.certFingerprint) ?? user.certFingerprint;

    const pair = await this.issuePair({
      subject: user.subject,
      clientId: input.clientId,
      scope: input.scope,
      familyId: generateFamilyId(),
      certFingerprint,
    });

    this.logger.info('Tokens issued', {
      subject: pair.subject,
      clientId: pair.clientId,
      family: pair.familyId,
      bound: certFingerprint !== undefined,
    });

    return pair;
  }

  /**
   * Check an access token
   *
   * @param audience - client id the token must have been issued to
   */
  async validate(accessToken: string, certFingerprint?: string, audience?: string): Promise<ValidatedToken> {
    const verification = await verifyAccessToken(accessToken, this.key, this.issuer);

    if (!verification.valid) {
      // A revoked token must not look merely expired
      if (verification.reason === 'expired' && verification.jti) {
        const record = await this.accessTokens.findByJti(verification.jti);
        if (record?.status === 'active') {
          throw OAuthError.tokenExpired();
        }
      }
      throw OAuthError.tokenUnknown();
    }

    const claims = verification.payload;
    const record = await this.accessTokens.findByJti(claims.jti);

    if (
      !record ||
      record.status !== 'active' ||
      record.subject !== claims.sub ||
      record.clientId !== claims.client_id
    ) {
      throw OAuthError.tokenUnknown();
    }

    const now = new Date();
    if (record.expiresAt <= now) {
      throw OAuthError.tokenExpired();
    }

    if (audience !== undefined && record.clientId !== audience) {
      throw OAuthError.tokenUnknown('Access token was issued to a different client');
    }

    // Unbound tokens ignore whatever fingerprint is presented
    if (record.certFingerprint && !fingerprintsMatch(record.certFingerprint, certFingerprint)) {
      this.logger.warn('Certificate mismatch on validation', { subject: record.subject, clientId: record.clientId });
      throw OAuthError.certificateMismatch();
    }

    const user = await this.users.findBySubject(record.subject);
    if (!user) {
      throw OAuthError.tokenUnknown();
    }

    return {
      subject: record.subject,
      role: user.role,
      scope: record.scope,
      clientId: record.clientId,
      expiresIn: Math.max(0, claims.exp - Math.floor(now.getTime() / 1000)),
    };
  }

  /**
   * Rotate a refresh token into a new pair
   *
   * @param clientId - when given, the token must belong to this client
   */
  async refresh(refreshToken: string, clientId?: string): Promise<TokenPair> {
    if (clientId !== undefined) {
      const existing = await this.refreshTokens.findByValue(refreshToken);
      if (existing && existing.clientId !== clientId) {
        throw OAuthError.refreshUnknown('Refresh token was issued to a different client');
      }
    }

    const rotation = await this.refreshTokens.rotate(refreshToken, new Date());

    switch (rotation.outcome) {
      case 'unknown':
      case 'revoked':
        throw OAuthError.refreshUnknown();
      case 'expired':
        throw OAuthError.refreshExpired();
      case 'replayed': {
        const revoked = await this.revokeFamily(rotation.token.familyId);
        this.logger.warn('Refresh token replayed, family revoked', {
          subject: rotation.token.subject,
          clientId: rotation.token.clientId,
          family: rotation.token.familyId,
          revoked,
        });
        throw OAuthError.refreshReplayed();
      }
      case 'rotated':
        break;
    }

    const previous = rotation.token;
    const pair = await this.issuePair({
      subject: previous.subject,
      clientId: previous.clientId,
      scope: previous.scope,
      familyId: previous.familyId,
      certFingerprint: previous.certFingerprint,
      parentTokenId: previous.id,
    });

    this.logger.info('Tokens refreshed', { subject: pair.subject, clientId: pair.clientId, family: pair.familyId });

    return pair;
  }

  /**
   * Revoke a token. Unknown tokens, and tokens owned by another client, are ignored.
   *
   * A refresh token takes its whole family with it; an access token only itself.
   */
  async revoke(token: string, clientId?: string): Promise<void> {
    const refreshToken = await this.refreshTokens.findByValue(token);
    if (refreshToken) {
      if (clientId !== undefined && refreshToken.clientId !== clientId) {
        return;
      }
      const revoked = await this.revokeFamily(refreshToken.familyId);
      this.logger.info('Token family revoked', {
        subject: refreshToken.subject,
        clientId: refreshToken.clientId,
        family: refreshToken.familyId,
        revoked,
      });
      return;
    }

    const verification = await verifyAccessToken(token, this.key, this.issuer);
    const jti = verification.valid
      ? verification.payload.jti
      : verification.reason === 'expired'
        ? verification.jti
        : undefined;
    if (!jti) {
      return;
    }

    const record = await this.accessTokens.findByJti(jti);
    if (!record || (clientId !== undefined && record.clientId !== clientId)) {
      return;
    }

    if (await this.accessTokens.revoke(jti)) {
      this.logger.info('Access token revoked', { subject: record.subject, clientId: record.clientId });
    }
  }

  /**
   * Render a pair as the token endpoint response
   */
  toTokenResponse(pair: TokenPair): TokenResponse {
    return {
      access_token: pair.accessToken,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: this.accessTokenTtl,
      refresh_token: pair.refreshToken,
      refresh_expires_in: this.refreshTokenTtl,
      subject: pair.subject,
      scope: pair.scope,
    };
  }

  private async revokeFamily(familyId: string): Promise<number> {
    const [refreshCount, accessCount] = await Promise.all([
      this.refreshTokens.revokeFamily(familyId),
      this.accessTokens.revokeFamily(familyId),
    ]);
    return refreshCount + accessCount;
  }

  private async issuePair(input: PairInput): Promise<TokenPair> {
    const now = Date.now();
    const iat = Math.floor(now / 1000);
    const accessExpiresAt = new Date((iat + this.accessTokenTtl) * 1000);
    const refreshExpiresAt = new Date((iat + this.refreshTokenTtl) * 1000);
    const jti = generateJti();

    const payload: AccessTokenPayload = {
      iss: this.issuer,
      sub: input.subject,
      aud: input.clientId,
      exp: iat + this.accessTokenTtl,
      iat,
      jti,
      client_id: input.clientId,
      scope: input.scope,
      fam: input.familyId,
    };

    if (input.certFingerprint) {
      payload.cnf = { 'x5t#S256': input.certFingerprint };
    }

    const accessToken = await signAccessToken(payload, this.key);

    await this.accessTokens.create({
      jti,
      familyId: input.familyId,
      clientId: input.clientId,
      subject: input.subject,
      scope: input.scope,
      certFingerprint: input.certFingerprint,
      expiresAt: accessExpiresAt,
    });

    const { token, value } = await this.refreshTokens.create({
      familyId: input.familyId,
      parentTokenId: input.parentTokenId,
      clientId: input.clientId,
      subject: input.subject,
      scope: input.scope,
      certFingerprint: input.certFingerprint,
      expiresAt: refreshExpiresAt,
    });

    if (input.parentTokenId) {
      await this.refreshTokens.linkSuccessor(input.parentTokenId, token.id);
    }

    return {
      accessToken,
      refreshToken: value,
      subject: input.subject,
      clientId: input.clientId,
      scope: input.scope,
      familyId: input.familyId,
      certFingerprint: input.certFingerprint,
      accessExpiresAt,
      refreshExpiresAt,
    };
  }
}
