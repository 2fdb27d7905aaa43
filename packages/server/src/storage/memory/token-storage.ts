import { generateId, generateRefreshToken, hashToken } from '@campus-sso/shared';
import type {
  AccessTokenRecord,
  CreateAccessTokenInput,
  RefreshToken,
  CreateRefreshTokenInput,
  RefreshRotation,
} from '../../types/token.js';
import type { IAccessTokenStorage, IRefreshTokenStorage } from '../interfaces/token-storage.js';
import { REFRESH_TOKEN_LENGTH } from '../../config/constants.js';

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  let ids = index.get(key);
  if (!ids) {
    ids = new Set();
    index.set(key, ids);
  }
  ids.add(id);
}

/**
 * Drop an id from its family; returns true when the family has no records left
 */
function removeFromIndex(index: Map<string, Set<string>>, key: string, id: string): boolean {
  const ids = index.get(key);
  if (!ids) return true;
  ids.delete(id);
  if (ids.size > 0) return false;
  index.delete(key);
  return true;
}

/**
 * In-memory access token record storage implementation
 */
export class MemoryAccessTokenStorage implements IAccessTokenStorage {
  private tokens = new Map<string, AccessTokenRecord>(); // jti -> record
  private familyIndex = new Map<string, Set<string>>(); // familyId -> Set<jti>
  private revokedFamilies = new Set<string>();

  async create(input: CreateAccessTokenInput): Promise<AccessTokenRecord> {
    const now = new Date();

    // A family revoked while this token was being minted stays revoked
    const record: AccessTokenRecord = this.revokedFamilies.has(input.familyId)
      ? { ...input, status: 'revoked', revokedAt: now, issuedAt: now }
      : { ...input, status: 'active', issuedAt: now };

    this.tokens.set(record.jti, record);
    addToIndex(this.familyIndex, record.familyId, record.jti);

    return record;
  }

  async findByJti(jti: string): Promise<AccessTokenRecord | null> {
    return this.tokens.get(jti) ?? null;
  }

  async revoke(jti: string): Promise<boolean> {
    const token = this.tokens.get(jti);
    if (!token || token.status === 'revoked') {
      return false;
    }

    this.tokens.set(jti, { ...token, status: 'revoked', revokedAt: new Date() });
    return true;
  }

  async revokeFamily(familyId: string): Promise<number> {
    this.revokedFamilies.add(familyId);

    const jtis = this.familyIndex.get(familyId);
    if (!jtis) return 0;

    let count = 0;
    const now = new Date();
    for (const jti of jtis) {
      const token = this.tokens.get(jti);
      if (token && token.status !== 'revoked') {
        this.tokens.set(jti, { ...token, status: 'revoked', revokedAt: now });
        count++;
      }
    }
    return count;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [jti, token] of this.tokens) {
      if (token.expiresAt <= now) {
        if (removeFromIndex(this.familyIndex, token.familyId, jti)) {
          this.revokedFamilies.delete(token.familyId);
        }
        this.tokens.delete(jti);
        deleted++;
      }
    }

    return deleted;
  }
}

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // hash -> id
  private familyIndex = new Map<string, Set<string>>(); // familyId -> Set<id>
  private revokedFamilies = new Set<string>();

  async create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }> {
    const id = generateId();
    const tokenValue = generateRefreshToken(REFRESH_TOKEN_LENGTH);
    const tokenHash = hashToken(tokenValue);
    const now = new Date();

    const base = {
      id,
      tokenHash,
      familyId: input.familyId,
      parentTokenId: input.parentTokenId,
      clientId: input.clientId,
      subject: input.subject,
      scope: input.scope,
      certFingerprint: input.certFingerprint,
      issuedAt: now,
      expiresAt: input.expiresAt,
    };

    // A family revoked while this token was being minted stays revoked
    const token: RefreshToken = this.revokedFamilies.has(input.familyId)
      ? { ...base, status: 'revoked', revokedAt: now }
      : { ...base, status: 'active' };

    this.tokens.set(id, token);
    this.hashIndex.set(tokenHash, id);
    addToIndex(this.familyIndex, input.familyId, id);

    return { token, value: tokenValue };
  }

  async findByValue(tokenValue: string): Promise<RefreshToken | null> {
    const id = this.hashIndex.get(hashToken(tokenValue));
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async rotate(tokenValue: string, now: Date): Promise<RefreshRotation> {
    const id = this.hashIndex.get(hashToken(tokenValue));
    const token = id ? this.tokens.get(id) : undefined;

    if (!token) {
      return { outcome: 'unknown' };
    }

    switch (token.status) {
      case 'revoked':
        return { outcome: 'revoked', token };
      case 'rotated':
        return { outcome: 'replayed', token };
      case 'active':
        break;
    }

    if (token.expiresAt <= now) {
      return { outcome: 'expired', token };
    }

    // Check-and-set with no await in between
    const rotated: RefreshToken = { ...token, status: 'rotated', rotatedAt: now };
    this.tokens.set(token.id, rotated);

    return { outcome: 'rotated', token: rotated };
  }

  async linkSuccessor(id: string, successorId: string): Promise<void> {
    const token = this.tokens.get(id);
    if (token?.status === 'rotated') {
      this.tokens.set(id, { ...token, successorId });
    }
  }

  async revokeFamily(familyId: string): Promise<number> {
    this.revokedFamilies.add(familyId);

    const ids = this.familyIndex.get(familyId);
    if (!ids) return 0;

    let count = 0;
    const now = new Date();
    for (const id of ids) {
      const token = this.tokens.get(id);
      if (token && token.status !== 'revoked') {
        this.tokens.set(id, { ...token, status: 'revoked', revokedAt: now });
        count++;
      }
    }
    return count;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (token.expiresAt <= now) {
        this.hashIndex.delete(token.tokenHash);
        if (removeFromIndex(this.familyIndex, token.familyId, id)) {
          this.revokedFamilies.delete(token.familyId);
        }
        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
