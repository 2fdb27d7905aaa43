import { generateId, generateAuthorizationCode, hashToken } from '@campus-sso/shared';
import type {
  AuthorizationCode,
  CodeConsumption,
  ConsumedAuthorizationCode,
  CreateAuthorizationCodeInput,
} from '../../types/token.js';
import type { IAuthorizationCodeStorage } from '../interfaces/authorization-code-storage.js';
import { AUTHORIZATION_CODE_LENGTH } from '../../config/constants.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private codes = new Map<string, AuthorizationCode>(); // hash -> code

  async create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }> {
    const codeValue = generateAuthorizationCode(AUTHORIZATION_CODE_LENGTH);
    const codeHash = hashToken(codeValue);

    const code: AuthorizationCode = {
      status: 'pending',
      id: generateId(),
      codeHash,
      clientId: input.clientId,
      redirectUri: input.redirectUri,
      subject: input.subject,
      scope: input.scope,
      certFingerprint: input.certFingerprint,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
    };

    this.codes.set(codeHash, code);

    return { code, value: codeValue };
  }

  async findByValue(codeValue: string): Promise<AuthorizationCode | null> {
    return this.codes.get(hashToken(codeValue)) ?? null;
  }

  async consume(codeValue: string, now: Date): Promise<CodeConsumption> {
    const codeHash = hashToken(codeValue);
    const code = this.codes.get(codeHash);

    if (!code) {
      return { outcome: 'unknown' };
    }

    if (code.status === 'consumed') {
      return { outcome: 'already_consumed', code };
    }

    if (code.expiresAt <= now) {
      return { outcome: 'expired', code };
    }

    // Check-and-set with no await in between
    const consumed: ConsumedAuthorizationCode = { ...code, status: 'consumed', consumedAt: now };
    this.codes.set(codeHash, consumed);

    return { outcome: 'consumed', code: consumed };
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [codeHash, code] of this.codes) {
      if (code.expiresAt <= now) {
        this.codes.delete(codeHash);
        deleted++;
      }
    }

    return deleted;
  }
}
