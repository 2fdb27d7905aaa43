import { OAuthError, hashSecret, verifySecret, normalizeFingerprint } from '@campus-sso/shared';
import type { User, CreateUserInput } from '../../types/user.js';
import type { IUserStorage } from '../interfaces/user-storage.js';

/**
 * In-memory credential store
 */
export class MemoryUserStorage implements IUserStorage {
  private users = new Map<string, User>(); // subject -> user

  async create(input: CreateUserInput): Promise<User> {
    if (this.users.has(input.username)) {
      throw OAuthError.userExists();
    }

    const passwordHash = await hashSecret(input.password);

    // Re-check: another registration may have landed while hashing
    if (this.users.has(input.username)) {
      throw OAuthError.userExists();
    }

    const now = new Date();
    const user: User = {
      subject: input.username,
      username: input.username,
      passwordHash,
      role: input.role,
      certFingerprint: normalizeFingerprint(input.certFingerprint) ?? undefined,
      createdAt: now,
      updatedAt: now,
    };

    this.users.set(user.subject, user);
    return user;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.users.get(username) ?? null;
  }

  async findBySubject(subject: string): Promise<User | null> {
    return this.users.get(subject) ?? null;
  }

  async verifyPassword(username: string, password: string): Promise<User | null> {
    const user = this.users.get(username);
    if (!user) return null;

    const valid = await verifySecret(password, user.passwordHash);
    return valid ? user : null;
  }

  async updatePassword(subject: string, password: string): Promise<User | null> {
    const passwordHash = await hashSecret(password);
    const user = this.users.get(subject);
    if (!user) return null;

    const updated: User = { ...user, passwordHash, updatedAt: new Date() };
    this.users.set(subject, updated);
    return updated;
  }

  async bindFingerprint(subject: string, certFingerprint: string | null): Promise<User | null> {
    const user = this.users.get(subject);
    if (!user) return null;

    const updated: User = {
      ...user,
      certFingerprint: normalizeFingerprint(certFingerprint) ?? undefined,
      updatedAt: new Date(),
    };
    this.users.set(subject, updated);
    return updated;
  }
}
