import type { Role } from '@campus-sso/shared';

/**
 * A registered person; the subject id is the username
 */
export interface User {
  subject: string;
  username: string;
  passwordHash: string;
  role: Role;
  certFingerprint?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  username: string;
  password: string;
  role: Role;
  certFingerprint?: string;
}
