/**
 * Roles known to the academic and cloud sites
 */
export const ROLES = ['student', 'teacher', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Identity handed to business handlers once a request is authenticated
 */
export interface AuthenticatedIdentity {
  subject: string;
  role: Role;
  scope: string;
}
