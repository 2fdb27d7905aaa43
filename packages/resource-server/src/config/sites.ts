/**
 * The two resource servers and their defaults
 */
export const SITES = ['academic', 'cloud'] as const;

export type SiteName = (typeof SITES)[number];

export function isSiteName(value: unknown): value is SiteName {
  return SITES.some((site) => site === value);
}

export interface SiteDefaults {
  port: number;
  clientId: string;
  scope: string;
  cookieName: string;
}

export const SITE_DEFAULTS: Record<SiteName, SiteDefaults> = {
  academic: {
    port: 5001,
    clientId: 'academic-api',
    scope: 'profile courses.read grades.read',
    cookieName: 'academic_session',
  },
  cloud: {
    port: 5002,
    clientId: 'cloud-api',
    scope: 'profile files.read files.write',
    cookieName: 'cloud_session',
  },
};

export const DEFAULT_IDP_URL = 'https://auth.localhost:5000';
export const DEFAULT_BACKCHANNEL_TIMEOUT_MS = 3000;
export const DEFAULT_LOGIN_STATE_TTL = 600; // 10 minutes
export const DEFAULT_SWEEP_INTERVAL_MS = 60000;

export const SESSION_ID_LENGTH = 32; // bytes
export const STATE_LENGTH = 24; // bytes

export const CALLBACK_PATH = '/session/callback';
export const LOGIN_PATH = '/session/login';
export const LOGIN_FAILED_LOCATION = '/?login_error=1';
