import { readSecret, readString, readInt, readBoolean, readLogLevel, type LogLevel } from '@campus-sso/shared';
import * as constants from './constants.js';

export { readSecret };

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    issuer: string;
    loginUrl: string;
    cookieSecure: boolean;
    allowRegistration: boolean;
    trustProxyCertHeaders: boolean;
  };
  secrets: {
    jwtSecret: string | undefined;
  };
  tls: {
    certFile: string | undefined;
    keyFile: string | undefined;
    caFile: string | undefined;
  };
  seedFile: string | undefined;
  logging: {
    level: LogLevel;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  defaults: {
    accessTokenTtl: number;
    refreshTokenTtl: number;
    authorizationCodeTtl: number;
    ssoSessionTtl: number;
    sweepIntervalMs: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 5000);

  return {
    server: {
      port,
      host: readString('HOST') ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      issuer: readString('ISSUER') ?? `https://auth.localhost:${port}`,
      loginUrl: readString('LOGIN_URL') ?? '/login',
      cookieSecure: readBoolean('COOKIE_SECURE', true),
      allowRegistration: readBoolean('ALLOW_REGISTRATION', true),
      trustProxyCertHeaders: readBoolean('TRUST_PROXY_CERT_HEADERS', true),
    },
    secrets: {
      jwtSecret: readSecret('JWT_SECRET'),
    },
    tls: {
      certFile: process.env['TLS_CERT_FILE'],
      keyFile: process.env['TLS_KEY_FILE'],
      caFile: process.env['TLS_CA_FILE'],
    },
    seedFile: process.env['SEED_FILE'],
    logging: {
      level: readLogLevel(),
    },
    rateLimit: {
      windowMs: readInt('RATE_LIMIT_WINDOW_MS', constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
      maxRequests: readInt('RATE_LIMIT_MAX_REQUESTS', constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
    },
    defaults: {
      accessTokenTtl: readInt('ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt('REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      authorizationCodeTtl: readInt('AUTHORIZATION_CODE_TTL', constants.DEFAULT_AUTHORIZATION_CODE_TTL),
      ssoSessionTtl: readInt('SSO_SESSION_TTL', constants.DEFAULT_SSO_SESSION_TTL),
      sweepIntervalMs: readInt('SWEEP_INTERVAL_MS', constants.DEFAULT_SWEEP_INTERVAL_MS),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
