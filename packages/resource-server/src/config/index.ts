import { readSecret, readString, readInt, readBoolean, readLogLevel, type LogLevel } from '@campus-sso/shared';
import {
  SITE_DEFAULTS,
  isSiteName,
  DEFAULT_IDP_URL,
  DEFAULT_BACKCHANNEL_TIMEOUT_MS,
  DEFAULT_LOGIN_STATE_TTL,
  DEFAULT_SWEEP_INTERVAL_MS,
  CALLBACK_PATH,
  type SiteName,
} from './sites.js';

export * from './sites.js';

/**
 * Resource server configuration loaded from environment
 */
export interface ResourceServerConfig {
  site: SiteName;
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    publicUrl: string;
    cookieName: string;
    cookieSecure: boolean;
    trustProxyCertHeaders: boolean;
  };
  idp: {
    /** Back-channel base URL */
    url: string;
    /** Base URL browsers are sent to */
    publicUrl: string;
    timeoutMs: number;
    caFile: string | undefined;
  };
  client: {
    clientId: string;
    clientSecret: string | undefined;
    redirectUri: string;
    scope: string;
  };
  tls: {
    certFile: string | undefined;
    keyFile: string | undefined;
    caFile: string | undefined;
  };
  logging: {
    level: LogLevel;
  };
  defaults: {
    loginStateTtl: number;
    sweepIntervalMs: number;
  };
}

/**
 * Load configuration for the site named by `SITE`
 */
export function loadConfig(): ResourceServerConfig {
  const siteName = readString('SITE') ?? 'academic';
  if (!isSiteName(siteName)) {
    throw new Error(`SITE must be "academic" or "cloud", got "${siteName}"`);
  }

  const defaults = SITE_DEFAULTS[siteName];
  const port = readInt('PORT', defaults.port);
  const publicUrl = (readString('PUBLIC_URL') ?? `https://${siteName}.localhost:${port}`).replace(/\/+$/, '');
  const idpUrl = (readString('IDP_URL') ?? DEFAULT_IDP_URL).replace(/\/+$/, '');

  return {
    site: siteName,
    server: {
      port,
      host: readString('HOST') ?? '0.0.0.0',
      nodeEnv: readString('NODE_ENV') ?? 'development',
      publicUrl,
      cookieName: readString('COOKIE_NAME') ?? defaults.cookieName,
      cookieSecure: readBoolean('COOKIE_SECURE', true),
      trustProxyCertHeaders: readBoolean('TRUST_PROXY_CERT_HEADERS', true),
    },
    idp: {
      url: idpUrl,
      publicUrl: (readString('IDP_PUBLIC_URL') ?? idpUrl).replace(/\/+$/, ''),
      timeoutMs: readInt('BACKCHANNEL_TIMEOUT_MS', DEFAULT_BACKCHANNEL_TIMEOUT_MS),
      // The project CA signs the identity provider's certificate too
      caFile: readString('IDP_CA_FILE') ?? readString('TLS_CA_FILE'),
    },
    client: {
      clientId: readString('CLIENT_ID') ?? defaults.clientId,
      // Same variable the identity provider seeds this client from
      clientSecret: readSecret('CLIENT_SECRET') ?? readSecret(`${siteName.toUpperCase()}_CLIENT_SECRET`),
      redirectUri: `${publicUrl}${CALLBACK_PATH}`,
      scope: readString('SCOPE') ?? defaults.scope,
    },
    tls: {
      certFile: readString('TLS_CERT_FILE'),
      keyFile: readString('TLS_KEY_FILE'),
      caFile: readString('TLS_CA_FILE'),
    },
    logging: {
      level: readLogLevel(),
    },
    defaults: {
      loginStateTtl: readInt('LOGIN_STATE_TTL', DEFAULT_LOGIN_STATE_TTL),
      sweepIntervalMs: readInt('SWEEP_INTERVAL_MS', DEFAULT_SWEEP_INTERVAL_MS),
    },
  };
}

// Singleton config instance
let config: ResourceServerConfig | null = null;

export function getConfig(): ResourceServerConfig {
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
