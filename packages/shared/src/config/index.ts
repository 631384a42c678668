/**
 * Application configuration with environment variable support
 */

import { getDefaultDbPath } from '../utils/data-paths';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  staticDir?: string;
}

export interface DatabaseConfig {
  path: string;
}

export interface BrokerCredentials {
  apiKey: string;
  clientCode: string;
  password: string;
  totpSecret: string;
}

export interface BrokerConfig {
  baseUrl: string;
  timeoutMs: number;
  /** null when any credential is missing; the terminal then runs on mock data */
  credentials: BrokerCredentials | null;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  broker: BrokerConfig;
  isProduction: boolean;
  isTest: boolean;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_BROKER_BASE_URL = 'https://apiconnect.angelone.in';
export const DEFAULT_BROKER_TIMEOUT_MS = 5000;

/**
 * Parse numeric environment variable with fallback
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read broker credentials; all four must be present
 */
export function parseBrokerCredentials(env: NodeJS.ProcessEnv): BrokerCredentials | null {
  const apiKey = nonEmpty(env.SMARTAPI_API_KEY);
  const clientCode = nonEmpty(env.SMARTAPI_CLIENT_CODE);
  const password = nonEmpty(env.SMARTAPI_PASSWORD);
  const totpSecret = nonEmpty(env.SMARTAPI_TOTP_SECRET);

  if (!apiKey || !clientCode || !password || !totpSecret) {
    return null;
  }
  return { apiKey, clientCode, password, totpSecret };
}

/**
 * Load configuration from environment variables with defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: {
      port: parseNumber(env.PORT, DEFAULT_PORT),
      corsOrigin: nonEmpty(env.CORS_ORIGIN) ?? '*',
      staticDir: nonEmpty(env.STATIC_DIR),
    },
    database: {
      path: nonEmpty(env.MARKET_TERMINAL_DB_PATH) ?? getDefaultDbPath(env),
    },
    broker: {
      baseUrl: nonEmpty(env.SMARTAPI_BASE_URL) ?? DEFAULT_BROKER_BASE_URL,
      timeoutMs: parseNumber(env.SMARTAPI_TIMEOUT_MS, DEFAULT_BROKER_TIMEOUT_MS),
      credentials: parseBrokerCredentials(env),
    },
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  };
}

let configInstance: AppConfig | null = null;

/**
 * Get application configuration (loaded once per process)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
