/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import { readFileSync, existsSync } from 'fs';
import { logger, setLogLevel } from '../core/Logger.js';
import { ConfigError } from '../core/errors.js';
import {
  appConfigSchema,
  godaddyConfigSchema,
  godaddyCredentialsSchema,
  type AppConfig,
  type GoDaddyConfig,
  type GoDaddyCredentials,
} from './schema.js';

/**
 * Read environment variable with optional default
 */
function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

/**
 * Read environment variable as integer
 */
function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Read environment variable as boolean
 */
function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Read secret from file (Docker secrets support) or environment
 */
function getSecret(key: string): string | undefined {
  const secretPath = `/run/secrets/${key.toLowerCase()}`;
  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      logger.warn({ key, error }, 'Failed to read Docker secret');
    }
  }

  return process.env[key];
}

/**
 * Load credentials from a JSON file: { "apiKey": "...", "apiSecret": "..." }
 */
function readCredentialsFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError(`Cannot find credentials file ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Credentials file ${path} is not valid JSON`, { cause: error });
  }
}

export class ConfigManager {
  private _app: AppConfig;
  private _godaddy: GoDaddyConfig;

  constructor() {
    const app = appConfigSchema.safeParse({
      logLevel: getEnv('LOG_LEVEL', 'info')?.toLowerCase(),
      logPretty: getEnvBool('LOG_PRETTY', true),
      outputFile: getEnv('OUTPUT_FILE', 'migrated.tf'),
    });
    if (!app.success) {
      throw ConfigError.fromZod('environment', app.error);
    }
    this._app = app.data;

    const godaddy = godaddyConfigSchema.safeParse({
      baseUrl: getEnv('GODADDY_API_URL', 'https://api.godaddy.com'),
      pageSize: getEnvInt('GODADDY_PAGE_SIZE', 500),
    });
    if (!godaddy.success) {
      throw ConfigError.fromZod('GoDaddy settings', godaddy.error);
    }
    this._godaddy = godaddy.data;

    setLogLevel(this._app.logLevel);

    logger.debug({
      logLevel: this._app.logLevel,
      baseUrl: this._godaddy.baseUrl,
    }, 'Configuration loaded');
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get godaddy(): Readonly<GoDaddyConfig> {
    return this._godaddy;
  }

  /**
   * Resolve GoDaddy credentials, from GODADDY_CREDENTIALS_FILE when set,
   * otherwise from GODADDY_API_KEY / GODADDY_API_SECRET
   */
  getGoDaddyCredentials(): GoDaddyCredentials {
    const file = getEnv('GODADDY_CREDENTIALS_FILE');
    const raw = file
      ? readCredentialsFile(file)
      : { apiKey: getSecret('GODADDY_API_KEY'), apiSecret: getSecret('GODADDY_API_SECRET') };

    const result = godaddyCredentialsSchema.safeParse(raw);
    if (!result.success) {
      const source = file ?? 'GODADDY_API_KEY/GODADDY_API_SECRET';
      throw ConfigError.fromZod(`GoDaddy credentials from ${source}`, result.error);
    }
    return result.data;
  }
}

let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
