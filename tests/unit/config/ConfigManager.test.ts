/**
 * ConfigManager unit tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigManager, getConfig, resetConfig } from '../../../src/config/ConfigManager.js';
import { ConfigError } from '../../../src/core/errors.js';

const ENV_KEYS = [
  'GODADDY_API_KEY',
  'GODADDY_API_SECRET',
  'GODADDY_CREDENTIALS_FILE',
  'GODADDY_API_URL',
  'GODADDY_PAGE_SIZE',
  'OUTPUT_FILE',
  'LOG_LEVEL',
  'LOG_PRETTY',
] as const;

describe('ConfigManager', () => {
  const saved = new Map<string, string | undefined>();
  let dir: string;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    process.env.LOG_LEVEL = 'silent';
    dir = mkdtempSync(join(tmpdir(), 'zone-migrate-config-'));
    resetConfig();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(dir, { recursive: true, force: true });
    resetConfig();
  });

  it('should apply defaults', () => {
    const config = new ConfigManager();

    expect(config.app).toEqual({ logLevel: 'silent', logPretty: true, outputFile: 'migrated.tf' });
    expect(config.godaddy).toEqual({ baseUrl: 'https://api.godaddy.com', pageSize: 500 });
  });

  it('should read settings from the environment', () => {
    process.env.OUTPUT_FILE = 'dns.tf';
    process.env.LOG_PRETTY = 'false';
    process.env.GODADDY_API_URL = 'https://api.ote-godaddy.com';
    process.env.GODADDY_PAGE_SIZE = '100';

    const config = new ConfigManager();

    expect(config.app.outputFile).toBe('dns.tf');
    expect(config.app.logPretty).toBe(false);
    expect(config.godaddy).toEqual({ baseUrl: 'https://api.ote-godaddy.com', pageSize: 100 });
  });

  it('should reject an invalid API URL', () => {
    process.env.GODADDY_API_URL = 'not a url';

    expect(() => new ConfigManager()).toThrow(ConfigError);
    expect(() => new ConfigManager()).toThrow(/^Invalid GoDaddy settings: baseUrl: /);
  });

  it('should reject an unknown log level', () => {
    process.env.LOG_LEVEL = 'loud';

    expect(() => new ConfigManager()).toThrow(/^Invalid environment: logLevel: /);
  });

  describe('getGoDaddyCredentials', () => {
    it('should read credentials from the environment', () => {
      process.env.GODADDY_API_KEY = 'test-key';
      process.env.GODADDY_API_SECRET = 'test-secret';

      expect(new ConfigManager().getGoDaddyCredentials()).toEqual({ apiKey: 'test-key', apiSecret: 'test-secret' });
    });

    it('should name every missing credential', () => {
      const config = new ConfigManager();

      expect(() => config.getGoDaddyCredentials()).toThrow(
        'Invalid GoDaddy credentials from GODADDY_API_KEY/GODADDY_API_SECRET: apiKey: Required; apiSecret: Required'
      );
    });

    it('should prefer the credentials file', () => {
      const file = join(dir, 'godaddy.json');
      writeFileSync(file, JSON.stringify({ apiKey: 'file-key', apiSecret: 'file-secret' }));
      process.env.GODADDY_CREDENTIALS_FILE = file;
      process.env.GODADDY_API_KEY = 'test-key';
      process.env.GODADDY_API_SECRET = 'test-secret';

      expect(new ConfigManager().getGoDaddyCredentials()).toEqual({ apiKey: 'file-key', apiSecret: 'file-secret' });
    });

    it('should fail on a missing credentials file', () => {
      const file = join(dir, 'missing.json');
      process.env.GODADDY_CREDENTIALS_FILE = file;

      expect(() => new ConfigManager().getGoDaddyCredentials()).toThrow(`Cannot find credentials file ${file}`);
    });

    it('should fail on a credentials file that is not JSON', () => {
      const file = join(dir, 'broken.json');
      writeFileSync(file, 'apiKey=test-key');
      process.env.GODADDY_CREDENTIALS_FILE = file;

      expect(() => new ConfigManager().getGoDaddyCredentials()).toThrow(`Credentials file ${file} is not valid JSON`);
    });
  });

  describe('getConfig', () => {
    it('should return one instance until reset', () => {
      const first = getConfig();

      expect(getConfig()).toBe(first);
      resetConfig();
      expect(getConfig()).not.toBe(first);
    });
  });
});
