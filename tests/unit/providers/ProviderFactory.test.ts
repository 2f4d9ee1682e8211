/**
 * Record source factory unit tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  GoDaddyProvider,
  createRecordSource,
  createRecordSourceFromConfig,
} from '../../../src/providers/index.js';
import { ConfigManager } from '../../../src/config/ConfigManager.js';
import { ConfigError } from '../../../src/core/errors.js';

const ENV_KEYS = ['GODADDY_API_KEY', 'GODADDY_API_SECRET', 'GODADDY_CREDENTIALS_FILE', 'GODADDY_API_URL'] as const;

describe('ProviderFactory', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should create a GoDaddy source', () => {
    const source = createRecordSource({
      type: 'godaddy',
      credentials: { apiKey: 'test-key', apiSecret: 'test-secret' },
      settings: { baseUrl: 'https://api.ote-godaddy.com' },
    });

    expect(source).toBeInstanceOf(GoDaddyProvider);
    expect(source.getInfo().baseUrl).toBe('https://api.ote-godaddy.com');
  });

  it('should build the source from the environment', () => {
    process.env.GODADDY_API_KEY = 'test-key';
    process.env.GODADDY_API_SECRET = 'test-secret';
    process.env.GODADDY_API_URL = 'https://api.ote-godaddy.com';

    const source = createRecordSourceFromConfig(new ConfigManager());

    expect(source.getProviderName()).toBe('GoDaddy');
    expect(source.getInfo().baseUrl).toBe('https://api.ote-godaddy.com');
  });

  it('should refuse to build a source without credentials', () => {
    expect(() => createRecordSourceFromConfig(new ConfigManager())).toThrow(ConfigError);
  });
});
