/**
 * Record Source Factory
 * Creates registrar sources based on configuration
 */
import { logger } from '../core/Logger.js';
import { RecordSource } from './base/RecordSource.js';
import { GoDaddyProvider } from './godaddy/index.js';
import type { ConfigManager } from '../config/ConfigManager.js';
import type { GoDaddyConfig, GoDaddyCredentials } from '../config/schema.js';

export type SourceType = 'godaddy';

export type CreateSourceOptions = {
  type: 'godaddy';
  credentials: GoDaddyCredentials;
  settings?: Partial<GoDaddyConfig>;
};

/**
 * Create a record source instance
 */
export function createRecordSource(options: CreateSourceOptions): RecordSource {
  logger.debug({ type: options.type }, 'Creating record source');

  switch (options.type) {
    case 'godaddy':
      return new GoDaddyProvider(options.credentials, options.settings);
  }
}

/**
 * Create the record source described by the environment
 */
export function createRecordSourceFromConfig(config: ConfigManager): RecordSource {
  return createRecordSource({
    type: 'godaddy',
    credentials: config.getGoDaddyCredentials(),
    settings: config.godaddy,
  });
}
