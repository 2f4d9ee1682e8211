/**
 * Providers module exports
 */
export { RecordSource, type SourceInfo } from './base/index.js';
export { GoDaddyProvider, type GoDaddyProviderOptions } from './godaddy/index.js';
export {
  createRecordSource,
  createRecordSourceFromConfig,
  type SourceType,
} from './ProviderFactory.js';
