/**
 * Base provider exports
 */
export { RecordSource, type SourceInfo } from './RecordSource.js';
