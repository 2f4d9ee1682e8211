/**
 * Services module exports
 */
export {
  MigrationService,
  writeFileAtomic,
  type MigrateOptions,
  type MigrationSummary,
} from './MigrationService.js';
