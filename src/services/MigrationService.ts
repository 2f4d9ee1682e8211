/**
 * Migration Service
 * Fetches a domain's records, compiles them and writes the Terraform file
 */
import { rename, rm, writeFile } from 'fs/promises';
import { dirname, basename, join } from 'path';
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { ZoneCompiler } from '../compiler/index.js';
import type { RecordSource } from '../providers/index.js';
import type { CompileOptions, CompileStats } from '../types/index.js';

export interface MigrateOptions extends CompileOptions {
  /** Path of the Terraform file to write */
  output: string;
}

export interface MigrationSummary {
  domain: string;
  output: string;
  stats: CompileStats;
}

/**
 * Write through a temporary sibling file so readers never see a partial document
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const temp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await writeFile(temp, content, 'utf-8');
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

export class MigrationService {
  private logger: Logger;

  constructor(private readonly source: RecordSource) {
    this.logger = createChildLogger({ service: 'Migration' });
  }

  /**
   * Run one migration. Any fetch or compile error propagates before the output is touched.
   */
  async migrate(options: MigrateOptions): Promise<MigrationSummary> {
    const { output, ...compileOptions } = options;

    // Options are validated before anything goes over the network
    const compiler = new ZoneCompiler(compileOptions);
    const domain = compiler.domain;

    this.logger.info({ domain, source: this.source.getProviderName() }, `${symbols.dns} Migrating DNS zone`);

    const records = await this.source.fetchRecords(domain);
    const result = compiler.compile(records);

    await writeFileAtomic(output, result.document);

    this.logger.info({ domain, count: result.stats.resources, output }, `${symbols.file} Wrote Terraform configuration`);

    return { domain, output, stats: result.stats };
  }

  async listDomains(): Promise<string[]> {
    return this.source.listDomains();
  }
}
