/**
 * Zone Compiler
 * Turns registrar records into one Terraform document for Cloud DNS
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ConfigError } from '../core/errors.js';
import { compileOptionsSchema, type ResolvedCompileOptions } from '../config/schema.js';
import type {
  CompileOptions,
  CompileResult,
  CompiledResource,
  RawRecord,
  ZoneRecord,
} from '../types/index.js';
import { ingestRecord, type SkipReason } from './ingest.js';
import { groupRecords, keyId } from './group.js';
import { LabelAllocator, sanitizeName } from './hcl.js';
import { defaultManagedZoneName, renderDocument, renderRecordSet, zoneLabel, type RenderContext } from './render.js';

const SKIP_MESSAGES: Record<SkipReason, string> = {
  'unsupported-type': 'Skipping record of unsupported type',
  'apex-ns': 'Skipping apex NS record (Cloud DNS assigns its own name servers)',
  parked: 'Skipping parked-domain placeholder',
};

/**
 * Validate compile options and fill in defaults
 *
 * @throws ConfigError
 */
export function resolveCompileOptions(options: CompileOptions): ResolvedCompileOptions {
  const result = compileOptionsSchema.safeParse(options);
  if (!result.success) {
    throw ConfigError.fromZod('compile options', result.error);
  }
  return result.data;
}

export class ZoneCompiler {
  private logger: Logger;
  private readonly options: ResolvedCompileOptions;

  constructor(options: CompileOptions) {
    this.options = resolveCompileOptions(options);
    this.logger = createChildLogger({ service: 'ZoneCompiler', domain: this.options.domain });
  }

  get domain(): string {
    return this.options.domain;
  }

  /**
   * Compile registrar records into a Terraform document.
   * Throws on the first record that cannot be represented; nothing is returned partially.
   */
  compile(records: readonly RawRecord[]): CompileResult {
    const { domain, unsupportedTypes, keepApexNs, defaultTtl, labelCollisions } = this.options;

    const accepted: ZoneRecord[] = [];
    let skipped = 0;

    for (const raw of records) {
      const result = ingestRecord(raw, { domain, unsupportedTypes, keepApexNs });
      if (result.status === 'skipped') {
        skipped++;
        this.logger.warn({ type: raw.type, name: raw.name, data: raw.data }, SKIP_MESSAGES[result.reason]);
        continue;
      }
      accepted.push(result.record);
    }

    const { resources, duplicates, ttlConflicts } = groupRecords(accepted, domain, defaultTtl);

    for (const conflict of ttlConflicts) {
      this.logger.warn(
        { type: conflict.key.type, name: conflict.key.name, ttl: conflict.kept, ignored: conflict.ignored },
        'Records in one set have different TTLs; keeping the first'
      );
    }

    if (duplicates > 0) {
      this.logger.debug({ count: duplicates }, 'Dropped duplicate record values');
    }

    const context: RenderContext = {
      domain,
      zoneMode: this.options.zoneMode,
      zoneLabel: zoneLabel(domain),
      managedZoneName: this.options.managedZoneName ?? defaultManagedZoneName(domain),
      useZoneReference: this.options.useZoneReference,
    };

    const labels = new LabelAllocator(domain, labelCollisions);
    const compiled: CompiledResource[] = resources.map((resource) => {
      const base = `${sanitizeName(resource.relativeName)}_${resource.key.type.toLowerCase()}`;
      const label = labels.allocate(base, keyId(resource.key));
      if (label !== base) {
        this.logger.debug({ name: resource.key.name, label }, 'Resource label disambiguated');
      }
      return { ...resource, label };
    });

    const document = renderDocument(
      context,
      compiled.map((resource) => renderRecordSet(resource, resource.label, context))
    );

    const stats = {
      records: records.length,
      resources: compiled.length,
      skipped,
      duplicates,
    };

    this.logger.info(stats, 'Zone compiled');

    return { domain, resources: compiled, document, stats };
  }
}

/**
 * Compile records in one call
 */
export function compileZone(records: readonly RawRecord[], options: CompileOptions): CompileResult {
  return new ZoneCompiler(options).compile(records);
}
