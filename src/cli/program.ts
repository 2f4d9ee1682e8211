/**
 * zone-migrate command line
 */
import { Command, CommanderError, Option } from 'commander';
import { logger, setLogLevel, isLogLevel } from '../core/Logger.js';
import { getConfig, type ConfigManager } from '../config/ConfigManager.js';
import { createRecordSourceFromConfig, type RecordSource } from '../providers/index.js';
import { MigrationService } from '../services/index.js';
import type { LabelCollisionPolicy, UnsupportedTypePolicy, ZoneMode } from '../types/index.js';

export interface CliDependencies {
  loadConfig: () => ConfigManager;
  createSource: (config: ConfigManager) => RecordSource;
  /** Where command output goes (not logs) */
  print: (line: string) => void;
  /** Where the one-line error summary goes */
  printError: (line: string) => void;
}

interface MigrateCommandOptions {
  output?: string;
  zoneMode: ZoneMode;
  managedZone?: string;
  useZoneReference?: boolean;
  keepApexNs?: boolean;
  onUnsupported: UnsupportedTypePolicy;
  onLabelCollision: LabelCollisionPolicy;
  defaultTtl?: number;
  logLevel?: string;
}

const defaultDependencies: CliDependencies = {
  loadConfig: getConfig,
  createSource: createRecordSourceFromConfig,
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
};

function parseInteger(value: string): number {
  return Number(value);
}

/**
 * One-line summary for the error stream: `<ErrorKind>: <message>`
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();

  program
    .name('zone-migrate')
    .description('Migrate a registrar DNS zone into Terraform configuration for Google Cloud DNS')
    .exitOverride();

  program
    .command('migrate')
    .description('Fetch every DNS record of a domain and write a Terraform file')
    .argument('<domain>', 'domain to migrate (e.g. example.com)')
    .option('-o, --output <file>', 'Terraform file to write (default: $OUTPUT_FILE or migrated.tf)')
    .addOption(
      new Option('--zone-mode <mode>', 'declare the managed zone, or reference an existing one')
        .choices(['create', 'existing'])
        .default('create')
    )
    .option('--managed-zone <name>', 'Cloud DNS managed zone name (default: derived from the domain)')
    .option('--use-zone-reference', 'render record names relative to the zone dns_name')
    .option('--keep-apex-ns', 'keep NS records at the zone apex')
    .addOption(
      new Option('--on-unsupported <policy>', 'what to do with record types that cannot be migrated')
        .choices(['skip', 'fail'])
        .default('skip')
    )
    .addOption(
      new Option('--on-label-collision <policy>', 'what to do when two record sets map to one resource label')
        .choices(['suffix', 'fail'])
        .default('suffix')
    )
    .option('--default-ttl <seconds>', 'TTL for record sets the registrar gives none', parseInteger)
    .addOption(
      new Option('--log-level <level>', 'log level').choices(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    )
    .action(async (domain: string, opts: MigrateCommandOptions) => {
      const config = deps.loadConfig();
      if (opts.logLevel && isLogLevel(opts.logLevel)) {
        setLogLevel(opts.logLevel);
      }

      const service = new MigrationService(deps.createSource(config));
      const summary = await service.migrate({
        domain,
        output: opts.output ?? config.app.outputFile,
        zoneMode: opts.zoneMode,
        managedZoneName: opts.managedZone,
        useZoneReference: opts.useZoneReference ?? false,
        keepApexNs: opts.keepApexNs ?? false,
        unsupportedTypes: opts.onUnsupported,
        labelCollisions: opts.onLabelCollision,
        defaultTtl: opts.defaultTtl,
      });

      deps.print(`${summary.output}: ${summary.stats.resources} record sets for ${summary.domain}`);
    });

  program
    .command('domains')
    .description('List the domains the API credentials can read')
    .action(async () => {
      const config = deps.loadConfig();
      const service = new MigrationService(deps.createSource(config));
      for (const domain of await service.listDomains()) {
        deps.print(domain);
      }
    });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function run(argv: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const printError = overrides.printError ?? defaultDependencies.printError;
  const program = createProgram(overrides);

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error) {
    // Commander has already printed usage errors and help
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.debug({ error }, 'Command failed');
    printError(formatError(error));
    return 1;
  }
}
