/**
 * Zod schemas for configuration and registrar payload validation
 */
import { z } from 'zod';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const unsupportedTypePolicySchema = z.enum(['skip', 'fail']);

export const labelCollisionPolicySchema = z.enum(['suffix', 'fail']);

// create: declare the managed zone; existing: look up an externally managed zone
export const zoneModeSchema = z.enum(['create', 'existing']);

// Hostname without trailing dot, at least two labels
export const domainSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => value.replace(/\.$/, ''))
  .pipe(
    z
      .string()
      .regex(/^(?=.{1,253}$)([a-z0-9_]([a-z0-9_-]{0,61}[a-z0-9_])?\.)+[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/, {
        message: 'Invalid domain name',
      })
  );

// Cloud DNS managed zone names: lowercase letters, digits and dashes, starting with a letter
export const managedZoneNameSchema = z
  .string()
  .regex(/^[a-z]([a-z0-9-]{0,61}[a-z0-9])?$/, { message: 'Invalid managed zone name' });

export const ttlSchema = z.coerce.number().int().min(0).max(2147483647);

// Base application config schema
export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  logPretty: z.boolean().default(true),
  outputFile: z.string().min(1).default('migrated.tf'),
});

// GoDaddy API credentials
export const godaddyCredentialsSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
});

export const godaddyConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.godaddy.com'),
  pageSize: z.coerce.number().int().min(1).max(1000).default(500),
});

// Compiler options as accepted from the command line
export const compileOptionsSchema = z.object({
  domain: domainSchema,
  defaultTtl: ttlSchema.default(3600),
  unsupportedTypes: unsupportedTypePolicySchema.default('skip'),
  labelCollisions: labelCollisionPolicySchema.default('suffix'),
  keepApexNs: z.boolean().default(false),
  zoneMode: zoneModeSchema.default('create'),
  managedZoneName: managedZoneNameSchema.optional(),
  useZoneReference: z.boolean().default(false),
});

// Record entry as returned by GET /v1/domains/{domain}/records
export const godaddyRecordSchema = z.object({
  type: z.string().min(1),
  name: z.string().min(1),
  data: z.string(),
  ttl: z.number().int().min(0).optional(),
  priority: z.number().int().min(0).optional(),
  weight: z.number().int().min(0).optional(),
  port: z.number().int().min(0).max(65535).optional(),
  service: z.string().optional(),
  protocol: z.string().optional(),
});

// Entry of GET /v1/domains
export const godaddyDomainSchema = z.object({
  domain: z.string(),
  status: z.string().optional(),
});

// Error body returned by the GoDaddy API
export const godaddyErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type GoDaddyCredentials = z.infer<typeof godaddyCredentialsSchema>;
export type GoDaddyConfig = z.infer<typeof godaddyConfigSchema>;
export type CompileOptionsInput = z.input<typeof compileOptionsSchema>;
export type ResolvedCompileOptions = z.infer<typeof compileOptionsSchema>;
export type GoDaddyRecord = z.infer<typeof godaddyRecordSchema>;
export type GoDaddyDomain = z.infer<typeof godaddyDomainSchema>;
