/**
 * Migration error taxonomy
 * Every failure aborts the run; the CLI prints `<name>: <message>` and exits non-zero
 */
import type { ZodError } from 'zod';
import type { RawRecord } from '../types/index.js';

export type MigrationErrorCode =
  | 'AUTH_FAILED'
  | 'NOT_FOUND'
  | 'TRANSPORT'
  | 'MALFORMED_RECORD'
  | 'UNSUPPORTED_TYPE'
  | 'LABEL_COLLISION'
  | 'CONFIG';

export abstract class MigrationError extends Error {
  abstract readonly code: MigrationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Registrar rejected the credentials
 */
export class AuthError extends MigrationError {
  readonly code = 'AUTH_FAILED';

  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
  }
}

/**
 * Domain is not managed by the account
 */
export class NotFoundError extends MigrationError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly domain: string, detail?: string) {
    super(`Domain not found: ${domain}${detail ? ` (${detail})` : ''}`);
  }
}

/**
 * Network failure or unexpected response from the registrar
 */
export class TransportError extends MigrationError {
  readonly code = 'TRANSPORT';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Describe a raw record in one line for error messages
 */
export function describeRecord(record: Pick<RawRecord, 'type' | 'name' | 'data'>): string {
  return `${record.type} ${record.name} "${record.data}"`;
}

/**
 * A record lacks fields its type requires, or carries values the target cannot hold
 */
export class MalformedRecordError extends MigrationError {
  readonly code = 'MALFORMED_RECORD';

  constructor(
    public readonly domain: string,
    public readonly record: Pick<RawRecord, 'type' | 'name' | 'data'>,
    reason: string
  ) {
    super(`${domain}: malformed record ${describeRecord(record)}: ${reason}`);
  }
}

export class UnsupportedTypeError extends MigrationError {
  readonly code = 'UNSUPPORTED_TYPE';

  constructor(
    public readonly domain: string,
    public readonly record: Pick<RawRecord, 'type' | 'name' | 'data'>
  ) {
    super(`${domain}: unsupported record type ${record.type} (${describeRecord(record)})`);
  }
}

/**
 * Two different record sets sanitize to the same resource label
 */
export class LabelCollisionError extends MigrationError {
  readonly code = 'LABEL_COLLISION';

  constructor(
    public readonly domain: string,
    public readonly label: string,
    public readonly names: [string, string]
  ) {
    super(`${domain}: resource label "${label}" is shared by ${names[0]} and ${names[1]}`);
  }
}

export class ConfigError extends MigrationError {
  readonly code = 'CONFIG';

  static fromZod(scope: string, error: ZodError): ConfigError {
    const issues = formatZodError(error)
      .map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message))
      .join('; ');
    return new ConfigError(`Invalid ${scope}: ${issues}`);
  }
}

/**
 * Format Zod validation errors
 */
export function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
}
