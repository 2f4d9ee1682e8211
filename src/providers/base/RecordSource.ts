/**
 * Abstract registrar record source
 * Base class for every registrar the records are migrated from
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type { RawRecord } from '../../types/index.js';

export interface SourceInfo {
  name: string;
  type: string;
  baseUrl: string;
  features: {
    pagination: boolean;
    listDomains: boolean;
  };
}

/**
 * Read-only view of a registrar's DNS data.
 *
 * Implementations make one attempt per request: failures surface as
 * `AuthError`, `NotFoundError` or `TransportError` and abort the run.
 */
export abstract class RecordSource {
  protected logger: Logger;

  constructor(protected readonly providerName: string) {
    this.logger = createChildLogger({ service: providerName });
  }

  /**
   * Get registrar information
   */
  abstract getInfo(): SourceInfo;

  /**
   * List the domains managed by the account
   */
  abstract listDomains(): Promise<string[]>;

  /**
   * Fetch every DNS record of a domain, in registrar order
   */
  abstract fetchRecords(domain: string): Promise<RawRecord[]>;

  getProviderName(): string {
    return this.providerName;
  }
}
