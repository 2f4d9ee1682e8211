/**
 * GoDaddy record source
 * Reads domains and DNS records through the GoDaddy developer API (GET only)
 */
import { z } from 'zod';
import { RecordSource, type SourceInfo } from '../base/RecordSource.js';
import { AuthError, MalformedRecordError, NotFoundError, TransportError, formatZodError } from '../../core/errors.js';
import {
  godaddyDomainSchema,
  godaddyErrorSchema,
  godaddyRecordSchema,
  type GoDaddyCredentials,
} from '../../config/schema.js';
import type { RawRecord } from '../../types/index.js';

export interface GoDaddyProviderOptions {
  baseUrl?: string;
  pageSize?: number;
}

// Error codes GoDaddy returns for domains the account does not hold
const NOT_FOUND_CODES = new Set(['UNKNOWN_DOMAIN', 'NOT_FOUND']);

const looseRecordSchema = z
  .object({ type: z.unknown(), name: z.unknown(), data: z.unknown() })
  .partial();

/**
 * Best-effort identification of an entry that failed validation
 */
function identify(entry: unknown): { type: string; name: string; data: string } {
  const parsed = looseRecordSchema.safeParse(entry);
  const fields = parsed.success ? parsed.data : {};
  return {
    type: typeof fields.type === 'string' ? fields.type : '?',
    name: typeof fields.name === 'string' ? fields.name : '?',
    data: typeof fields.data === 'string' ? fields.data : '',
  };
}

export class GoDaddyProvider extends RecordSource {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly baseUrl: string;
  private readonly pageSize: number;

  constructor(credentials: GoDaddyCredentials, options: GoDaddyProviderOptions = {}) {
    super('GoDaddy');

    this.apiKey = credentials.apiKey;
    this.apiSecret = credentials.apiSecret;
    this.baseUrl = (options.baseUrl ?? 'https://api.godaddy.com').replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 500;
  }

  getInfo(): SourceInfo {
    return {
      name: this.providerName,
      type: 'godaddy',
      baseUrl: this.baseUrl,
      features: {
        pagination: true,
        listDomains: true,
      },
    };
  }

  async listDomains(): Promise<string[]> {
    const body = await this.makeRequest('/v1/domains');

    const result = z.array(godaddyDomainSchema).safeParse(body);
    if (!result.success) {
      throw new TransportError('Unexpected response from GoDaddy for /v1/domains');
    }

    const domains = result.data.map((d) => d.domain).sort();
    this.logger.debug({ count: domains.length }, 'Domains listed');
    return domains;
  }

  async fetchRecords(domain: string): Promise<RawRecord[]> {
    this.logger.debug({ domain }, 'Fetching DNS records');

    const records: RawRecord[] = [];
    let offset = 0;

    while (true) {
      const body = await this.makeRequest(
        `/v1/domains/${encodeURIComponent(domain)}/records?limit=${this.pageSize}&offset=${offset}`,
        domain
      );

      if (!Array.isArray(body)) {
        // GoDaddy sometimes answers 200 with an error object
        const error = godaddyErrorSchema.safeParse(body);
        if (error.success && error.data.code && NOT_FOUND_CODES.has(error.data.code)) {
          throw new NotFoundError(domain, error.data.message);
        }
        throw new TransportError(`Unexpected response from GoDaddy for ${domain}: expected a list of records`);
      }

      for (const entry of body) {
        records.push(this.convertFromGoDaddy(domain, entry));
      }

      if (body.length < this.pageSize) {
        break;
      }

      offset += body.length;
    }

    this.logger.info({ domain, count: records.length }, 'DNS records fetched');
    return records;
  }

  /**
   * Validate one registrar entry against the base record shape
   */
  private convertFromGoDaddy(domain: string, entry: unknown): RawRecord {
    const result = godaddyRecordSchema.safeParse(entry);
    if (!result.success) {
      const reason = formatZodError(result.error)
        .map((issue) => `${issue.field}: ${issue.message}`)
        .join('; ');
      throw new MalformedRecordError(domain, identify(entry), reason);
    }
    return result.data;
  }

  /**
   * Make authenticated GET request and return the decoded JSON body
   */
  private async makeRequest(endpoint: string, domain?: string): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `sso-key ${this.apiKey}:${this.apiSecret}`,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request to ${url} failed: ${message}`, undefined, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Reading the response from ${url} failed: ${message}`, response.status, { cause: error });
    }

    let body: unknown;
    let decoded = false;
    try {
      body = text ? JSON.parse(text) : undefined;
      decoded = true;
    } catch {
      decoded = false;
    }

    if (!response.ok) {
      const parsed = godaddyErrorSchema.safeParse(body);
      const error = parsed.success ? parsed.data : {};
      const detail = error.message ?? response.statusText;

      this.logger.debug({ status: response.status, endpoint, body: text }, 'GoDaddy API error response');

      const scope = domain ? ` for ${domain}` : '';
      const reason = `${response.status}${detail ? `: ${detail}` : ''}`;

      if (response.status === 401 || response.status === 403) {
        throw new AuthError(`GoDaddy rejected the API credentials${scope} (${reason})`, response.status);
      }

      if (domain && (response.status === 404 || (error.code !== undefined && NOT_FOUND_CODES.has(error.code)))) {
        throw new NotFoundError(domain, error.message);
      }

      throw new TransportError(`GoDaddy API error${scope} (${reason})`, response.status);
    }

    if (!decoded) {
      throw new TransportError(`GoDaddy returned a non-JSON body for ${endpoint}`, response.status);
    }

    return body;
  }
}
