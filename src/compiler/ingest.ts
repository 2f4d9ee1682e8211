/**
 * Record ingestion
 * Validates loosely-typed registrar entries and turns them into the closed ZoneRecord variant
 */
import { MalformedRecordError, UnsupportedTypeError } from '../core/errors.js';
import {
  SUPPORTED_RECORD_TYPES,
  type RawRecord,
  type SupportedRecordType,
  type UnsupportedTypePolicy,
  type ZoneRecord,
} from '../types/index.js';
import { apexName, ownerName, qualifyTarget, srvOwnerName } from './names.js';
import { parseCaaValue, parseTxtSegments } from './rdata.js';

export type SkipReason = 'unsupported-type' | 'apex-ns' | 'parked';

export type IngestResult =
  | { status: 'accepted'; record: ZoneRecord }
  | { status: 'skipped'; reason: SkipReason };

export interface IngestContext {
  domain: string;
  unsupportedTypes: UnsupportedTypePolicy;
  keepApexNs: boolean;
}

// GoDaddy's placeholder for a domain parked on its servers
const PARKED_PLACEHOLDER = 'parked';

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
// Full, compressed and IPv4-embedded forms
const IPV6 =
  /^(([0-9a-f]{1,4}:){7}[0-9a-f]{1,4}|([0-9a-f]{1,4}:){1,7}:|([0-9a-f]{1,4}:){1,6}:[0-9a-f]{1,4}|([0-9a-f]{1,4}:){1,5}(:[0-9a-f]{1,4}){1,2}|([0-9a-f]{1,4}:){1,4}(:[0-9a-f]{1,4}){1,3}|([0-9a-f]{1,4}:){1,3}(:[0-9a-f]{1,4}){1,4}|([0-9a-f]{1,4}:){1,2}(:[0-9a-f]{1,4}){1,5}|[0-9a-f]{1,4}:((:[0-9a-f]{1,4}){1,6})|:((:[0-9a-f]{1,4}){1,7}|:)|::(ffff(:0{1,4})?:)?((25[0-5]|(2[0-4]|1?[0-9])?[0-9])\.){3}(25[0-5]|(2[0-4]|1?[0-9])?[0-9])|([0-9a-f]{1,4}:){1,4}:((25[0-5]|(2[0-4]|1?[0-9])?[0-9])\.){3}(25[0-5]|(2[0-4]|1?[0-9])?[0-9]))$/;

function isSupportedType(type: string): type is SupportedRecordType {
  return (SUPPORTED_RECORD_TYPES as readonly string[]).includes(type);
}

function isIPv4(value: string): boolean {
  const match = IPV4.exec(value);
  return match !== null && match.slice(1).every((octet) => Number(octet) <= 255);
}

/**
 * Run a character-string parser, reporting bad escapes as a malformed record
 */
function parseEscaped<T>(parse: () => T, malformed: (reason: string) => MalformedRecordError): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof RangeError) {
      throw malformed(error.message);
    }
    throw error;
  }
}

function isUint16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 65535;
}

/**
 * Validate one registrar entry.
 *
 * @throws MalformedRecordError when the type's required fields are missing or invalid
 * @throws UnsupportedTypeError for unknown types under the `fail` policy
 */
export function ingestRecord(raw: RawRecord, context: IngestContext): IngestResult {
  const { domain } = context;
  const type = raw.type.trim().toUpperCase();
  const data = raw.data.trim();

  const malformed = (reason: string): MalformedRecordError => new MalformedRecordError(domain, raw, reason);

  if (!isSupportedType(type)) {
    if (context.unsupportedTypes === 'fail') {
      throw new UnsupportedTypeError(domain, raw);
    }
    return { status: 'skipped', reason: 'unsupported-type' };
  }

  if (raw.ttl !== undefined && (!Number.isInteger(raw.ttl) || raw.ttl < 0)) {
    throw malformed(`invalid ttl ${raw.ttl}`);
  }

  const base = { name: ownerName(raw.name, domain), ttl: raw.ttl, source: raw };

  if (data === '' && type !== 'TXT') {
    throw malformed('missing data');
  }

  switch (type) {
    case 'A':
    case 'AAAA': {
      if (type === 'A' && data.toLowerCase() === PARKED_PLACEHOLDER) {
        return { status: 'skipped', reason: 'parked' };
      }
      const valid = type === 'A' ? isIPv4(data) : IPV6.test(data.toLowerCase());
      if (!valid) {
        throw malformed(`invalid ${type === 'A' ? 'IPv4' : 'IPv6'} address`);
      }
      return { status: 'accepted', record: { ...base, kind: type, address: data } };
    }

    case 'CNAME':
    case 'NS': {
      if (type === 'NS' && base.name === apexName(domain) && !context.keepApexNs) {
        return { status: 'skipped', reason: 'apex-ns' };
      }
      return { status: 'accepted', record: { ...base, kind: type, target: qualifyTarget(data, domain) } };
    }

    case 'MX': {
      const { priority } = raw;
      if (priority === undefined) {
        throw malformed('missing priority');
      }
      if (!isUint16(priority)) {
        throw malformed(`invalid priority ${priority}`);
      }
      return { status: 'accepted', record: { ...base, kind: 'MX', priority, target: qualifyTarget(data, domain) } };
    }

    case 'SRV': {
      const { priority, weight, port } = raw;
      if (priority === undefined || weight === undefined || port === undefined) {
        const missing = (['priority', 'weight', 'port'] as const).filter((field) => raw[field] === undefined);
        throw malformed(`missing ${missing.join(', ')}`);
      }
      for (const [field, value] of [['priority', priority], ['weight', weight], ['port', port]] as const) {
        if (!isUint16(value)) {
          throw malformed(`invalid ${field} ${value}`);
        }
      }
      return {
        status: 'accepted',
        record: {
          ...base,
          name: srvOwnerName(raw.name, domain, raw.service, raw.protocol),
          kind: 'SRV',
          priority,
          weight,
          port,
          target: qualifyTarget(data, domain),
        },
      };
    }

    case 'TXT':
      // TXT keeps inner whitespace exactly as stored
      return {
        status: 'accepted',
        record: { ...base, kind: 'TXT', segments: parseEscaped(() => parseTxtSegments(raw.data), malformed) },
      };

    case 'CAA': {
      const match = /^(\d{1,3})\s+([A-Za-z0-9]+)\s+(.+)$/s.exec(data);
      if (!match) {
        throw malformed('expected "<flags> <tag> <value>"');
      }
      const [, flagsText = '', tag = '', value = ''] = match;
      const flags = Number(flagsText);
      if (flags > 255) {
        throw malformed(`invalid flags ${flags}`);
      }
      return {
        status: 'accepted',
        record: {
          ...base,
          kind: 'CAA',
          flags,
          tag: tag.toLowerCase(),
          value: parseEscaped(() => parseCaaValue(value), malformed),
        },
      };
    }
  }
}
