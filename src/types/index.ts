/**
 * Core type definitions for zone-migrate
 */

// Record types the compiler knows how to translate
export type SupportedRecordType = 'A' | 'AAAA' | 'CNAME' | 'NS' | 'MX' | 'SRV' | 'TXT' | 'CAA';

export const SUPPORTED_RECORD_TYPES: readonly SupportedRecordType[] = [
  'A',
  'AAAA',
  'CNAME',
  'NS',
  'MX',
  'SRV',
  'TXT',
  'CAA',
];

/**
 * A record as returned by the registrar, one entry per stored value
 */
export interface RawRecord {
  type: string;
  /** Label relative to the zone apex, "@" for the apex itself */
  name: string;
  data: string;
  ttl?: number;
  priority?: number;
  weight?: number;
  port?: number;
  /** SRV service label (e.g. "_sip"), when the registrar splits the owner name */
  service?: string;
  /** SRV protocol label (e.g. "_tcp") */
  protocol?: string;
}

interface ZoneRecordBase {
  /** Fully-qualified owner name with trailing dot */
  name: string;
  ttl?: number;
  /** The registrar entry this record was built from */
  source: RawRecord;
}

export interface AddressRecord extends ZoneRecordBase {
  kind: 'A' | 'AAAA';
  address: string;
}

export interface HostRecord extends ZoneRecordBase {
  kind: 'CNAME' | 'NS';
  target: string;
}

export interface MXRecord extends ZoneRecordBase {
  kind: 'MX';
  priority: number;
  target: string;
}

export interface SRVRecord extends ZoneRecordBase {
  kind: 'SRV';
  priority: number;
  weight: number;
  port: number;
  target: string;
}

export interface TXTRecord extends ZoneRecordBase {
  kind: 'TXT';
  /** Character-strings, unescaped */
  segments: string[];
}

export interface CAARecord extends ZoneRecordBase {
  kind: 'CAA';
  flags: number;
  tag: string;
  value: string;
}

/**
 * Validated, strongly-typed record; everything past ingestion works on this
 */
export type ZoneRecord = AddressRecord | HostRecord | MXRecord | SRVRecord | TXTRecord | CAARecord;

export type RecordKind = ZoneRecord['kind'];

/**
 * Grouping identity of an RRset
 */
export interface ResourceKey {
  type: RecordKind;
  /** Fully-qualified owner name, lowercase, trailing dot */
  name: string;
}

/**
 * One RRset, rendered as a single record-set resource
 */
export interface ZoneResource {
  readonly key: Readonly<ResourceKey>;
  readonly ttl: number;
  readonly rrdatas: readonly string[];
  /** Owner name relative to the apex ("@" for the apex), used for labels and zone references */
  readonly relativeName: string;
}

/**
 * A ZoneResource with its Terraform resource label
 */
export interface CompiledResource extends ZoneResource {
  readonly label: string;
}

// Compiler policies
export type UnsupportedTypePolicy = 'skip' | 'fail';
export type LabelCollisionPolicy = 'suffix' | 'fail';
export type ZoneMode = 'create' | 'existing';

export interface CompileOptions {
  /** Zone apex, e.g. "example.com" */
  domain: string;
  defaultTtl?: number;
  unsupportedTypes?: UnsupportedTypePolicy;
  labelCollisions?: LabelCollisionPolicy;
  /** Keep NS records at the apex (Cloud DNS manages its own apex NS set) */
  keepApexNs?: boolean;
  zoneMode?: ZoneMode;
  /** Cloud DNS managed zone name; derived from the domain when absent */
  managedZoneName?: string;
  /** Render record names as interpolations of the zone's dns_name */
  useZoneReference?: boolean;
}

export interface CompileStats {
  records: number;
  resources: number;
  skipped: number;
  duplicates: number;
}

export interface CompileResult {
  domain: string;
  resources: readonly CompiledResource[];
  document: string;
  stats: CompileStats;
}
