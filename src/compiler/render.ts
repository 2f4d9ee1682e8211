/**
 * Terraform rendering for Google Cloud DNS
 * google_dns_managed_zone preamble plus one google_dns_record_set per RRset
 */
import type { ZoneMode, ZoneResource } from '../types/index.js';
import { hclEscape, hclString, hclStringList, sanitizeName } from './hcl.js';
import { apexName, isInZone } from './names.js';

export const MANAGED_ZONE_TYPE = 'google_dns_managed_zone';
export const RECORD_SET_TYPE = 'google_dns_record_set';

export interface RenderContext {
  domain: string;
  zoneMode: ZoneMode;
  /** Terraform label of the zone resource or data source */
  zoneLabel: string;
  /** Cloud DNS managed zone name */
  managedZoneName: string;
  useZoneReference: boolean;
}

/**
 * Terraform label for the zone, e.g. example_com
 */
export function zoneLabel(domain: string): string {
  return sanitizeName(domain);
}

/**
 * Cloud DNS zone name derived from the domain, e.g. example-com
 */
export function defaultManagedZoneName(domain: string): string {
  const base = domain
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  const name = /^[a-z]/.test(base) ? base : `zone-${base}`;
  return name.slice(0, 63).replace(/-+$/, '');
}

/**
 * Address of the zone the record sets attach to
 */
export function zoneAddress(context: RenderContext): string {
  const address = `${MANAGED_ZONE_TYPE}.${context.zoneLabel}`;
  return context.zoneMode === 'existing' ? `data.${address}` : address;
}

export function renderHeader(domain: string): string {
  return [
    `# Cloud DNS configuration for ${domain}, migrated from registrar records.`,
    '# Generated file: re-run the migration instead of editing it by hand.',
  ].join('\n') + '\n';
}

export function renderPreamble(context: RenderContext): string {
  const { domain, zoneLabel: label, managedZoneName } = context;

  if (context.zoneMode === 'existing') {
    return [
      `data "${MANAGED_ZONE_TYPE}" "${label}" {`,
      `  name = ${hclString(managedZoneName)}`,
      '}',
    ].join('\n') + '\n';
  }

  return [
    `resource "${MANAGED_ZONE_TYPE}" "${label}" {`,
    `  name        = ${hclString(managedZoneName)}`,
    `  dns_name    = ${hclString(apexName(domain))}`,
    `  description = ${hclString(`${domain} DNS zone. Managed by Terraform`)}`,
    `  visibility  = "public"`,
    '}',
  ].join('\n') + '\n';
}

/**
 * Expression for the record set's name attribute
 */
export function renderName(resource: ZoneResource, context: RenderContext): string {
  const { name } = resource.key;

  if (!context.useZoneReference || !isInZone(name, context.domain)) {
    return hclString(name);
  }

  const dnsName = `${zoneAddress(context)}.dns_name`;
  if (resource.relativeName === '@') {
    return dnsName;
  }
  return `"${hclEscape(resource.relativeName)}.\${${dnsName}}"`;
}

export function renderRecordSet(resource: ZoneResource, label: string, context: RenderContext): string {
  return [
    `resource "${RECORD_SET_TYPE}" "${label}" {`,
    `  managed_zone = ${zoneAddress(context)}.name`,
    `  name         = ${renderName(resource, context)}`,
    `  type         = ${hclString(resource.key.type)}`,
    `  ttl          = ${resource.ttl}`,
    `  rrdatas      = ${hclStringList(resource.rrdatas, '  ')}`,
    '}',
  ].join('\n') + '\n';
}

/**
 * Assemble the document; blocks are separated by one blank line
 */
export function renderDocument(context: RenderContext, blocks: readonly string[]): string {
  return [renderHeader(context.domain), renderPreamble(context), ...blocks].join('\n');
}
