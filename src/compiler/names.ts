/**
 * Owner-name and target-name qualification
 *
 * Registrar names are relative to the zone ("@" is the apex) and data
 * hostnames come without the trailing dot. Cloud DNS wants every name
 * absolute, with the trailing dot.
 */

/**
 * The zone apex as an absolute name
 */
export function apexName(domain: string): string {
  return `${domain}.`;
}

/**
 * Make a registrar owner name absolute and lowercase
 */
export function ownerName(name: string, domain: string): string {
  const label = name.trim().toLowerCase();

  if (label === '@' || label === '' || label === domain) {
    return apexName(domain);
  }

  if (label.endsWith('.')) {
    return label;
  }

  if (label.endsWith(`.${domain}`)) {
    return `${label}.`;
  }

  return `${label}.${domain}.`;
}

/**
 * Owner name of an SRV record whose service and protocol come as separate fields
 */
export function srvOwnerName(name: string, domain: string, service?: string, protocol?: string): string {
  if (!service || !protocol) {
    return ownerName(name, domain);
  }

  const base = name.trim();
  const prefix = `${service.trim()}.${protocol.trim()}`;
  return ownerName(base === '@' || base === '' ? prefix : `${prefix}.${base}`, domain);
}

/**
 * Qualify a hostname found in record data (CNAME, NS, MX and SRV targets).
 *
 * - "@" is the apex
 * - a bare label is relative to the zone
 * - a dotted name is already absolute and only gets the trailing dot
 */
export function qualifyTarget(target: string, domain: string): string {
  const value = target.trim();

  if (value === '@') {
    return apexName(domain);
  }

  if (value.endsWith('.')) {
    return value;
  }

  if (!value.includes('.')) {
    return `${value}.${domain}.`;
  }

  return `${value}.`;
}

/**
 * Whether an absolute name lies inside the zone
 */
export function isInZone(fqdn: string, domain: string): boolean {
  return fqdn === apexName(domain) || fqdn.endsWith(`.${apexName(domain)}`);
}

/**
 * Name relative to the apex, "@" for the apex.
 * Names outside the zone come back absolute without the trailing dot.
 */
export function relativeName(fqdn: string, domain: string): string {
  const apex = apexName(domain);

  if (fqdn === apex) {
    return '@';
  }

  if (fqdn.endsWith(`.${apex}`)) {
    return fqdn.slice(0, -(apex.length + 1));
  }

  return fqdn.replace(/\.$/, '');
}
