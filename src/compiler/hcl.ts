/**
 * HCL helpers: string literals and resource labels
 */
import { LabelCollisionError } from '../core/errors.js';
import type { LabelCollisionPolicy } from '../types/index.js';

/**
 * Escape text for the inside of an HCL quoted template
 */
export function hclEscape(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, (char) =>
      `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
    )
    // template introducers
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, () => '%%{');
}

/**
 * Quoted HCL string literal
 */
export function hclString(value: string): string {
  return `"${hclEscape(value)}"`;
}

/**
 * HCL list of string literals; one element stays on one line
 */
export function hclStringList(values: readonly string[], indent: string): string {
  if (values.length === 0) {
    return '[]';
  }
  if (values.length === 1) {
    return `[${hclString(values[0] ?? '')}]`;
  }
  const items = values.map((value) => `${indent}  ${hclString(value)},`);
  return `[\n${items.join('\n')}\n${indent}]`;
}

/**
 * Sanitize a relative DNS name into a Terraform identifier fragment
 */
export function sanitizeName(name: string): string {
  if (name === '@') {
    return 'apex';
  }

  const label = name
    .toLowerCase()
    .replace(/\*/g, 'wildcard')
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (label === '') {
    return 'record';
  }

  return /^[0-9]/.test(label) ? `r_${label}` : label;
}

/**
 * Hands out unique resource labels, in call order
 */
export class LabelAllocator {
  private owners = new Map<string, string>();

  constructor(
    private readonly domain: string,
    private readonly policy: LabelCollisionPolicy
  ) {}

  /**
   * Reserve `base` for `owner`, or the first free `base_N` (N >= 2) under the suffix policy
   *
   * @throws LabelCollisionError under the fail policy
   */
  allocate(base: string, owner: string): string {
    const existing = this.owners.get(base);
    if (existing === undefined) {
      this.owners.set(base, owner);
      return base;
    }

    if (this.policy === 'fail') {
      throw new LabelCollisionError(this.domain, base, [existing, owner]);
    }

    let counter = 2;
    while (this.owners.has(`${base}_${counter}`)) {
      counter++;
    }

    const label = `${base}_${counter}`;
    this.owners.set(label, owner);
    return label;
  }
}
