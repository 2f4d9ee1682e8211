/**
 * rrdata formatting in DNS presentation format, as Cloud DNS expects it
 */
import type { ZoneRecord } from '../types/index.js';

// Longest DNS character-string, in bytes
export const MAX_CHARACTER_STRING = 255;

const QUOTED_SEGMENTS = /^"(?:[^"\\]|\\.)*"(?:\s+"(?:[^"\\]|\\.)*")*$/s;
const QUOTED_SEGMENT = /"((?:[^"\\]|\\.)*)"/gs;

const ESCAPE_TOKEN = /\\(\d{3})|\\([\s\S])|([^\\]+)/g;

/**
 * Undo presentation escapes: \X -> X, \DDD -> byte DDD.
 * The bytes are decoded as UTF-8.
 *
 * @throws RangeError when a \DDD escape is above 255
 */
function unescapeCharacterString(value: string): string {
  const bytes: number[] = [];

  for (const [, decimal, escaped, text] of value.matchAll(ESCAPE_TOKEN)) {
    if (decimal !== undefined) {
      const byte = Number(decimal);
      if (byte > 255) {
        throw new RangeError(`escape \\${decimal} is not a byte`);
      }
      bytes.push(byte);
    } else {
      bytes.push(...Buffer.from(escaped ?? text ?? '', 'utf8'));
    }
  }

  return Buffer.from(bytes).toString('utf8');
}

/**
 * Whether the data is written as one or more adjacent quoted strings
 */
export function isQuotedSegments(data: string): boolean {
  return QUOTED_SEGMENTS.test(data.trim());
}

/**
 * Split unquoted text into character-strings of at most 255 bytes,
 * never cutting a character in two
 */
export function splitCharacterStrings(text: string): string[] {
  if (Buffer.byteLength(text, 'utf8') <= MAX_CHARACTER_STRING) {
    return [text];
  }

  const segments: string[] = [];
  let current = '';
  let size = 0;

  for (const char of text) {
    const bytes = Buffer.byteLength(char, 'utf8');
    if (size + bytes > MAX_CHARACTER_STRING) {
      segments.push(current);
      current = '';
      size = 0;
    }
    current += char;
    size += bytes;
  }

  segments.push(current);
  return segments;
}

/**
 * Parse registrar TXT data into character-strings.
 * Quoted segments keep their boundaries, split further only when longer than
 * 255 bytes; anything else is one literal text.
 *
 * @throws RangeError on a \DDD escape above 255
 */
export function parseTxtSegments(data: string): string[] {
  if (isQuotedSegments(data)) {
    const segments = Array.from(data.trim().matchAll(QUOTED_SEGMENT), (match) => unescapeCharacterString(match[1] ?? ''));
    return segments.flatMap((segment) => splitCharacterStrings(segment));
  }
  return splitCharacterStrings(data);
}

/**
 * Quote one character-string, escaping backslashes and quotes
 */
export function quoteCharacterString(value: string): string {
  return `"${value.replace(/[\\"]/g, (char) => `\\${char}`)}"`;
}

/**
 * Parse a CAA value that may already be quoted
 *
 * @throws RangeError on a \DDD escape above 255
 */
export function parseCaaValue(value: string): string {
  const trimmed = value.trim();
  if (/^"(?:[^"\\]|\\.)*"$/s.test(trimmed)) {
    return unescapeCharacterString(trimmed.slice(1, -1));
  }
  return trimmed;
}

/**
 * Format a validated record as a single rrdata string
 */
export function formatRdata(record: ZoneRecord): string {
  switch (record.kind) {
    case 'A':
    case 'AAAA':
      return record.address;

    case 'CNAME':
    case 'NS':
      return record.target;

    case 'MX':
      return `${record.priority} ${record.target}`;

    case 'SRV':
      return `${record.priority} ${record.weight} ${record.port} ${record.target}`;

    case 'TXT':
      return record.segments.map(quoteCharacterString).join(' ');

    case 'CAA':
      return `${record.flags} ${record.tag} ${quoteCharacterString(record.value)}`;
  }
}
