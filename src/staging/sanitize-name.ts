/**
 * File Name Sanitization for the Staging Directory
 *
 * Every externally supplied name (Drive file name, URL segment, request body)
 * passes through sanitizeFileName before it becomes part of a staged path.
 * isPlainFileName guards lookups by id (e.g. the /attachments/:name route).
 */

import { extname } from 'node:path';
import { InvalidNameError } from '../transfer/errors.js';

/** Cap in code points */
export const MAX_NAME_LENGTH = 120;

/**
 * Cap in UTF-8 bytes. Stored names add a 9-byte token prefix and at most a
 * 4-byte "-N" suffix, and must stay under the 255-byte filesystem limit.
 */
export const MAX_NAME_BYTES = 200;

/** Path separators and control characters are removed outright */
const STRIPPED_CHARS = /[/\\\u0000-\u001f\u007f]/g;

const UNSAFE_CHAR = /[/\\\u0000-\u001f\u007f]/;

/** Unpaired UTF-16 surrogates cannot be encoded into a URL or a path */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/** Characters some filesystems reject are replaced */
const RESERVED_CHARS = /[:*?"<>|]/g;

/** Longest extension kept intact when a name is truncated */
const MAX_EXTENSION_LENGTH = 16;

/**
 * Makes a suggested file name safe to join into the staging root.
 *
 * @throws InvalidNameError when nothing usable is left ('', '.', '..')
 */
export function sanitizeFileName(suggested: string): string {
  const cleaned = suggested
    .replace(STRIPPED_CHARS, '')
    .replace(LONE_SURROGATE, '_')
    .replace(RESERVED_CHARS, '_')
    .trim();

  if (cleaned === '' || cleaned === '.' || cleaned === '..') {
    throw new InvalidNameError(`File name "${suggested}" is empty after sanitization`);
  }

  return truncateName(cleaned, MAX_NAME_LENGTH);
}

/** Longest prefix of `chars` within both limits, never splitting a code point */
function takeWithin(chars: string[], maxLength: number, maxBytes: number): string {
  let result = '';
  let bytes = 0;
  for (const char of chars.slice(0, Math.max(0, maxLength))) {
    const size = Buffer.byteLength(char);
    if (bytes + size > maxBytes) break;
    result += char;
    bytes += size;
  }
  return result;
}

/**
 * Caps a name at maxLength code points and maxBytes UTF-8 bytes, keeping a
 * short extension intact.
 */
export function truncateName(name: string, maxLength: number, maxBytes: number = MAX_NAME_BYTES): string {
  const chars = Array.from(name);
  if (chars.length <= maxLength && Buffer.byteLength(name) <= maxBytes) return name;

  const ext = extname(name);
  const extLength = Array.from(ext).length;
  if (ext.length === 0 || extLength > MAX_EXTENSION_LENGTH) {
    return takeWithin(chars, maxLength, maxBytes);
  }

  const base = chars.slice(0, chars.length - extLength);
  return takeWithin(base, maxLength - extLength, maxBytes - Buffer.byteLength(ext)) + ext;
}

/** Inserts a -N disambiguator before the extension: "a.pdf" -> "a-2.pdf" */
export function withCollisionSuffix(name: string, attempt: number): string {
  const ext = extname(name);
  const base = name.slice(0, name.length - ext.length);
  return `${base}-${attempt}${ext}`;
}

/**
 * True when the value is a single visible file name: no separators,
 * not '.'/'..', not hidden (partial writes are dot-files).
 */
export function isPlainFileName(value: string): boolean {
  if (value.length === 0 || Buffer.byteLength(value) > 255) return false;
  if (value.startsWith('.')) return false;
  return !UNSAFE_CHAR.test(value);
}
