/**
 * Resolving Drive file ids and checking record state.
 */

import type { RecordFields } from '../airtable/airtable-client.js';

const FILE_ID = /^[A-Za-z0-9_-]+$/;
const PATH_ID = /\/d\/([A-Za-z0-9_-]+)/;
const QUERY_ID = /[?&]id=([A-Za-z0-9_-]+)/;

/**
 * Pulls a file id out of a Drive link or a bare id.
 *
 * Handles the link shapes Drive hands out:
 *   https://drive.google.com/file/d/<id>/view?usp=sharing
 *   https://docs.google.com/document/d/<id>/edit
 *   https://drive.google.com/open?id=<id>
 *   https://drive.google.com/uc?id=<id>&export=download
 *
 * @returns null when nothing id-like is present
 */
export function extractDriveFileId(reference: string): string | null {
  const value = reference.trim();
  if (value === '') return null;

  const fromPath = PATH_ID.exec(value);
  if (fromPath) return fromPath[1];

  const fromQuery = QUERY_ID.exec(value);
  if (fromQuery) return fromQuery[1];

  return FILE_ID.test(value) ? value : null;
}

/**
 * True when the record already holds a result, so the work was done before.
 * Strings count when non-blank, arrays (attachments, multi-selects) when non-empty.
 */
export function isAlreadyProcessed(fields: RecordFields, resultField: string): boolean {
  const value = fields[resultField];

  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return false;
}

/** A record field read as a trimmed string, or undefined when absent or not text */
export function stringField(fields: RecordFields, name: string): string | undefined {
  const value = fields[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}
