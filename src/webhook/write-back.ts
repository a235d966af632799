/**
 * Best-effort Airtable writes that follow a Drive operation.
 *
 * The Drive side has already happened by the time these run, so a failed
 * write is logged and reported, never thrown.
 */

import type { RecordClient, RecordFields } from '../airtable/airtable-client.js';
import { errorMessage } from '../transfer/errors.js';
import type { WriteOutcome } from './types.js';

export async function writeFields(
  records: RecordClient,
  recordId: string,
  fields: RecordFields,
): Promise<WriteOutcome> {
  try {
    await records.updateRecord(recordId, fields);
    return 'written';
  } catch (err) {
    console.warn('[airtable] Write-back failed', {
      recordId,
      fields: Object.keys(fields),
      error: errorMessage(err),
    });
    return 'failed';
  }
}

/** Status lines written to the Rename Status / Delete Status fields */
export const statusText = {
  renamed: (newName: string) => `✅ Auto-renamed to: ${newName}`,
  renameSkipped: (name: string) => `✅ Already named: ${name}`,
  deleted: '✅ File successfully deleted',
  alreadyDeleted: '✅ File was already deleted',
  failed: (message: string) => `❌ Failed: ${message}`,
} as const;
