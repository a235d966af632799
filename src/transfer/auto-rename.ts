/**
 * Auto-Rename
 *
 * Applies the name Airtable AI suggested for a record to the record's Drive
 * file. The record is read first; the request body only supplies fallbacks
 * for fields the record does not carry.
 */

import { InvalidNameError, InvalidReferenceError, RecordNotFoundError } from './errors.js';
import { extractDriveFileId, stringField } from './file-reference.js';
import { renameDriveFile } from './rename.js';
import type { TransferContext } from './types.js';

export interface AutoRenameInput {
  recordId: string;
  /** Fallback when the record has no Drive file id */
  fileId?: string;
  /** Fallback when the record has no suggested name */
  newName?: string;
}

export interface AutoRenameResult {
  status: 'renamed' | 'skipped';
  recordId: string;
  fileId: string;
  originalName: string | null;
  newName: string;
}

export async function autoRename(ctx: TransferContext, input: AutoRenameInput): Promise<AutoRenameResult> {
  const { fields } = ctx.config;

  const record = await ctx.records.getRecord(input.recordId);
  if (!record) throw new RecordNotFoundError(input.recordId);

  const newName = stringField(record.fields, fields.suggestedName) ?? input.newName?.trim() ?? '';
  if (newName === '') {
    throw new InvalidNameError(
      `Record ${input.recordId} has no "${fields.suggestedName}" and no new_name was given`,
    );
  }

  const fileReference = input.fileId ?? stringField(record.fields, fields.fileId);
  const fileId = fileReference ? extractDriveFileId(fileReference) : null;
  if (!fileId) {
    throw new InvalidReferenceError(
      `Record ${input.recordId} has no "${fields.fileId}" and no file_id was given`,
    );
  }

  const originalName = stringField(record.fields, fields.originalName) ?? null;
  if (originalName === newName) {
    console.log('[transfer] Auto-rename skipped, name unchanged', { recordId: input.recordId, fileId });
    return { status: 'skipped', recordId: input.recordId, fileId, originalName, newName };
  }

  const renamed = await renameDriveFile(ctx, { fileId, newName });
  console.log('[transfer] Auto-renamed file', { recordId: input.recordId, fileId });

  return { status: 'renamed', recordId: input.recordId, fileId, originalName, newName: renamed.newName };
}
