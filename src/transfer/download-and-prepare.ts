/**
 * Download-and-Prepare
 *
 * Drive file -> staging directory -> payload Airtable can attach and analyze.
 *
 * Flow:
 * 1. Idempotency check against the record's result field (skip if filled)
 * 2. Resolve the Drive file id (explicit id or parsed from a link)
 * 3. Download (Workspace documents exported as PDF)
 * 4. Stage the bytes
 * 5. Extract text (never fatal)
 * 6. Build the attachment reference (public URL or inline data URL)
 *
 * Never writes to Airtable; the request handler decides about write-back.
 */

import type { RecordFields } from '../airtable/airtable-client.js';
import { downloadFile } from '../drive/drive-files.js';
import { InvalidReferenceError, RecordNotFoundError } from './errors.js';
import { extractDriveFileId, isAlreadyProcessed } from './file-reference.js';
import { extractText } from './text-extractor.js';
import type { TransferContext } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadAndPrepareInput {
  recordId: string;
  fileId?: string;
  driveUrl?: string;
  /** Caller-supplied snapshot of the record's fields; fetched when absent */
  existingResult?: RecordFields;
}

/** Airtable attachment object: Airtable fetches `url` and stores the copy */
export interface AttachmentReference {
  url: string;
  filename: string;
  size: number;
  type: string;
}

export interface SkippedDownload {
  status: 'skipped';
  recordId: string;
  reason: string;
}

export interface PreparedDownload {
  status: 'prepared';
  recordId: string;
  fileId: string;
  fileName: string;
  fileSize: number;
  mimeType: string;
  extractedText: string;
  textNote: string;
  attachment: AttachmentReference;
  /** ISO time the fetch URL stops working; null for inline delivery */
  expiresAt: string | null;
}

export type DownloadAndPrepareResult = SkippedDownload | PreparedDownload;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function resolveFileId(input: DownloadAndPrepareInput): string {
  const fromId = input.fileId ? extractDriveFileId(input.fileId) : null;
  if (fromId) return fromId;

  const fromUrl = input.driveUrl ? extractDriveFileId(input.driveUrl) : null;
  if (fromUrl) return fromUrl;

  throw new InvalidReferenceError(
    input.driveUrl
      ? `Could not extract a file id from drive_url "${input.driveUrl}"`
      : 'Either file_id or drive_url is required',
  );
}

async function recordSnapshot(ctx: TransferContext, input: DownloadAndPrepareInput): Promise<RecordFields> {
  if (input.existingResult) return input.existingResult;

  const record = await ctx.records.getRecord(input.recordId);
  if (!record) throw new RecordNotFoundError(input.recordId);
  return record.fields;
}

/** Public fetch path for a staged file */
export function attachmentUrl(publicBaseUrl: string, stagedId: string): string {
  return `${publicBaseUrl}/attachments/${encodeURIComponent(stagedId)}`;
}

// ---------------------------------------------------------------------------
// Operation
// ---------------------------------------------------------------------------

export async function downloadAndPrepare(
  ctx: TransferContext,
  input: DownloadAndPrepareInput,
): Promise<DownloadAndPrepareResult> {
  const resultField = ctx.config.fields.result;
  const snapshot = await recordSnapshot(ctx, input);

  if (isAlreadyProcessed(snapshot, resultField)) {
    console.log('[transfer] Skipping download, record already processed', {
      recordId: input.recordId,
      resultField,
    });
    return {
      status: 'skipped',
      recordId: input.recordId,
      reason: `Field "${resultField}" already has a value`,
    };
  }

  const fileId = resolveFileId(input);
  const downloaded = await downloadFile(ctx.drive, fileId);

  const staged = await ctx.store.stage(downloaded.bytes, downloaded.name, downloaded.mimeType);
  const bytes = await ctx.store.read(staged.id);
  const extraction = await extractText(bytes, staged.mimeType, downloaded.name, ctx.extractors);

  let attachment: AttachmentReference;
  let expiresAt: string | null;

  if (ctx.config.delivery === 'inline') {
    attachment = {
      url: `data:${staged.mimeType};base64,${bytes.toString('base64')}`,
      filename: downloaded.name,
      size: staged.sizeBytes,
      type: staged.mimeType,
    };
    expiresAt = null;
    await ctx.store.remove(staged.id);
  } else {
    attachment = {
      url: attachmentUrl(ctx.config.publicBaseUrl, staged.id),
      filename: downloaded.name,
      size: staged.sizeBytes,
      type: staged.mimeType,
    };
    expiresAt = new Date(staged.expiresAt).toISOString();
  }

  console.log('[transfer] Prepared download', {
    recordId: input.recordId,
    fileId,
    stagedId: staged.id,
    sizeBytes: staged.sizeBytes,
    textLength: extraction.text.length,
    delivery: ctx.config.delivery,
  });

  return {
    status: 'prepared',
    recordId: input.recordId,
    fileId,
    fileName: downloaded.name,
    fileSize: staged.sizeBytes,
    mimeType: staged.mimeType,
    extractedText: extraction.text,
    textNote: extraction.note,
    attachment,
    expiresAt,
  };
}
