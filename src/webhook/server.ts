/**
 * Express Webhook Server
 *
 * HTTP layer for Airtable automations. Routes:
 * - GET  /health: Status and configured features
 * - POST /download-and-analyze-vision: Stage a Drive file as an Airtable attachment
 * - POST /rename-file: Rename a Drive file
 * - POST /auto-rename-file: Apply a record's suggested name
 * - DELETE|POST /auto-delete-file: Delete (or trash) a Drive file
 * - POST /upload-to-drive: Copy attachment URLs into Drive
 * - GET  /attachments/:name: Serve a staged file (no auth, fetched by Airtable)
 * - GET  /temp-files, POST /cleanup: Operator view of the staging directory
 *
 * Webhook routes pass the bearer-token and signature gates; operator routes
 * only the bearer token. Payloads are sanitized before any console output.
 */

import { pipeline } from 'node:stream/promises';
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { isPlainFileName } from '../staging/sanitize-name.js';
import {
  InvalidReferenceError,
  RecordNotFoundError,
  autoDelete,
  autoRename,
  downloadAndPrepare,
  errorMessage,
  renameDriveFile,
  uploadToDrive,
} from '../transfer/index.js';
import type { AutoDeleteResult, AutoRenameResult, PreparedDownload } from '../transfer/index.js';
import { captureRawBody, requireBearerToken, requireSignature } from './auth.js';
import { createHealthHandler } from './health.js';
import {
  autoDeleteRequestSchema,
  autoRenameRequestSchema,
  bodyObject,
  downloadRequestSchema,
  parseRequest,
  renameRequestSchema,
  toAutoRenameInput,
  toDownloadInput,
  toUploadInput,
  uploadRequestSchema,
} from './requests.js';
import { isMalformedJson, sendError, sendErrorBody } from './responses.js';
import { sanitizeForLog } from './sanitize.js';
import { statusText, writeFields } from './write-back.js';
import type { ServerDependencies, WriteOutcome } from './types.js';

const UPLOAD_STATUS = { success: 200, partial: 207, failure: 502 } as const;

function logRequest(req: Request, body: unknown): void {
  console.log(`[server] ${req.method} ${req.path}`, sanitizeForLog(body));
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * with fake dependencies and no shared state between test cases.
 */
export function createApp(deps: ServerDependencies) {
  const { transfer } = deps;
  const { fields } = transfer.config;
  const now = deps.now ?? Date.now;

  const app = express();
  app.use(express.json({ limit: '1mb', verify: captureRawBody }));

  const bearer = requireBearerToken(deps.auth.serverToken);
  const webhook = [bearer, requireSignature(deps.auth.webhookSecret)];

  // -------------------------------------------------------------------------
  // Write-back helpers
  // -------------------------------------------------------------------------

  async function writeExtractedText(result: PreparedDownload): Promise<WriteOutcome> {
    if (!deps.writeBack || result.extractedText === '') return 'skipped';
    return writeFields(transfer.records, result.recordId, { [fields.result]: result.extractedText });
  }

  /** Stamps a failure on the record, unless the record itself is the problem */
  async function recordFailure(recordId: string, field: string, err: unknown): Promise<void> {
    if (err instanceof RecordNotFoundError) return;
    await writeFields(transfer.records, recordId, { [field]: statusText.failed(errorMessage(err)) });
  }

  app.get('/health', createHealthHandler(deps));

  // -------------------------------------------------------------------------
  // Webhook routes
  // -------------------------------------------------------------------------

  app.post('/download-and-analyze-vision', webhook, async (req: Request, res: Response) => {
    logRequest(req, req.body);
    const body = parseRequest(downloadRequestSchema, bodyObject(req.body));

    const result = await downloadAndPrepare(transfer, toDownloadInput(body));
    if (result.status === 'skipped') {
      res.json({ success: true, status: 'skipped', record_id: result.recordId, message: result.reason });
      return;
    }

    const writeBack = await writeExtractedText(result);
    console.log('[server] Prepared attachment', {
      recordId: result.recordId,
      fileId: result.fileId,
      sizeBytes: result.fileSize,
      writeBack,
    });

    res.json({
      success: true,
      status: 'prepared',
      record_id: result.recordId,
      file_id: result.fileId,
      file_name: result.fileName,
      file_size: result.fileSize,
      mime_type: result.mimeType,
      extracted_text: result.extractedText,
      text_note: result.textNote,
      attachment: result.attachment,
      expires_at: result.expiresAt,
      write_back: writeBack,
    });
  });

  app.post('/rename-file', webhook, async (req: Request, res: Response) => {
    logRequest(req, req.body);
    const body = parseRequest(renameRequestSchema, bodyObject(req.body));

    const result = await renameDriveFile(transfer, { fileId: body.file_id, newName: body.new_name });
    res.json({
      success: true,
      message: `File renamed to "${result.newName}"`,
      file_id: result.fileId,
      new_name: result.newName,
    });
  });

  app.post('/auto-rename-file', webhook, async (req: Request, res: Response) => {
    logRequest(req, req.body);
    const body = parseRequest(autoRenameRequestSchema, bodyObject(req.body));

    let result: AutoRenameResult;
    try {
      result = await autoRename(transfer, toAutoRenameInput(body));
    } catch (err) {
      await recordFailure(body.record_id, fields.renameStatus, err);
      throw err;
    }

    const status =
      result.status === 'renamed' ? statusText.renamed(result.newName) : statusText.renameSkipped(result.newName);
    const statusWrite = await writeFields(transfer.records, result.recordId, { [fields.renameStatus]: status });

    res.json({
      success: true,
      status: result.status,
      record_id: result.recordId,
      file_id: result.fileId,
      original_name: result.originalName,
      new_name: result.newName,
      status_write: statusWrite,
    });
  });

  const handleAutoDelete = async (req: Request, res: Response) => {
    const input = { ...req.query, ...bodyObject(req.body) };
    logRequest(req, input);
    const body = parseRequest(autoDeleteRequestSchema, input);

    let result: AutoDeleteResult;
    try {
      result = await autoDelete(transfer, body.file_id);
    } catch (err) {
      if (body.record_id) await recordFailure(body.record_id, fields.deleteStatus, err);
      throw err;
    }

    let statusWrite: WriteOutcome = 'skipped';
    if (body.record_id) {
      statusWrite = await writeFields(transfer.records, body.record_id, {
        [fields.deleteStatus]: result.status === 'deleted' ? statusText.deleted : statusText.alreadyDeleted,
        [fields.fileId]: null,
      });
    }

    const message =
      result.status === 'already_deleted'
        ? `File ${result.fileId} was already deleted`
        : result.mode === 'trash'
          ? `File ${result.fileId} moved to trash`
          : `File ${result.fileId} deleted`;

    res.json({ success: true, status: result.status, message, file_id: result.fileId, status_write: statusWrite });
  };

  app.delete('/auto-delete-file', webhook, handleAutoDelete);
  app.post('/auto-delete-file', webhook, handleAutoDelete);

  app.post('/upload-to-drive', webhook, async (req: Request, res: Response) => {
    logRequest(req, req.body);
    const body = parseRequest(uploadRequestSchema, bodyObject(req.body));

    const result = await uploadToDrive(transfer, toUploadInput(body));
    console.log('[server] Upload finished', {
      outcome: result.outcome,
      uploaded: result.uploaded,
      failed: result.failed,
    });

    res.status(UPLOAD_STATUS[result.outcome]).json({
      success: result.outcome === 'success',
      outcome: result.outcome,
      ...(result.outcome === 'partial' && {
        code: 'PARTIAL_FAILURE',
        error: `${result.failed} of ${result.items.length} uploads failed`,
      }),
      ...(result.outcome === 'failure' && {
        code: 'TRANSFER_FAILED',
        error: `All ${result.items.length} uploads failed`,
      }),
      folder_id: result.folderId,
      uploaded: result.uploaded,
      failed: result.failed,
      results: result.items,
    });
  });

  // -------------------------------------------------------------------------
  // Staged files
  // -------------------------------------------------------------------------

  app.get('/attachments/:name', async (req: Request<{ name: string }>, res: Response) => {
    const name = req.params.name;
    if (!isPlainFileName(name)) {
      throw new InvalidReferenceError(`Invalid attachment name "${name}"`);
    }

    const { file, stream } = await transfer.store.openReadStream(name);
    res.status(200);
    res.type(file.mimeType);
    res.setHeader('Content-Length', String(file.sizeBytes));
    res.setHeader('Cache-Control', 'no-store');
    await pipeline(stream, res);
  });

  app.get('/temp-files', bearer, async (_req: Request, res: Response) => {
    const files = await transfer.store.list();
    res.json({
      success: true,
      tempDir: transfer.store.rootDir,
      retentionSeconds: transfer.store.retentionSeconds,
      fileCount: files.length,
      totalSizeBytes: files.reduce((sum, file) => sum + file.sizeBytes, 0),
      files: files.map((file) => ({
        id: file.id,
        originalName: file.originalName,
        mimeType: file.mimeType,
        sizeBytes: file.sizeBytes,
        createdAt: new Date(file.createdAt).toISOString(),
        expiresAt: new Date(file.expiresAt).toISOString(),
      })),
    });
  });

  app.post('/cleanup', bearer, async (req: Request, res: Response) => {
    const expiredOnly = req.query.expired === 'true';
    const removed = expiredOnly ? await transfer.store.sweep(now()) : await transfer.store.removeAll();
    console.log('[server] Cleanup', { expiredOnly, removed });
    res.json({ success: true, removed, mode: expiredOnly ? 'expired' : 'all' });
  });

  // -------------------------------------------------------------------------
  // Fallthrough
  // -------------------------------------------------------------------------

  app.use((_req: Request, res: Response) => {
    sendErrorBody(res, 404, 'Not found', 'NOT_FOUND');
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isMalformedJson(err)) {
      sendErrorBody(res, 400, 'Malformed JSON body', 'INVALID_REFERENCE');
      return;
    }
    sendError(res, err);
  });

  return app;
}
