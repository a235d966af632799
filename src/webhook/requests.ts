/**
 * Request Body Schemas
 *
 * One zod schema per endpoint. Field names are the snake_case keys Airtable
 * automations send. A body that fails validation becomes InvalidReferenceError
 * (400 INVALID_REFERENCE) with the first issue in the message.
 */

import { z } from 'zod';
import { InvalidReferenceError } from '../transfer/errors.js';
import type { AutoRenameInput, DownloadAndPrepareInput, UploadToDriveInput } from '../transfer/index.js';

const id = z.string().trim().min(1);

export const downloadRequestSchema = z
  .object({
    record_id: id,
    file_id: id.optional(),
    drive_url: id.optional(),
    existing_result: z.record(z.unknown()).optional(),
  })
  .refine((body) => body.file_id !== undefined || body.drive_url !== undefined, {
    message: 'Either file_id or drive_url is required',
    path: ['file_id'],
  });

export const renameRequestSchema = z.object({
  file_id: id,
  // Emptiness is checked by the rename itself (INVALID_NAME, not INVALID_REFERENCE)
  new_name: z.string().default(''),
});

export const autoRenameRequestSchema = z.object({
  record_id: id,
  file_id: id.optional(),
  new_name: z.string().optional(),
});

export const autoDeleteRequestSchema = z.object({
  file_id: id,
  record_id: id.optional(),
});

export const uploadRequestSchema = z
  .object({
    attachment_url: z.string().optional(),
    attachment_urls: z.array(z.string()).optional(),
    folder_id: id.optional(),
    filenames: z.array(z.string()).optional(),
    filename: z.string().optional(),
  })
  .refine((body) => body.attachment_url !== undefined || body.attachment_urls !== undefined, {
    message: 'Either attachment_url or attachment_urls is required',
    path: ['attachment_urls'],
  });

export type DownloadRequest = z.infer<typeof downloadRequestSchema>;
export type RenameRequest = z.infer<typeof renameRequestSchema>;
export type AutoRenameRequest = z.infer<typeof autoRenameRequestSchema>;
export type AutoDeleteRequest = z.infer<typeof autoDeleteRequestSchema>;
export type UploadRequest = z.infer<typeof uploadRequestSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Request body as an object; absent or non-object bodies read as {} */
export function bodyObject(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}

export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.');
    throw new InvalidReferenceError(path ? `${path}: ${issue.message}` : issue.message);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Mapping to transfer inputs
// ---------------------------------------------------------------------------

export function toDownloadInput(body: DownloadRequest): DownloadAndPrepareInput {
  return {
    recordId: body.record_id,
    fileId: body.file_id,
    driveUrl: body.drive_url,
    existingResult: body.existing_result,
  };
}

export function toAutoRenameInput(body: AutoRenameRequest): AutoRenameInput {
  return { recordId: body.record_id, fileId: body.file_id, newName: body.new_name };
}

export function toUploadInput(body: UploadRequest): UploadToDriveInput {
  const urls = body.attachment_urls ?? (body.attachment_url !== undefined ? [body.attachment_url] : []);
  const filenames = body.filenames ?? (body.filename !== undefined ? [body.filename] : undefined);
  return { urls, folderId: body.folder_id, filenames };
}
