/**
 * Google Drive File Operations
 *
 * The storage-service side of every transfer:
 * - getFileMetadata: name, MIME type and size of a file
 * - downloadFile: file bytes (Google Workspace documents exported as PDF)
 * - renameFile: single files.update call
 * - deleteFile: permanent delete or move to trash
 * - uploadFile: create a file in a folder (or the Drive root)
 *
 * All functions take a DriveClient parameter for testability and translate
 * Drive API failures into the typed errors of src/transfer/errors.ts:
 * 401/403 -> PermissionError (with a sharing hint), 404 -> NotFoundError,
 * anything else (including timeouts) -> TransferError.
 */

import { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import { getDriveIdentity } from './drive-client.js';
import type { DriveClient } from './drive-client.js';
import type { DriveDeleteMode } from './config.js';
import {
  IntegrationError,
  NotFoundError,
  PermissionError,
  TransferError,
  errorMessage,
} from '../transfer/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DriveFileMetadata {
  id: string;
  name: string;
  mimeType: string;
  sizeBytes: number | null;
}

export interface DownloadedDriveFile {
  bytes: Buffer;
  /** File name, with .pdf appended for exported Workspace documents */
  name: string;
  /** MIME type of the returned bytes */
  mimeType: string;
}

export interface UploadedDriveFile {
  id: string;
  name: string;
  webViewLink: string | null;
}

export type DriveAction = 'download' | 'rename' | 'delete' | 'upload';

// ---------------------------------------------------------------------------
// Error Translation
// ---------------------------------------------------------------------------

const PERMISSION_HINTS: Record<DriveAction, string> = {
  download: 'Viewer access is enough to download',
  rename: 'Editor access is required to rename',
  delete: 'Manager or Owner access is required to delete',
  upload: 'Editor access to the destination folder is required to upload',
};

/** HTTP status of a googleapis (gaxios) error, if it carries one */
export function driveErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if (
    'response' in err &&
    typeof err.response === 'object' &&
    err.response !== null &&
    'status' in err.response &&
    typeof err.response.status === 'number'
  ) {
    return err.response.status;
  }
  if ('code' in err && typeof err.code === 'number') return err.code;
  return undefined;
}

/** Maps a Drive API failure onto the transfer error taxonomy */
export function toDriveError(err: unknown, action: DriveAction, target: string): IntegrationError {
  if (err instanceof IntegrationError) return err;

  const status = driveErrorStatus(err);
  const message = errorMessage(err);

  if (status === 404) {
    return new NotFoundError(`Drive file ${target} not found (${action})`);
  }

  if ((status === 401 || status === 403) && !/rate ?limit/i.test(message)) {
    const identity = getDriveIdentity() ?? "the integration's service account";
    return new PermissionError(
      `Permission denied to ${action} Drive file ${target}. ` +
        `Share the file with ${identity}. ${PERMISSION_HINTS[action]}.`,
    );
  }

  return new TransferError(
    `Drive ${action} failed for ${target}${status ? ` (HTTP ${status})` : ''}: ${message}`,
  );
}

async function withDriveErrors<T>(
  action: DriveAction,
  target: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (err) {
    throw toDriveError(err, action, target);
  }
}

// ---------------------------------------------------------------------------
// Google Workspace Export
// ---------------------------------------------------------------------------

const WORKSPACE_PREFIX = 'application/vnd.google-apps.';

/** Workspace types that can be exported as PDF */
const PDF_EXPORTABLE = new Set([
  'application/vnd.google-apps.document',
  'application/vnd.google-apps.spreadsheet',
  'application/vnd.google-apps.presentation',
]);

function exportedName(name: string): string {
  return name.toLowerCase().endsWith('.pdf') ? name : `${name}.pdf`;
}

// ---------------------------------------------------------------------------
// File Operations
// ---------------------------------------------------------------------------

/**
 * Fetches name, MIME type and size of a Drive file.
 */
export async function getFileMetadata(
  drive: DriveClient,
  fileId: string,
): Promise<DriveFileMetadata> {
  const response = await withDriveErrors('download', fileId, () =>
    drive.files.get({
      fileId,
      fields: 'id, name, mimeType, size',
      supportsAllDrives: true,
    }),
  );

  const { data } = response;
  return {
    id: data.id ?? fileId,
    name: data.name ?? fileId,
    mimeType: data.mimeType ?? 'application/octet-stream',
    sizeBytes: data.size ? parseInt(data.size, 10) : null,
  };
}

/**
 * Downloads a Drive file's bytes.
 *
 * Google Docs, Sheets and Slides are exported as PDF; other Workspace types
 * (forms, folders, shortcuts) cannot be downloaded and fail with TransferError.
 */
export async function downloadFile(
  drive: DriveClient,
  fileId: string,
): Promise<DownloadedDriveFile> {
  const metadata = await getFileMetadata(drive, fileId);

  if (metadata.mimeType.startsWith(WORKSPACE_PREFIX)) {
    if (!PDF_EXPORTABLE.has(metadata.mimeType)) {
      throw new TransferError(
        `Unsupported Google Workspace file type: ${metadata.mimeType} (${fileId})`,
      );
    }

    const bytes = await withDriveErrors('download', fileId, async () => {
      const response = await drive.files.export(
        { fileId, mimeType: 'application/pdf' },
        { responseType: 'stream' },
      );
      return buffer(response.data);
    });

    console.log(`[drive] Exported ${fileId} as PDF (${bytes.length} bytes)`);
    return { bytes, name: exportedName(metadata.name), mimeType: 'application/pdf' };
  }

  const bytes = await withDriveErrors('download', fileId, async () => {
    const response = await drive.files.get(
      { fileId, alt: 'media', supportsAllDrives: true },
      { responseType: 'stream' },
    );
    return buffer(response.data);
  });

  console.log(`[drive] Downloaded ${fileId} (${bytes.length} bytes)`);
  return { bytes, name: metadata.name, mimeType: metadata.mimeType };
}

/**
 * Renames a Drive file. Exactly one files.update call.
 *
 * @returns The name Drive reports after the update
 */
export async function renameFile(
  drive: DriveClient,
  fileId: string,
  newName: string,
): Promise<string> {
  const response = await withDriveErrors('rename', fileId, () =>
    drive.files.update({
      fileId,
      requestBody: { name: newName },
      fields: 'id, name',
      supportsAllDrives: true,
    }),
  );

  const name = response.data.name ?? newName;
  console.log(`[drive] Renamed ${fileId} to "${name}"`);
  return name;
}

/**
 * Deletes a Drive file permanently, or moves it to trash.
 *
 * @throws NotFoundError when the file does not exist (callers decide whether that matters)
 * @throws PermissionError when the identity lacks delete rights
 */
export async function deleteFile(
  drive: DriveClient,
  fileId: string,
  mode: DriveDeleteMode,
): Promise<void> {
  await withDriveErrors('delete', fileId, async () => {
    if (mode === 'trash') {
      await drive.files.update({
        fileId,
        requestBody: { trashed: true },
        supportsAllDrives: true,
      });
    } else {
      await drive.files.delete({ fileId, supportsAllDrives: true });
    }
  });

  console.log(`[drive] ${mode === 'trash' ? 'Trashed' : 'Deleted'} ${fileId}`);
}

/**
 * Uploads bytes as a new Drive file.
 *
 * @param folderId - Parent folder; omitted means the identity's Drive root
 */
export async function uploadFile(
  drive: DriveClient,
  bytes: Buffer,
  filename: string,
  mimeType: string,
  folderId?: string,
): Promise<UploadedDriveFile> {
  const response = await withDriveErrors('upload', folderId ?? 'root', () =>
    drive.files.create({
      requestBody: {
        name: filename,
        parents: folderId ? [folderId] : undefined,
      },
      media: {
        mimeType,
        body: Readable.from(bytes),
      },
      fields: 'id, name, webViewLink',
      supportsAllDrives: true,
    }),
  );

  const fileId = response.data.id;
  if (!fileId) {
    throw new TransferError(`Drive API returned no ID after uploading "${filename}"`);
  }

  console.log(`[drive] Uploaded "${filename}" to ${folderId ?? 'root'} (file ID: ${fileId})`);
  return {
    id: fileId,
    name: response.data.name ?? filename,
    webViewLink: response.data.webViewLink ?? null,
  };
}
