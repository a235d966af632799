/**
 * Upload-From-Record-To-Storage
 *
 * Copies Airtable attachments (or any http(s) URL) into a Drive folder.
 * Every URL is handled on its own: one failing download or upload is
 * reported on its item and the remaining URLs still run. The aggregate
 * outcome separates total success, partial success and total failure.
 */

import { extname } from 'node:path';
import { uploadFile } from '../drive/drive-files.js';
import { DEFAULT_MIME_TYPE, extensionForMimeType, mimeTypeFromName } from '../staging/mime.js';
import {
  DownloadError,
  IntegrationError,
  InvalidReferenceError,
  errorMessage,
} from './errors.js';
import type { IntegrationErrorCode } from './errors.js';
import type { TransferContext } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UploadToDriveInput {
  urls: string[];
  folderId?: string;
  /** Explicit names by position; missing entries fall back to the source name */
  filenames?: Array<string | undefined>;
}

export interface UploadItemSuccess {
  index: number;
  url: string;
  success: true;
  fileId: string;
  fileName: string;
  webViewLink: string | null;
}

export interface UploadItemFailure {
  index: number;
  url: string;
  success: false;
  error: string;
  code: IntegrationErrorCode;
}

export type UploadItemResult = UploadItemSuccess | UploadItemFailure;

export type UploadOutcome = 'success' | 'partial' | 'failure';

export interface UploadToDriveResult {
  outcome: UploadOutcome;
  folderId: string | null;
  uploaded: number;
  failed: number;
  items: UploadItemResult[];
}

interface FetchedAttachment {
  bytes: Buffer;
  contentType: string | null;
  disposition: string | null;
}

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** File name from a Content-Disposition header (RFC 6266 filename* preferred) */
export function filenameFromContentDisposition(header: string | null): string | undefined {
  if (!header) return undefined;

  const extended = /filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i.exec(header);
  if (extended) {
    const name = safeDecode(extended[1].trim());
    if (name) return name;
  }

  const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i.exec(header);
  const name = (plain?.[1] ?? plain?.[2])?.trim();
  return name ? name : undefined;
}

/** Last non-empty path segment of a URL, decoded */
export function filenameFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }

  const segments = pathname.split('/').filter((segment) => segment.length > 0);
  const last = segments.at(-1);
  return last ? safeDecode(last) : undefined;
}

/**
 * Picks the Drive file name for one item.
 *
 * Explicit name first (the source extension is appended when it has none),
 * then Content-Disposition, then the URL path, then attachment-<n>.
 */
export function resolveUploadName(
  explicit: string | undefined,
  source: FetchedAttachment,
  url: string,
  index: number,
): string {
  const sourceName = filenameFromContentDisposition(source.disposition) ?? filenameFromUrl(url);
  const sourceExt = (sourceName ? extname(sourceName) : '') || extensionForMimeType(source.contentType ?? '');

  const trimmed = explicit?.trim();
  if (trimmed) {
    return extname(trimmed) === '' ? `${trimmed}${sourceExt}` : trimmed;
  }

  return sourceName ?? `attachment-${index + 1}${sourceExt}`;
}

function resolveMimeType(contentType: string | null, fileName: string): string {
  const base = contentType?.split(';')[0].trim().toLowerCase();
  if (base && base !== DEFAULT_MIME_TYPE) return base;
  return mimeTypeFromName(fileName);
}

// ---------------------------------------------------------------------------
// Download
// ---------------------------------------------------------------------------

function validateUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidReferenceError(`"${url}" is not a valid URL`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new InvalidReferenceError(`Only http(s) attachment URLs are supported, got ${parsed.protocol}`);
  }
  return parsed;
}

async function fetchAttachment(url: string, timeoutMs: number): Promise<FetchedAttachment> {
  const parsed = validateUrl(url);

  let response: Response;
  try {
    response = await fetch(parsed, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new DownloadError(`Download from ${parsed.host} failed: ${errorMessage(err)}`);
  }

  if (!response.ok) {
    throw new DownloadError(`Download from ${parsed.host} failed: HTTP ${response.status}`);
  }

  let bytes: Buffer;
  try {
    bytes = Buffer.from(await response.arrayBuffer());
  } catch (err) {
    throw new DownloadError(`Reading body from ${parsed.host} failed: ${errorMessage(err)}`);
  }

  return {
    bytes,
    contentType: response.headers.get('content-type'),
    disposition: response.headers.get('content-disposition'),
  };
}

// ---------------------------------------------------------------------------
// Operation
// ---------------------------------------------------------------------------

function outcomeOf(uploaded: number, failed: number): UploadOutcome {
  if (failed === 0) return 'success';
  return uploaded > 0 ? 'partial' : 'failure';
}

export async function uploadToDrive(
  ctx: TransferContext,
  input: UploadToDriveInput,
): Promise<UploadToDriveResult> {
  if (input.urls.length === 0) {
    throw new InvalidReferenceError('At least one attachment URL is required');
  }

  const folderId = input.folderId ?? ctx.config.defaultFolderId;
  const items: UploadItemResult[] = [];

  for (const [index, url] of input.urls.entries()) {
    try {
      const source = await fetchAttachment(url, ctx.config.downloadTimeoutMs);
      const fileName = resolveUploadName(input.filenames?.[index], source, url, index);
      const mimeType = resolveMimeType(source.contentType, fileName);

      const uploaded = await uploadFile(ctx.drive, source.bytes, fileName, mimeType, folderId);
      items.push({
        index,
        url,
        success: true,
        fileId: uploaded.id,
        fileName: uploaded.name,
        webViewLink: uploaded.webViewLink,
      });
    } catch (err) {
      const code: IntegrationErrorCode = err instanceof IntegrationError ? err.code : 'TRANSFER_FAILED';
      console.warn(`[transfer] Upload item ${index} failed (${code}):`, errorMessage(err));
      items.push({ index, url, success: false, error: errorMessage(err), code });
    }
  }

  const uploaded = items.filter((item) => item.success).length;
  const failed = items.length - uploaded;
  const outcome = outcomeOf(uploaded, failed);

  console.log('[transfer] Upload to Drive finished', { outcome, uploaded, failed, folderId: folderId ?? 'root' });
  return { outcome, folderId: folderId ?? null, uploaded, failed, items };
}
