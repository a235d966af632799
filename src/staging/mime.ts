import { extension, lookup } from 'mime-types';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** Guesses a MIME type from the file extension */
export function mimeTypeFromName(name: string): string {
  return lookup(name) || DEFAULT_MIME_TYPE;
}

/**
 * Dotted extension for a MIME type, used to give downloaded files one.
 * Generic binary content gets none rather than ".bin".
 */
export function extensionForMimeType(mimeType: string): string {
  const base = mimeType.split(';')[0].trim().toLowerCase();
  if (base === '' || base === DEFAULT_MIME_TYPE) return '';
  const ext = extension(base);
  return ext ? `.${ext}` : '';
}
