// ============================================================================
// Transfer Error Types: typed failures for every orchestrated operation
// ============================================================================

/** Machine-readable error codes returned to webhook callers */
export type IntegrationErrorCode =
  | 'INVALID_REFERENCE'
  | 'INVALID_NAME'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'RECORD_NOT_FOUND'
  | 'STORAGE_FULL'
  | 'TRANSFER_FAILED'
  | 'DOWNLOAD_FAILED';

/**
 * Base error for all integration failures.
 * Carries the code and HTTP status the request handlers respond with.
 */
export class IntegrationError extends Error {
  readonly code: IntegrationErrorCode;
  readonly httpStatus: number;

  constructor(code: IntegrationErrorCode, httpStatus: number, message: string) {
    super(message);
    this.name = 'IntegrationError';
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

/** No usable file identifier, URL or request shape */
export class InvalidReferenceError extends IntegrationError {
  constructor(message: string) {
    super('INVALID_REFERENCE', 400, message);
    this.name = 'InvalidReferenceError';
  }
}

/** A file name is empty (or nothing is left of it after sanitization) */
export class InvalidNameError extends IntegrationError {
  constructor(message: string) {
    super('INVALID_NAME', 400, message);
    this.name = 'InvalidNameError';
  }
}

/** The storage service (or staging directory) has no such file */
export class NotFoundError extends IntegrationError {
  constructor(message: string) {
    super('NOT_FOUND', 404, message);
    this.name = 'NotFoundError';
  }
}

/**
 * The storage service denied access.
 * The default message tells the operator how to fix it: the file has to be
 * shared with the integration's service account.
 */
export class PermissionError extends IntegrationError {
  constructor(message: string) {
    super('PERMISSION_DENIED', 403, message);
    this.name = 'PermissionError';
  }
}

/** The record database has no record with the requested id */
export class RecordNotFoundError extends IntegrationError {
  constructor(recordId: string) {
    super('RECORD_NOT_FOUND', 404, `Record ${recordId} not found in Airtable`);
    this.name = 'RecordNotFoundError';
  }
}

/** Not enough free space in the staging directory */
export class StorageFullError extends IntegrationError {
  constructor(message: string) {
    super('STORAGE_FULL', 507, message);
    this.name = 'StorageFullError';
  }
}

/** Generic transport failure or timeout talking to Drive or Airtable */
export class TransferError extends IntegrationError {
  constructor(message: string) {
    super('TRANSFER_FAILED', 502, message);
    this.name = 'TransferError';
  }
}

/** Fetching bytes from an arbitrary attachment URL failed */
export class DownloadError extends IntegrationError {
  constructor(message: string) {
    super('DOWNLOAD_FAILED', 502, message);
    this.name = 'DownloadError';
  }
}

/** Error message for any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
