import type { AttachmentDelivery } from '../config.js';
import type { AirtableFieldNames } from '../airtable/config.js';
import type { RecordClient } from '../airtable/airtable-client.js';
import type { DriveClient } from '../drive/drive-client.js';
import type { DriveDeleteMode } from '../drive/config.js';
import type { TempFileStore } from '../staging/temp-file-store.js';
import type { TextExtractor } from './text-extractor.js';

// ============================================================================
// Transfer Context: everything an operation may touch, injected per call
// ============================================================================

export interface TransferConfig {
  /** Prefix for attachment fetch URLs, without trailing slash */
  publicBaseUrl: string;
  delivery: AttachmentDelivery;
  /** Upload target when a request names no folder; undefined means Drive root */
  defaultFolderId: string | undefined;
  deleteMode: DriveDeleteMode;
  /** Bound on each attachment URL download */
  downloadTimeoutMs: number;
  fields: AirtableFieldNames;
}

export interface TransferContext {
  drive: DriveClient;
  records: RecordClient;
  store: TempFileStore;
  extractors: readonly TextExtractor[];
  config: TransferConfig;
}
