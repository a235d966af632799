// ============================================================================
// Transfer Module: Barrel Export
// ============================================================================
//
// The orchestrated operations the webhook handlers call. Each takes a
// TransferContext so Drive, Airtable and the staging store can be swapped
// for fakes.

export type { TransferContext, TransferConfig } from './types.js';

export { downloadAndPrepare, attachmentUrl } from './download-and-prepare.js';
export type {
  DownloadAndPrepareInput,
  DownloadAndPrepareResult,
  PreparedDownload,
  SkippedDownload,
  AttachmentReference,
} from './download-and-prepare.js';

export { renameDriveFile } from './rename.js';
export type { RenameInput, RenameResult } from './rename.js';

export { autoRename } from './auto-rename.js';
export type { AutoRenameInput, AutoRenameResult } from './auto-rename.js';

export { autoDelete } from './auto-delete.js';
export type { AutoDeleteResult } from './auto-delete.js';

export { uploadToDrive } from './upload-to-drive.js';
export type {
  UploadToDriveInput,
  UploadToDriveResult,
  UploadItemResult,
  UploadOutcome,
} from './upload-to-drive.js';

export { extractDriveFileId, isAlreadyProcessed } from './file-reference.js';
export { DEFAULT_EXTRACTORS, extractText } from './text-extractor.js';
export type { TextExtractor, ExtractionResult } from './text-extractor.js';

export * from './errors.js';
