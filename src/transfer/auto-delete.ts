import { deleteFile } from '../drive/drive-files.js';
import type { DriveDeleteMode } from '../drive/config.js';
import { NotFoundError } from './errors.js';
import type { TransferContext } from './types.js';

export interface AutoDeleteResult {
  status: 'deleted' | 'already_deleted';
  fileId: string;
  mode: DriveDeleteMode;
}

/**
 * Deletes (or trashes) a Drive file.
 *
 * Three outcomes: deleted; already_deleted when Drive reports 404;
 * PermissionError thrown as-is so the caller can ask for more access.
 */
export async function autoDelete(ctx: TransferContext, fileId: string): Promise<AutoDeleteResult> {
  const mode = ctx.config.deleteMode;

  try {
    await deleteFile(ctx.drive, fileId, mode);
  } catch (err) {
    if (err instanceof NotFoundError) {
      console.log('[transfer] File already deleted', { fileId });
      return { status: 'already_deleted', fileId, mode };
    }
    throw err;
  }

  return { status: 'deleted', fileId, mode };
}
