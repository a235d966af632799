import { renameFile } from '../drive/drive-files.js';
import { InvalidNameError } from './errors.js';
import type { TransferContext } from './types.js';

export interface RenameInput {
  fileId: string;
  newName: string;
}

export interface RenameResult {
  fileId: string;
  newName: string;
}

/**
 * Renames a Drive file. The name is validated before Drive is called;
 * Drive failures arrive typed (NotFoundError, PermissionError, TransferError).
 * Re-renaming to the current name is harmless, so prior state is not checked.
 */
export async function renameDriveFile(ctx: TransferContext, input: RenameInput): Promise<RenameResult> {
  const newName = input.newName.trim();
  if (newName === '') {
    throw new InvalidNameError('new_name must not be empty');
  }

  const applied = await renameFile(ctx.drive, input.fileId, newName);
  return { fileId: input.fileId, newName: applied };
}
