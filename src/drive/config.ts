/**
 * Google Drive Configuration
 *
 * Follows the same pattern as src/config.ts and src/airtable/config.ts.
 * Credentials themselves (GOOGLE_SERVICE_ACCOUNT_KEY or the OAuth2 trio) are
 * read by drive-client.ts when the client is first built.
 *
 * Environment variables:
 * - DRIVE_IMPERSONATE_AS: Optional user to impersonate (domain-wide delegation)
 * - DRIVE_DEFAULT_FOLDER_ID: Upload target when a request names no folder (Drive root if unset)
 * - DRIVE_DELETE_MODE: 'delete' (permanent, default) or 'trash'
 */

import 'dotenv/config';

export type DriveDeleteMode = 'delete' | 'trash';

export interface DriveConfig {
  /** Subject for service-account impersonation; undefined acts as the service account itself */
  impersonateAs: string | undefined;
  /** Default parent folder for uploads */
  defaultFolderId: string | undefined;
  /** How auto-delete removes files */
  deleteMode: DriveDeleteMode;
}

export const driveConfig: DriveConfig = {
  impersonateAs: process.env.DRIVE_IMPERSONATE_AS || undefined,
  defaultFolderId: process.env.DRIVE_DEFAULT_FOLDER_ID || undefined,
  deleteMode: process.env.DRIVE_DELETE_MODE === 'trash' ? 'trash' : 'delete',
};
