/**
 * Google Drive API Client
 *
 * Supports two authentication modes:
 * 1. OAuth2 refresh token (dev): GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN
 * 2. Service account (production): GOOGLE_SERVICE_ACCOUNT_KEY (base64 JSON key),
 *    optionally impersonating DRIVE_IMPERSONATE_AS
 *
 * OAuth2 is checked first, then service account. The client is built lazily,
 * cached, and carries the global REQUEST_TIMEOUT_MS so no Drive call can
 * stall a webhook indefinitely.
 */

import { google } from 'googleapis';
import { JWT, OAuth2Client } from 'google-auth-library';
import { appConfig } from '../config.js';
import { driveConfig } from './config.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DriveClient = ReturnType<typeof google.drive>;

// ---------------------------------------------------------------------------
// Service Account Key Loading
// ---------------------------------------------------------------------------

function loadServiceAccountKey(): { client_email: string; private_key: string } {
  const encoded = process.env.GOOGLE_SERVICE_ACCOUNT_KEY;
  if (!encoded) {
    throw new Error(
      'No Drive credentials found. Set either:\n' +
        '  - GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN (OAuth2), or\n' +
        '  - GOOGLE_SERVICE_ACCOUNT_KEY (base64-encoded service account key)',
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new Error(
      `GOOGLE_SERVICE_ACCOUNT_KEY is malformed: ${err instanceof Error ? err.message : String(err)}. ` +
        'Ensure it is a base64-encoded JSON service account key file.',
    );
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('client_email' in parsed) ||
    !('private_key' in parsed) ||
    typeof parsed.client_email !== 'string' ||
    typeof parsed.private_key !== 'string'
  ) {
    throw new Error(
      'GOOGLE_SERVICE_ACCOUNT_KEY is malformed: Missing client_email or private_key fields',
    );
  }

  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

// ---------------------------------------------------------------------------
// Drive Client Singleton
// ---------------------------------------------------------------------------

const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

let _driveClient: DriveClient | null = null;
let _driveIdentity: string | undefined;

/**
 * Returns an authenticated Google Drive API v3 client.
 * Lazily initialized and cached for reuse.
 */
export function getDriveClient(): DriveClient {
  if (_driveClient) return _driveClient;

  let auth: OAuth2Client | JWT;

  if (process.env.GOOGLE_REFRESH_TOKEN) {
    const clientId = process.env.GOOGLE_CLIENT_ID;
    const clientSecret = process.env.GOOGLE_CLIENT_SECRET;

    if (!clientId || !clientSecret) {
      throw new Error(
        'OAuth2 credentials incomplete. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET ' +
          'alongside GOOGLE_REFRESH_TOKEN.',
      );
    }

    const oauth2Client = new OAuth2Client(clientId, clientSecret);
    oauth2Client.setCredentials({ refresh_token: process.env.GOOGLE_REFRESH_TOKEN });
    auth = oauth2Client;
    _driveIdentity = undefined;
  } else {
    const key = loadServiceAccountKey();
    auth = new JWT({
      email: key.client_email,
      key: key.private_key,
      scopes: [DRIVE_SCOPE],
      subject: driveConfig.impersonateAs,
    });
    _driveIdentity = driveConfig.impersonateAs ?? key.client_email;
  }

  _driveClient = google.drive({ version: 'v3', auth, timeout: appConfig.requestTimeoutMs });
  return _driveClient;
}

/**
 * The account files must be shared with (service account email or the
 * impersonated user). Undefined in OAuth2 mode or before the client is built.
 */
export function getDriveIdentity(): string | undefined {
  return _driveIdentity;
}

/**
 * Resets the cached Drive client. Used in tests to clear singleton state.
 */
export function resetDriveClient(): void {
  _driveClient = null;
  _driveIdentity = undefined;
}
