/**
 * Webhook Layer Types
 */

import type { TransferContext } from '../transfer/types.js';

export interface AuthSettings {
  /** Bearer token for every webhook and operator route; undefined disables the check */
  serverToken: string | undefined;
  /** HMAC-SHA256 secret for X-Hub-Signature-256; undefined disables the check */
  webhookSecret: string | undefined;
}

/** Everything createApp() needs, built once at startup (fakes in tests) */
export interface ServerDependencies {
  transfer: TransferContext;
  auth: AuthSettings;
  /** Write extracted text back to the record's result field */
  writeBack: boolean;
  /** Clock for expiry sweeps triggered over HTTP */
  now?: () => number;
}

/** Codes that appear in error bodies besides the transfer error codes */
export type ResponseCode = 'UNAUTHORIZED' | 'INTERNAL_ERROR' | 'PARTIAL_FAILURE';

/** Result of a best-effort Airtable write made after the main operation */
export type WriteOutcome = 'written' | 'failed' | 'skipped';
