/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the HTTP server, auth gate and
 * the staging directory. Airtable and Drive settings live in
 * src/airtable/config.ts and src/drive/config.ts (same pattern).
 *
 * Environment variables:
 * - PORT: HTTP server port (default 5001)
 * - APP_ENV: 'development' | 'production' (default development)
 * - SERVER_TOKEN: Bearer token required on every webhook endpoint (auth disabled if unset)
 * - WEBHOOK_SECRET: Optional HMAC-SHA256 secret for X-Hub-Signature-256 validation
 * - PUBLIC_BASE_URL: Public prefix the reverse proxy exposes (used to build attachment URLs)
 * - TEMP_FILES_DIR: Staging directory (default ./temp_files)
 * - ATTACHMENT_RETENTION_SECONDS: Staged file lifetime (default 300)
 * - SWEEP_INTERVAL_SECONDS: Periodic sweep interval (default 60)
 * - MIN_FREE_BYTES: Free-space headroom kept on the staging volume (default 50 MiB)
 * - ATTACHMENT_DELIVERY: 'url' (public fetch path) or 'inline' (base64 data URL)
 * - REQUEST_TIMEOUT_MS: Timeout for every outbound call (default 30000)
 */

import 'dotenv/config';

export type AttachmentDelivery = 'url' | 'inline';

export interface AppConfig {
  isDev: boolean;
  server: {
    port: number;
    publicBaseUrl: string;
  };
  auth: {
    serverToken: string | undefined;
    webhookSecret: string | undefined;
  };
  staging: {
    dir: string;
    retentionSeconds: number;
    sweepIntervalSeconds: number;
    minFreeBytes: number;
    delivery: AttachmentDelivery;
  };
  requestTimeoutMs: number;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] || fallback;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseDelivery(value: string): AttachmentDelivery {
  return value === 'inline' ? 'inline' : 'url';
}

const isDev = optionalEnv('APP_ENV', 'development') !== 'production';
const port = intEnv('PORT', 5001);

export const appConfig: AppConfig = {
  isDev,
  server: {
    port,
    publicBaseUrl: optionalEnv('PUBLIC_BASE_URL', `http://localhost:${port}`).replace(/\/+$/, ''),
  },
  auth: {
    serverToken: process.env.SERVER_TOKEN || undefined,
    webhookSecret: process.env.WEBHOOK_SECRET || undefined,
  },
  staging: {
    dir: optionalEnv('TEMP_FILES_DIR', './temp_files'),
    retentionSeconds: intEnv('ATTACHMENT_RETENTION_SECONDS', 300),
    sweepIntervalSeconds: intEnv('SWEEP_INTERVAL_SECONDS', 60),
    minFreeBytes: intEnv('MIN_FREE_BYTES', 50 * 1024 * 1024),
    delivery: parseDelivery(optionalEnv('ATTACHMENT_DELIVERY', 'url')),
  },
  requestTimeoutMs: intEnv('REQUEST_TIMEOUT_MS', 30_000),
};
