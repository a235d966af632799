// ============================================================================
// Webhook Module: Barrel Export
// ============================================================================

export { createApp } from './server.js';
export { createHealthHandler, SERVICE_NAME } from './health.js';
export { requireBearerToken, requireSignature, captureRawBody, computeSignature, verifySignature } from './auth.js';
export { sanitizeForLog, isSecretField, SECRET_KEY_FRAGMENTS, CONTENT_FIELDS } from './sanitize.js';
export type { ServerDependencies, AuthSettings, WriteOutcome } from './types.js';
