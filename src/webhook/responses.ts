import type { Response } from 'express';
import { IntegrationError, errorMessage } from '../transfer/errors.js';
import type { IntegrationErrorCode } from '../transfer/errors.js';
import type { ResponseCode } from './types.js';

// ============================================================================
// Error Responses: every failure leaves as { success: false, error, code }
// ============================================================================

export interface ErrorBody {
  success: false;
  error: string;
  code: IntegrationErrorCode | ResponseCode;
}

export function sendErrorBody(
  res: Response,
  status: number,
  error: string,
  code: IntegrationErrorCode | ResponseCode,
): void {
  const body: ErrorBody = { success: false, error, code };
  res.status(status).json(body);
}

/** Maps a thrown value to its HTTP status and body. Unknown errors become 500. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof IntegrationError) {
    sendErrorBody(res, err.httpStatus, err.message, err.code);
    return;
  }

  console.error('[server] Unhandled error:', errorMessage(err));
  sendErrorBody(res, 500, 'Internal server error', 'INTERNAL_ERROR');
}

/** body-parser reports unparseable JSON as a 400 SyntaxError */
export function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}
