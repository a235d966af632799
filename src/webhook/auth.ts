/**
 * Webhook Authentication
 *
 * Two independent gates:
 * - Bearer token (SERVER_TOKEN) on every webhook and operator route
 * - HMAC-SHA256 of the raw body in X-Hub-Signature-256 (WEBHOOK_SECRET),
 *   on webhook routes only
 *
 * Either gate is skipped when its secret is unset. Comparisons are constant-time.
 */

import { createHash, createHmac, timingSafeEqual } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { sendErrorBody } from './responses.js';

const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/**
 * `verify` callback for express.json(): keeps the exact bytes the signature
 * was computed over.
 */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function rawBodyOf(req: IncomingMessage): Buffer {
  return rawBodies.get(req) ?? Buffer.alloc(0);
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** Constant-time string comparison (lengths are hidden by hashing first) */
export function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function bearerToken(header: string | undefined): string | undefined {
  const match = header?.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : undefined;
}

export function computeSignature(secret: string, body: Buffer): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/** Accepts "sha256=<hex>" or a bare hex digest */
export function verifySignature(secret: string, body: Buffer, header: string | undefined): boolean {
  if (!header) return false;
  const provided = header.trim().replace(/^sha256=/i, '').toLowerCase();
  return safeEqual(provided, computeSignature(secret, body));
}

function unauthorized(res: Response, error: string): void {
  sendErrorBody(res, 401, error, 'UNAUTHORIZED');
}

export function requireBearerToken(serverToken: string | undefined): RequestHandler {
  if (!serverToken) {
    console.warn('[auth] SERVER_TOKEN is not set; webhook endpoints are unauthenticated');
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req.get('authorization'));
    if (!token || !safeEqual(token, serverToken)) {
      console.warn('[auth] Rejected request without a valid bearer token', { path: req.path });
      unauthorized(res, 'Unauthorized');
      return;
    }
    next();
  };
}

export function requireSignature(webhookSecret: string | undefined): RequestHandler {
  if (!webhookSecret) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  return (req: Request, res: Response, next: NextFunction) => {
    if (!verifySignature(webhookSecret, rawBodyOf(req), req.get('x-hub-signature-256'))) {
      console.warn('[auth] Rejected request with a bad signature', { path: req.path });
      unauthorized(res, 'Invalid signature');
      return;
    }
    next();
  };
}
