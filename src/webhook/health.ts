/**
 * Health Check Endpoint Handler
 *
 * Returns server status, version, timestamp and which integrations are
 * configured. Used by load balancers, monitoring, and manual verification.
 */

import type { Request, Response, RequestHandler } from 'express';
import type { ServerDependencies } from './types.js';

export const SERVICE_NAME = 'drive-airtable-bridge';

export function createHealthHandler(deps: ServerDependencies): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      service: SERVICE_NAME,
      version: process.env.npm_package_version ?? 'dev',
      timestamp: new Date().toISOString(),
      features: {
        textExtraction: deps.transfer.extractors.map((extractor) => extractor.name),
        driveIntegration: true,
        airtableIntegration: true,
        bearerTokenAuth: deps.auth.serverToken !== undefined,
        webhookSignature: deps.auth.webhookSecret !== undefined,
        attachmentDelivery: deps.transfer.config.delivery,
        writeBack: deps.writeBack,
      },
    });
  };
}
