/**
 * Airtable Record Client
 *
 * Thin REST client for the one table this service works with:
 *   GET   {apiBase}/{baseId}/{table}/{recordId}
 *   PATCH {apiBase}/{baseId}/{table}/{recordId}   { fields: {...} }
 *
 * Responses are validated with zod before use. Every request is bounded by
 * REQUEST_TIMEOUT_MS. Field values are never logged (extracted text can be
 * sensitive); only record ids and field names are.
 */

import { z } from 'zod';
import { appConfig } from '../config.js';
import { airtableConfig } from './config.js';
import {
  PermissionError,
  RecordNotFoundError,
  TransferError,
  errorMessage,
} from '../transfer/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RecordFields = Record<string, unknown>;

export interface AirtableRecord {
  id: string;
  fields: RecordFields;
}

/** The record-database operations the orchestrator depends on */
export interface RecordClient {
  /** Returns null when the record does not exist */
  getRecord(recordId: string): Promise<AirtableRecord | null>;
  /** Partial update; fields not named are left untouched */
  updateRecord(recordId: string, fields: RecordFields): Promise<AirtableRecord>;
}

export interface AirtableClientOptions {
  apiKey: string;
  baseId: string;
  tableName: string;
  apiBase: string;
  timeoutMs: number;
}

const recordSchema = z.object({
  id: z.string(),
  fields: z.record(z.unknown()).default({}),
});

// ---------------------------------------------------------------------------
// REST implementation
// ---------------------------------------------------------------------------

export class AirtableRecordClient implements RecordClient {
  constructor(private readonly options: AirtableClientOptions) {}

  async getRecord(recordId: string): Promise<AirtableRecord | null> {
    const response = await this.request('GET', recordId);

    if (response.status === 404) {
      console.warn('[airtable] Record not found', { recordId });
      return null;
    }

    return this.parseRecord(response, recordId);
  }

  async updateRecord(recordId: string, fields: RecordFields): Promise<AirtableRecord> {
    const response = await this.request('PATCH', recordId, { fields });

    if (response.status === 404) {
      throw new RecordNotFoundError(recordId);
    }

    const record = await this.parseRecord(response, recordId);
    console.log('[airtable] Updated record', { recordId, fields: Object.keys(fields) });
    return record;
  }

  private recordUrl(recordId: string): string {
    const { apiBase, baseId, tableName } = this.options;
    return [apiBase, encodeURIComponent(baseId), encodeURIComponent(tableName), encodeURIComponent(recordId)].join('/');
  }

  private async request(method: 'GET' | 'PATCH', recordId: string, body?: unknown): Promise<Response> {
    try {
      return await fetch(this.recordUrl(recordId), {
        method,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          Accept: 'application/json',
          ...(body !== undefined && { 'Content-Type': 'application/json' }),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new TransferError(`Airtable ${method} ${recordId} failed: ${errorMessage(err)}`);
    }
  }

  private async parseRecord(response: Response, recordId: string): Promise<AirtableRecord> {
    if (response.status === 401 || response.status === 403) {
      throw new PermissionError(
        `Airtable rejected the request for record ${recordId} (HTTP ${response.status}). ` +
          'Check that AIRTABLE_API_KEY has access to the base and table.',
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new TransferError(
        `Airtable API error: ${response.status} ${response.statusText} for record ${recordId}` +
          (text ? ` (${text.slice(0, 200)})` : ''),
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new TransferError(`Airtable returned invalid JSON for record ${recordId}: ${errorMessage(err)}`);
    }

    const parsed = recordSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransferError(`Airtable returned an unexpected record shape for ${recordId}`);
    }
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// Singleton
// ---------------------------------------------------------------------------

let _recordClient: RecordClient | null = null;

/** Returns the configured Airtable client, built on first use. */
export function getRecordClient(): RecordClient {
  if (_recordClient) return _recordClient;

  _recordClient = new AirtableRecordClient({
    apiKey: airtableConfig.apiKey,
    baseId: airtableConfig.baseId,
    tableName: airtableConfig.tableName,
    apiBase: airtableConfig.apiBase,
    timeoutMs: appConfig.requestTimeoutMs,
  });
  return _recordClient;
}

/** Clears the cached client. Used in tests. */
export function resetRecordClient(): void {
  _recordClient = null;
}
