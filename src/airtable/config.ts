import 'dotenv/config';

/**
 * Airtable Configuration
 *
 * Environment variables:
 * - AIRTABLE_API_KEY: Personal access token (required)
 * - AIRTABLE_BASE_ID: Base holding the file records (required)
 * - AIRTABLE_TABLE_NAME: Table name or id (default "Files")
 * - AIRTABLE_API_BASE: REST endpoint (default https://api.airtable.com/v0)
 * - AIRTABLE_WRITE_BACK: Write extracted text back to the result field (default true)
 * - AIRTABLE_FIELD_*: Field-name overrides, see `fields` below
 */

export interface AirtableFieldNames {
  /** Where extracted text lands; also the idempotency marker */
  result: string;
  suggestedName: string;
  originalName: string;
  fileId: string;
  renameStatus: string;
  deleteStatus: string;
}

export interface AirtableConfig {
  apiKey: string;
  baseId: string;
  tableName: string;
  apiBase: string;
  writeBack: boolean;
  fields: AirtableFieldNames;
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] || fallback;
}

export const airtableConfig: AirtableConfig = {
  apiKey: requiredEnv('AIRTABLE_API_KEY'),
  baseId: requiredEnv('AIRTABLE_BASE_ID'),
  tableName: optionalEnv('AIRTABLE_TABLE_NAME', 'Files'),
  apiBase: optionalEnv('AIRTABLE_API_BASE', 'https://api.airtable.com/v0').replace(/\/+$/, ''),
  writeBack: optionalEnv('AIRTABLE_WRITE_BACK', 'true').toLowerCase() !== 'false',
  fields: {
    result: optionalEnv('AIRTABLE_FIELD_RESULT', 'Text'),
    suggestedName: optionalEnv('AIRTABLE_FIELD_SUGGESTED_NAME', 'Suggested File Name'),
    originalName: optionalEnv('AIRTABLE_FIELD_ORIGINAL_NAME', 'Original File Name'),
    fileId: optionalEnv('AIRTABLE_FIELD_FILE_ID', 'Google Drive File ID'),
    renameStatus: optionalEnv('AIRTABLE_FIELD_RENAME_STATUS', 'Rename Status'),
    deleteStatus: optionalEnv('AIRTABLE_FIELD_DELETE_STATUS', 'Delete Status'),
  },
};
