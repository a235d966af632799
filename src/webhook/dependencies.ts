/**
 * Production wiring: real Drive and Airtable clients, the configured staging
 * store and the default text extractors. Importing this module reads the
 * required Airtable environment variables.
 */

import { appConfig } from '../config.js';
import { airtableConfig } from '../airtable/config.js';
import { getRecordClient } from '../airtable/airtable-client.js';
import { driveConfig } from '../drive/config.js';
import { getDriveClient } from '../drive/drive-client.js';
import { TempFileStore } from '../staging/temp-file-store.js';
import { DEFAULT_EXTRACTORS } from '../transfer/index.js';
import type { ServerDependencies } from './types.js';

export function createTempFileStore(): TempFileStore {
  return new TempFileStore({
    rootDir: appConfig.staging.dir,
    retentionSeconds: appConfig.staging.retentionSeconds,
    minFreeBytes: appConfig.staging.minFreeBytes,
  });
}

export function buildDependencies(store: TempFileStore): ServerDependencies {
  return {
    transfer: {
      drive: getDriveClient(),
      records: getRecordClient(),
      store,
      extractors: DEFAULT_EXTRACTORS,
      config: {
        publicBaseUrl: appConfig.server.publicBaseUrl,
        delivery: appConfig.staging.delivery,
        defaultFolderId: driveConfig.defaultFolderId,
        deleteMode: driveConfig.deleteMode,
        downloadTimeoutMs: appConfig.requestTimeoutMs,
        fields: airtableConfig.fields,
      },
    },
    auth: appConfig.auth,
    writeBack: airtableConfig.writeBack,
  };
}
