/**
 * Shared fakes for transfer operation tests: a mock Drive client, an
 * in-memory record client and a real TempFileStore in a throwaway directory.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { vi } from 'vitest';
import type { AirtableRecord, RecordClient, RecordFields } from '../../airtable/airtable-client.js';
import type { DriveClient } from '../../drive/drive-client.js';
import { TempFileStore } from '../../staging/temp-file-store.js';
import { plainTextExtractor } from '../text-extractor.js';
import type { TransferConfig, TransferContext } from '../types.js';

export interface MockDriveFiles {
  get: ReturnType<typeof vi.fn>;
  export: ReturnType<typeof vi.fn>;
  update: ReturnType<typeof vi.fn>;
  delete: ReturnType<typeof vi.fn>;
  create: ReturnType<typeof vi.fn>;
}

export function createMockDrive(): { drive: DriveClient; files: MockDriveFiles } {
  const files: MockDriveFiles = {
    get: vi.fn(),
    export: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
    create: vi.fn(),
  };
  const drive = { files } as unknown as DriveClient;
  return { drive, files };
}

/** Queues a metadata response followed by a media download */
export function mockDriveDownload(files: MockDriveFiles, name: string, mimeType: string, content: string): void {
  files.get
    .mockResolvedValueOnce({ data: { id: 'ignored', name, mimeType, size: String(Buffer.byteLength(content)) } })
    .mockResolvedValueOnce({ data: Readable.from([Buffer.from(content)]) });
}

export function apiError(status: number, message = 'Request failed'): Error {
  return Object.assign(new Error(message), { status });
}

/** In-memory stand-in for the Airtable client */
export class FakeRecordClient implements RecordClient {
  readonly records = new Map<string, RecordFields>();
  readonly getRecord = vi.fn(async (recordId: string): Promise<AirtableRecord | null> => {
    const fields = this.records.get(recordId);
    return fields ? { id: recordId, fields: { ...fields } } : null;
  });
  readonly updateRecord = vi.fn(async (recordId: string, fields: RecordFields): Promise<AirtableRecord> => {
    const merged = { ...(this.records.get(recordId) ?? {}), ...fields };
    this.records.set(recordId, merged);
    return { id: recordId, fields: merged };
  });
}

export const TEST_CONFIG: TransferConfig = {
  publicBaseUrl: 'https://bridge.example.com/api',
  delivery: 'url',
  defaultFolderId: undefined,
  deleteMode: 'delete',
  downloadTimeoutMs: 1000,
  fields: {
    result: 'Text',
    suggestedName: 'Suggested File Name',
    originalName: 'Original File Name',
    fileId: 'Google Drive File ID',
    renameStatus: 'Rename Status',
    deleteStatus: 'Delete Status',
  },
};

export interface TestContext {
  ctx: TransferContext;
  files: MockDriveFiles;
  records: FakeRecordClient;
  store: TempFileStore;
  rootDir: string;
  cleanup: () => Promise<void>;
}

export async function createTestContext(config: Partial<TransferConfig> = {}): Promise<TestContext> {
  const rootDir = await mkdtemp(join(tmpdir(), 'transfer-test-'));
  const store = new TempFileStore({
    rootDir,
    retentionSeconds: 300,
    freeBytes: async () => Number.MAX_SAFE_INTEGER,
  });
  await store.init();

  const { drive, files } = createMockDrive();
  const records = new FakeRecordClient();

  return {
    ctx: {
      drive,
      records,
      store,
      extractors: [plainTextExtractor],
      config: { ...TEST_CONFIG, ...config },
    },
    files,
    records,
    store,
    rootDir,
    cleanup: () => rm(rootDir, { recursive: true, force: true }),
  };
}
