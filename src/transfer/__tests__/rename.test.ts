import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { autoRename, renameDriveFile } from '../index.js';
import {
  InvalidNameError,
  InvalidReferenceError,
  NotFoundError,
  RecordNotFoundError,
} from '../errors.js';
import { apiError, createTestContext } from './helpers.js';
import type { TestContext } from './helpers.js';

describe('renameDriveFile', () => {
  let t: TestContext;

  beforeEach(async () => {
    t = await createTestContext();
  });

  afterEach(async () => {
    await t.cleanup();
  });

  it('renames with the trimmed name in one Drive call', async () => {
    t.files.update.mockResolvedValueOnce({ data: { id: 'file-1', name: 'Contract.pdf' } });

    const result = await renameDriveFile(t.ctx, { fileId: 'file-1', newName: '  Contract.pdf ' });

    expect(result).toEqual({ fileId: 'file-1', newName: 'Contract.pdf' });
    expect(t.files.update).toHaveBeenCalledTimes(1);
    expect(t.files.update.mock.calls[0][0].requestBody).toEqual({ name: 'Contract.pdf' });
  });

  it.each(['', '   '])('rejects the empty name %j before calling Drive', async (newName) => {
    await expect(renameDriveFile(t.ctx, { fileId: 'file-1', newName })).rejects.toBeInstanceOf(InvalidNameError);
    expect(t.files.update).not.toHaveBeenCalled();
  });

  it('propagates NotFoundError from Drive', async () => {
    t.files.update.mockRejectedValueOnce(apiError(404));

    await expect(renameDriveFile(t.ctx, { fileId: 'gone', newName: 'x.pdf' })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});

describe('autoRename', () => {
  let t: TestContext;

  beforeEach(async () => {
    t = await createTestContext();
  });

  afterEach(async () => {
    await t.cleanup();
  });

  it('applies the suggested name from the record to the record file', async () => {
    t.records.records.set('rec1', {
      'Suggested File Name': 'Invoice ACME 2024-03.pdf',
      'Original File Name': 'scan001.pdf',
      'Google Drive File ID': 'file-from-record',
    });
    t.files.update.mockResolvedValueOnce({ data: { id: 'file-from-record', name: 'Invoice ACME 2024-03.pdf' } });

    const result = await autoRename(t.ctx, { recordId: 'rec1' });

    expect(result).toEqual({
      status: 'renamed',
      recordId: 'rec1',
      fileId: 'file-from-record',
      originalName: 'scan001.pdf',
      newName: 'Invoice ACME 2024-03.pdf',
    });
    expect(t.records.getRecord).toHaveBeenCalledWith('rec1');
    expect(t.files.update.mock.calls[0][0].fileId).toBe('file-from-record');
  });

  it('prefers the payload file id and falls back to the payload name', async () => {
    t.records.records.set('rec1', { 'Google Drive File ID': 'file-from-record' });
    t.files.update.mockResolvedValueOnce({ data: { id: 'file-from-body', name: 'Fallback.pdf' } });

    const result = await autoRename(t.ctx, { recordId: 'rec1', fileId: 'file-from-body', newName: 'Fallback.pdf' });

    expect(result.fileId).toBe('file-from-body');
    expect(result.newName).toBe('Fallback.pdf');
    expect(result.originalName).toBeNull();
  });

  it('skips the Drive call when the name is unchanged', async () => {
    t.records.records.set('rec1', {
      'Suggested File Name': 'same.pdf',
      'Original File Name': 'same.pdf',
      'Google Drive File ID': 'file-1',
    });

    const result = await autoRename(t.ctx, { recordId: 'rec1' });

    expect(result.status).toBe('skipped');
    expect(t.files.update).not.toHaveBeenCalled();
  });

  it('throws RecordNotFoundError when the record does not exist', async () => {
    await expect(autoRename(t.ctx, { recordId: 'recMissing', fileId: 'f', newName: 'n' })).rejects.toBeInstanceOf(
      RecordNotFoundError,
    );
    expect(t.files.update).not.toHaveBeenCalled();
  });

  it('throws InvalidNameError when neither record nor payload has a name', async () => {
    t.records.records.set('rec1', { 'Google Drive File ID': 'file-1' });

    await expect(autoRename(t.ctx, { recordId: 'rec1' })).rejects.toThrow(
      'Record rec1 has no "Suggested File Name" and no new_name was given',
    );
  });

  it('throws InvalidReferenceError when no file id is available', async () => {
    t.records.records.set('rec1', { 'Suggested File Name': 'a.pdf' });

    await expect(autoRename(t.ctx, { recordId: 'rec1' })).rejects.toBeInstanceOf(InvalidReferenceError);
  });
});
