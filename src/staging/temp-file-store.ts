/**
 * Temporary File Store
 *
 * Time-bounded local staging for file bytes moving between Drive and Airtable.
 * Everything lives under one root directory:
 *
 *   <root>/.staging-<uuid>.part      partial write (never listed, never swept)
 *   <root>/<token>_<sanitized name>  completed file, id === stored name
 *
 * Staging writes the partial file first and then hard-links it into its final
 * name. link() fails on an existing name, so a collision moves on to the next
 * "-N" suffix instead of overwriting, and readers only ever see complete files.
 *
 * Metadata for files staged by this process is kept in memory. Files left by a
 * previous process are described from disk (mtime, extension).
 */

import { randomBytes, randomUUID } from 'node:crypto';
import { createReadStream } from 'node:fs';
import type { ReadStream, Stats } from 'node:fs';
import { link, mkdir, readdir, readFile, stat, statfs, unlink, writeFile } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { InvalidNameError, NotFoundError, StorageFullError, errorMessage } from '../transfer/errors.js';
import { mimeTypeFromName } from './mime.js';
import { isPlainFileName, sanitizeFileName, withCollisionSuffix } from './sanitize-name.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One file currently held outside its permanent home */
export interface StagedFile {
  /** Opaque id; also the stored file name and the /attachments/:name segment */
  id: string;
  /** Owned by the store. Other modules go through read()/openReadStream() */
  localPath: string;
  originalName: string;
  mimeType: string;
  sizeBytes: number;
  /** Epoch ms when the file became visible */
  createdAt: number;
  retentionSeconds: number;
  /** createdAt + retentionSeconds, epoch ms */
  expiresAt: number;
}

export interface TempFileStoreOptions {
  rootDir: string;
  retentionSeconds: number;
  /** Free space that must remain after a write (default 0) */
  minFreeBytes?: number;
  /** Purge expired files before each stage() (default true) */
  sweepOnStage?: boolean;
  /** Clock, injectable for tests */
  now?: () => number;
  /** Free-space lookup, injectable for tests */
  freeBytes?: (dir: string) => Promise<number>;
}

// ---------------------------------------------------------------------------
// Constants & helpers
// ---------------------------------------------------------------------------

const PARTIAL_PREFIX = '.staging-';
const PARTIAL_SUFFIX = '.part';
const MAX_COLLISION_ATTEMPTS = 100;
const TOKEN_PREFIX = /^[0-9a-f]{8}_/;

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function statfsFreeBytes(dir: string): Promise<number> {
  const stats = await statfs(dir);
  return stats.bavail * stats.bsize;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class TempFileStore {
  readonly rootDir: string;
  readonly retentionSeconds: number;
  private readonly minFreeBytes: number;
  private readonly sweepOnStage: boolean;
  private readonly now: () => number;
  private readonly freeBytes: (dir: string) => Promise<number>;
  private readonly entries = new Map<string, StagedFile>();

  constructor(opts: TempFileStoreOptions) {
    this.rootDir = resolve(opts.rootDir);
    this.retentionSeconds = opts.retentionSeconds;
    this.minFreeBytes = opts.minFreeBytes ?? 0;
    this.sweepOnStage = opts.sweepOnStage ?? true;
    this.now = opts.now ?? Date.now;
    this.freeBytes = opts.freeBytes ?? statfsFreeBytes;
  }

  /**
   * Creates the root directory and removes partial writes left behind by a
   * previous process. Call once before serving requests.
   */
  async init(): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });

    const names = await readdir(this.rootDir);
    for (const name of names) {
      if (name.startsWith(PARTIAL_PREFIX) && name.endsWith(PARTIAL_SUFFIX)) {
        await this.unlinkIfPresent(join(this.rootDir, name));
      }
    }
  }

  /**
   * Writes bytes to a new file inside the root.
   *
   * @throws InvalidNameError when the suggested name sanitizes to nothing
   * @throws StorageFullError when the volume lacks space for the bytes
   */
  async stage(bytes: Buffer, suggestedName: string, mimeType: string): Promise<StagedFile> {
    const safeName = sanitizeFileName(suggestedName);

    if (this.sweepOnStage) {
      try {
        await this.sweep(this.now());
      } catch (err) {
        console.warn('[staging] Sweep before stage failed:', errorMessage(err));
      }
    }

    await this.ensureCapacity(bytes.length);

    const partialPath = join(this.rootDir, `${PARTIAL_PREFIX}${randomUUID()}${PARTIAL_SUFFIX}`);
    let id: string;
    try {
      await writeFile(partialPath, bytes, { flag: 'wx' });
      id = await this.linkIntoPlace(partialPath, `${randomBytes(4).toString('hex')}_${safeName}`);
    } catch (err) {
      if (errnoCode(err) === 'ENOSPC') {
        throw new StorageFullError(`Staging directory is full while writing "${safeName}"`);
      }
      if (errnoCode(err) === 'ENAMETOOLONG') {
        throw new InvalidNameError(`File name "${safeName}" is too long for the staging directory`);
      }
      throw err;
    } finally {
      await this.unlinkIfPresent(partialPath);
    }

    const createdAt = this.now();
    const staged: StagedFile = {
      id,
      localPath: this.pathFor(id),
      originalName: suggestedName,
      mimeType,
      sizeBytes: bytes.length,
      createdAt,
      retentionSeconds: this.retentionSeconds,
      expiresAt: createdAt + this.retentionSeconds * 1000,
    };
    this.entries.set(id, staged);

    console.log('[staging] Staged file', { id, sizeBytes: staged.sizeBytes, mimeType });
    return staged;
  }

  /** Looks a staged file up by id. Expired files are still returned. */
  async get(id: string): Promise<StagedFile | null> {
    if (!isPlainFileName(id)) return null;

    const localPath = this.pathFor(id);
    let stats: Stats;
    try {
      stats = await stat(localPath);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        this.entries.delete(id);
        return null;
      }
      throw err;
    }
    if (!stats.isFile()) return null;

    const known = this.entries.get(id);
    if (known) return known;

    const createdAt = stats.mtimeMs;
    return {
      id,
      localPath,
      originalName: id.replace(TOKEN_PREFIX, ''),
      mimeType: mimeTypeFromName(id),
      sizeBytes: stats.size,
      createdAt,
      retentionSeconds: this.retentionSeconds,
      expiresAt: createdAt + this.retentionSeconds * 1000,
    };
  }

  /** @throws NotFoundError when the id is not staged */
  async read(id: string): Promise<Buffer> {
    const file = await this.require(id);
    return readFile(file.localPath);
  }

  /** @throws NotFoundError when the id is not staged */
  async openReadStream(id: string): Promise<{ file: StagedFile; stream: ReadStream }> {
    const file = await this.require(id);
    return { file, stream: createReadStream(file.localPath) };
  }

  /** All completed files, oldest first. Partial writes are never listed. */
  async list(): Promise<StagedFile[]> {
    const names = await readdir(this.rootDir);
    const files: StagedFile[] = [];

    for (const name of names) {
      const file = await this.get(name);
      if (file) files.push(file);
    }

    return files.sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Removes every file whose expiry is at or before `now`.
   * Best effort: one failed deletion is logged and the sweep continues.
   *
   * @returns Number of files this call removed
   */
  async sweep(now: number): Promise<number> {
    const files = await this.list();
    let removed = 0;

    for (const file of files) {
      if (file.expiresAt <= now && (await this.removeFile(file))) {
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[staging] Swept ${removed} expired file(s)`);
    }
    return removed;
  }

  /** Deletes one staged file. Returns false when it was already gone. */
  async remove(id: string): Promise<boolean> {
    const file = await this.get(id);
    if (!file) return false;
    return this.removeFile(file);
  }

  /** Deletes every completed file regardless of age (operator cleanup) */
  async removeAll(): Promise<number> {
    const files = await this.list();
    let removed = 0;

    for (const file of files) {
      if (await this.removeFile(file)) removed++;
    }

    console.log(`[staging] Removed ${removed} file(s) on request`);
    return removed;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async require(id: string): Promise<StagedFile> {
    const file = await this.get(id);
    if (!file) {
      throw new NotFoundError(`Staged file "${id}" not found`);
    }
    return file;
  }

  /** Resolves a stored name inside the root; anything else is refused */
  private pathFor(name: string): string {
    const fullPath = resolve(this.rootDir, name);
    if (!fullPath.startsWith(this.rootDir + sep)) {
      throw new InvalidNameError(`File name "${name}" escapes the staging directory`);
    }
    return fullPath;
  }

  private async ensureCapacity(sizeBytes: number): Promise<void> {
    const available = await this.freeBytes(this.rootDir);
    if (available - sizeBytes < this.minFreeBytes) {
      throw new StorageFullError(
        `Not enough space to stage ${sizeBytes} bytes (${available} bytes free, ` +
          `${this.minFreeBytes} bytes reserved)`,
      );
    }
  }

  private async linkIntoPlace(partialPath: string, name: string): Promise<string> {
    for (let attempt = 0; attempt < MAX_COLLISION_ATTEMPTS; attempt++) {
      const candidate = attempt === 0 ? name : withCollisionSuffix(name, attempt + 1);
      try {
        await link(partialPath, this.pathFor(candidate));
        return candidate;
      } catch (err) {
        if (errnoCode(err) !== 'EEXIST') throw err;
      }
    }

    throw new InvalidNameError(
      `No free name for "${name}" after ${MAX_COLLISION_ATTEMPTS} attempts`,
    );
  }

  private async removeFile(file: StagedFile): Promise<boolean> {
    this.entries.delete(file.id);
    try {
      await unlink(file.localPath);
      return true;
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        console.warn(`[staging] Could not remove ${file.id}:`, errorMessage(err));
      }
      return false;
    }
  }

  private async unlinkIfPresent(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        console.warn(`[staging] Could not remove partial file ${path}:`, errorMessage(err));
      }
    }
  }
}
