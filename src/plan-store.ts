/**
 * @fileoverview Durable JSON storage for the research plan.
 *
 * This module provides the PlanStore class, the only code path that writes
 * the plan file (`.research_plan.json` in the working directory by default).
 *
 * Every write goes to a temp file beside the target, is fsynced, then renamed
 * over the target, so readers in any process see either the previous complete
 * document or the next one. Merges run inside a mutex so two producers never
 * compute their next document from the same stale base.
 *
 * @module plan-store
 */

import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { DEFAULT_PLAN_FILE, PLAN_FILE_ENV } from './config/plan-defaults.js';
import { StorageError } from './errors.js';
import { mergePlan } from './plan-merge.js';
import { PlanDocumentSchema, formatIssues } from './schemas.js';
import type { PlanDocument, PlanSource } from './types.js';
import { Mutex } from './utils/mutex.js';

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

/**
 * Plan file store with atomic replace and serialized merges.
 *
 * @example
 * ```typescript
 * const store = new PlanStore('/tmp/plan.json');
 * await store.reset();
 * await store.merge([{ id: 'step-1', content: 'Research company background' }], 'Creating initial plan');
 * await store.merge([{ id: 'step-1', status: 'in_progress' }], 'Starting step 1');
 * const doc = await store.read(); // null until the first merge
 * ```
 */
export class PlanStore implements PlanSource {
  private readonly filePath: string;
  private readonly mutex = new Mutex();
  private tempSeq = 0;

  constructor(filePath: string = DEFAULT_PLAN_FILE) {
    this.filePath = resolve(filePath);
  }

  /** Absolute path of the backing file. */
  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Reads the current document.
   * @returns The document, or null when none has been written yet
   * @throws StorageError on I/O failure or a corrupt document
   */
  async read(): Promise<PlanDocument | null> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return null;
      }
      throw new StorageError(`Failed to read plan file ${this.filePath}`, this.filePath, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      throw new StorageError(`Plan file ${this.filePath} is not valid JSON`, this.filePath, err);
    }

    const parsed = PlanDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(
        `Plan file ${this.filePath} is not a valid plan: ${formatIssues(parsed.error).join('; ')}`,
        this.filePath,
      );
    }
    return parsed.data;
  }

  /**
   * Applies an update batch to the current document and persists the result.
   * This is the only write entry point.
   *
   * @param batch - Deltas of the form `{ id, status?, content? }`
   * @param explanation - Description of the change, replaces the previous one
   * @returns The document as written
   * @throws ValidationError when the batch is rejected (nothing is written)
   * @throws StorageError when reading or writing the file fails
   */
  async merge(batch: unknown, explanation: string = ''): Promise<PlanDocument> {
    return this.mutex.withLock(async () => {
      const current = await this.read();
      const next = mergePlan(current, batch, explanation);
      await this.writeAtomic(next);
      return next;
    });
  }

  /**
   * Deletes the plan file so a new session starts from nothing.
   * @returns true if a document existed
   * @throws StorageError when the file exists but cannot be removed
   */
  async reset(): Promise<boolean> {
    return this.mutex.withLock(async () => {
      try {
        await unlink(this.filePath);
        return true;
      } catch (err) {
        if (hasErrorCode(err, 'ENOENT')) {
          return false;
        }
        throw new StorageError(`Failed to remove plan file ${this.filePath}`, this.filePath, err);
      }
    });
  }

  /**
   * Writes to a unique temp file, fsyncs it, then renames over the target.
   */
  private async writeAtomic(doc: PlanDocument): Promise<void> {
    const json = JSON.stringify(doc, null, 2) + '\n';
    const tempPath = `${this.filePath}.${process.pid}.${++this.tempSeq}.tmp`;
    let tempCreated = false;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const handle = await open(tempPath, 'w');
      tempCreated = true;
      try {
        await handle.writeFile(json, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (err) {
      console.error('[PlanStore] Failed to write plan file:', err);
      if (tempCreated) {
        try {
          await unlink(tempPath);
        } catch (cleanupErr) {
          if (!hasErrorCode(cleanupErr, 'ENOENT')) {
            console.warn('[PlanStore] Failed to cleanup temp file during save error:', cleanupErr);
          }
        }
      }
      throw new StorageError(`Failed to write plan file ${this.filePath}`, this.filePath, err);
    }
  }
}

// Singleton instance
let storeInstance: PlanStore | null = null;

/**
 * Gets or creates the singleton PlanStore instance.
 * Without a path, uses $PLANWATCH_FILE (set for workers started by
 * `planwatch run`) or `.research_plan.json` in the working directory.
 * @param filePath Optional custom file path (only used on first call).
 */
export function getStore(filePath?: string): PlanStore {
  if (!storeInstance) {
    storeInstance = new PlanStore(filePath ?? process.env[PLAN_FILE_ENV] ?? DEFAULT_PLAN_FILE);
  }
  return storeInstance;
}

/** Drops the singleton so the next getStore() builds a fresh one. */
export function resetStoreInstance(): void {
  storeInstance = null;
}
