import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import pino from 'pino';
import { SnapshotError, getErrorMessage } from '../../utils/errors.js';
import type { Item } from '../acquisition/types.js';
import { indexById, snapshotFileSchema, toItemRecord, type SnapshotStore } from './types.js';

const log = pino({ name: 'snapshot-file' });

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Catalog snapshot kept as a JSON list in one file.
 *
 * Writes go to a sibling temp file first and are renamed over the target, so
 * a crash leaves either the old or the new snapshot, never a mix.
 */
export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Map<string, Item>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        log.info({ filePath: this.filePath }, 'No snapshot yet, starting empty');
        return new Map();
      }
      throw new SnapshotError('load', getErrorMessage(err), err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new SnapshotError('load', `invalid JSON in ${this.filePath}`, err);
    }

    const result = snapshotFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new SnapshotError('load', `unexpected snapshot layout: ${result.error.message}`);
    }

    return indexById(result.data);
  }

  async save(items: readonly Item[]): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const body = JSON.stringify(items.map(toItemRecord), null, 2);

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, body, 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      throw new SnapshotError('save', getErrorMessage(err), err);
    }

    log.debug({ filePath: this.filePath, count: items.length }, 'Snapshot saved');
  }
}
