import pino from 'pino';
import { z } from 'zod';
import { SnapshotError, getErrorMessage } from '../../utils/errors.js';
import type { Item } from '../acquisition/types.js';
import { indexById, itemRecordSchema, toItemRecord, type SnapshotStore } from './types.js';

const log = pino({ name: 'snapshot-pg' });

const CHUNK_SIZE = 100;

const rowSchema = z.object({ attributes: itemRecordSchema });

export interface SnapshotDbClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

/** The slice of pg.Pool the store uses. */
export interface SnapshotDb {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  connect(): Promise<SnapshotDbClient>;
}

function chunk<T>(arr: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}

/**
 * Catalog snapshot kept in the catalog_snapshot table.
 * The whole table is replaced inside one transaction on every save.
 */
export class PgSnapshotStore implements SnapshotStore {
  constructor(private readonly pool: SnapshotDb) {}

  async load(): Promise<Map<string, Item>> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query('SELECT attributes FROM catalog_snapshot ORDER BY item_id'));
    } catch (err) {
      throw new SnapshotError('load', getErrorMessage(err), err);
    }

    const items: Item[] = [];
    for (const row of rows) {
      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        throw new SnapshotError('load', `unexpected row layout: ${parsed.error.message}`);
      }
      items.push(parsed.data.attributes);
    }

    return indexById(items);
  }

  async save(items: readonly Item[]): Promise<void> {
    let client: SnapshotDbClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new SnapshotError('save', getErrorMessage(err), err);
    }

    try {
      await client.query('BEGIN');
      await client.query('DELETE FROM catalog_snapshot');

      for (const batch of chunk(items, CHUNK_SIZE)) {
        const values: unknown[] = [];
        const rows: string[] = [];

        batch.forEach((item, i) => {
          rows.push(`($${i * 2 + 1}, $${i * 2 + 2}, NOW())`);
          values.push(item.id, JSON.stringify(toItemRecord(item)));
        });

        await client.query(
          `INSERT INTO catalog_snapshot (item_id, attributes, captured_at) VALUES ${rows.join(', ')}`,
          values,
        );
      }

      await client.query('COMMIT');
      log.debug({ count: items.length }, 'Snapshot saved');
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        log.error({ err: rollbackErr }, 'Snapshot rollback failed');
      });
      throw new SnapshotError('save', getErrorMessage(err), err);
    } finally {
      client.release();
    }
  }
}
