export { FileSnapshotStore } from './file-store.js';
export { PgSnapshotStore } from './pg-store.js';
export type { SnapshotDb, SnapshotDbClient } from './pg-store.js';
export { itemRecordSchema, snapshotFileSchema, toItemRecord, indexById } from './types.js';
export type { SnapshotStore } from './types.js';
