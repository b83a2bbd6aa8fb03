import { MongoConnection } from './mongo/client';
import { ITEMS_COLLECTION, ensureItemIndexes } from './mongo/items';
import { MemoryItemStorageBackend } from './storage/memoryItemStorage';
import { MongoItemStorageBackend } from './storage/mongoItemStorage';
import type { AppConfig } from './config';
import type { ItemDocument } from './mongo/items';
import type { Logger } from './logging/logger';

export interface Services {
  mongo: MongoConnection;
  memoryBackend: MemoryItemStorageBackend;
  dbBackend: MongoItemStorageBackend;
}

export type InitResult = { ok: true; services: Services } | { ok: false; error: Error };

/**
 * Runs before the server accepts connections: connects to MongoDB, ensures
 * indexes and builds both storage backends. The caller must check `ok`;
 * a MongoDB that cannot be reached here is fatal.
 */
export async function initialize(
  config: AppConfig,
  logger: Logger,
  connection = new MongoConnection(config.mongo, logger.child({ module: 'mongo' })),
): Promise<InitResult> {
  try {
    await connection.connect();
    const collection = connection.collection<ItemDocument>(ITEMS_COLLECTION);
    await ensureItemIndexes(collection);

    return {
      ok: true,
      services: {
        mongo: connection,
        memoryBackend: new MemoryItemStorageBackend({ pagination: config.pagination }),
        dbBackend: new MongoItemStorageBackend(collection, { pagination: config.pagination }),
      },
    };
  } catch (err) {
    await connection.close().catch((closeErr: unknown) => {
      logger.warn({ err: closeErr }, 'MongoDB close after failed startup errored');
    });
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
}
