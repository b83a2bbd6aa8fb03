import { afterAll, afterEach, describe, expect, it, vi } from 'vitest';
import { MongoClient, MongoNetworkError } from 'mongodb';
import { initialize } from '../src/bootstrap';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/logging/logger';
import { MongoConnection } from '../src/mongo/client';

const mocks = vi.hoisted(() => ({ ensureItemIndexes: vi.fn() }));

vi.mock('../src/mongo/items', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/mongo/items')>()),
  ensureItemIndexes: mocks.ensureItemIndexes,
}));

const client = new MongoClient('mongodb://localhost:27017');
const db = client.db('test');

const config = loadConfig({ env: {}, envFile: null });
const logger = createLogger({ level: 'silent', version: 'test' });

function fakeConnection() {
  const connection = new MongoConnection(config.mongo, logger);
  const connect = vi.spyOn(connection, 'connect').mockResolvedValue(db);
  vi.spyOn(connection, 'collection').mockImplementation((name) => db.collection(name));
  const close = vi.spyOn(connection, 'close').mockResolvedValue(undefined);
  return { connection, connect, close };
}

afterEach(() => {
  vi.resetAllMocks();
});

afterAll(async () => {
  await client.close();
});

describe('initialize', () => {
  it('connects, ensures indexes and builds both backends', async () => {
    mocks.ensureItemIndexes.mockResolvedValue(undefined);
    const { connection, close } = fakeConnection();

    const result = await initialize(config, logger, connection);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.services.mongo).toBe(connection);
      expect(result.services.memoryBackend.name).toBe('memory');
      expect(result.services.dbBackend.name).toBe('mongodb');
    }
    expect(mocks.ensureItemIndexes).toHaveBeenCalledOnce();
    expect(mocks.ensureItemIndexes.mock.calls[0]?.[0]?.collectionName).toBe('db_items');
    expect(close).not.toHaveBeenCalled();
  });

  it('returns the error and closes the connection when MongoDB is unreachable', async () => {
    const { connection, connect, close } = fakeConnection();
    const failure = new MongoNetworkError('connect ECONNREFUSED 127.0.0.1:27017');
    connect.mockRejectedValue(failure);

    const result = await initialize(config, logger, connection);

    expect(result).toEqual({ ok: false, error: failure });
    expect(mocks.ensureItemIndexes).not.toHaveBeenCalled();
    expect(close).toHaveBeenCalledOnce();
  });

  it('keeps the startup error when closing the connection also fails', async () => {
    const { connection, connect, close } = fakeConnection();
    const failure = new MongoNetworkError('connect ECONNREFUSED 127.0.0.1:27017');
    connect.mockRejectedValue(failure);
    close.mockRejectedValue(new Error('close failed'));

    const result = await initialize(config, logger, connection);

    expect(result).toEqual({ ok: false, error: failure });
    expect(close).toHaveBeenCalledOnce();
  });

  it('fails when index creation fails', async () => {
    mocks.ensureItemIndexes.mockRejectedValue(new Error('not authorized'));
    const { connection, close } = fakeConnection();

    const result = await initialize(config, logger, connection);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('not authorized');
    expect(close).toHaveBeenCalledOnce();
  });

  it('wraps non-Error rejections', async () => {
    const { connection, connect } = fakeConnection();
    connect.mockRejectedValue('socket hang up');

    const result = await initialize(config, logger, connection);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe('socket hang up');
    }
  });
});
