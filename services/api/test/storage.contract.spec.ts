import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { MongoClient } from 'mongodb';
import { NotFoundError, ValidationError } from '../src/errors';
import { MemoryItemStorageBackend } from '../src/storage/memoryItemStorage';
import { MongoItemStorageBackend } from '../src/storage/mongoItemStorage';
import type { ItemStorageBackend } from '../src/contracts/itemStorage';
import type { ItemDocument } from '../src/mongo/items';

// an empty collection: nothing is ever found
const mocks = vi.hoisted(() => ({
  findItem: vi.fn(),
  updateItem: vi.fn(),
  deleteItem: vi.fn(),
}));

vi.mock('../src/mongo/items', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/mongo/items')>()),
  ...mocks,
}));

const client = new MongoClient('mongodb://localhost:27017');
const collection = client.db('test').collection<ItemDocument>('db_items');

const MISSING_ID = '65a1f0c2b4d3e2a1f0c2b4d3';

afterAll(async () => {
  await client.close();
});

const backends: Array<[string, () => ItemStorageBackend]> = [
  ['memory', () => new MemoryItemStorageBackend()],
  ['mongodb', () => new MongoItemStorageBackend(collection)],
];

describe.each(backends)('%s backend contract', (_name, makeBackend) => {
  let backend: ItemStorageBackend;

  beforeEach(() => {
    vi.resetAllMocks();
    mocks.findItem.mockResolvedValue(null);
    mocks.updateItem.mockResolvedValue(null);
    mocks.deleteItem.mockResolvedValue(false);
    backend = makeBackend();
  });

  it('an invalid update is a ValidationError even for a missing id', async () => {
    await expect(backend.update(MISSING_ID, {})).rejects.toBeInstanceOf(ValidationError);
    await expect(backend.update('not-an-id', {})).rejects.toBeInstanceOf(ValidationError);
    await expect(backend.update(MISSING_ID, { name: 'x'.repeat(101) })).rejects.toBeInstanceOf(ValidationError);
  });

  it('a valid update of a missing id is NotFound', async () => {
    await expect(backend.update(MISSING_ID, { name: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(backend.update('not-an-id', { name: 'x' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('get and delete of a missing id are NotFound', async () => {
    await expect(backend.get(MISSING_ID)).rejects.toThrow(`Item with id ${MISSING_ID} not found`);
    await expect(backend.delete(MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
    await expect(backend.get('not-an-id')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects invalid create fields and page bounds', async () => {
    await expect(backend.create({ name: '' })).rejects.toBeInstanceOf(ValidationError);
    await expect(backend.list({ page: 1, size: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(backend.list({ page: 0, size: 10 })).rejects.toBeInstanceOf(ValidationError);
  });
});
