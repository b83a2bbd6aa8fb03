import { ObjectId } from 'mongodb';
import type { Collection } from 'mongodb';
import { NotFoundError } from '../errors';
import { translateMongoError } from '../mongo/errors';
import {
  buildItemFilter,
  deleteItem,
  findItem,
  findItemsPage,
  insertItem,
  parseObjectId,
  updateItem,
} from '../mongo/items';
import { requireValid, validateItemCreate, validateItemUpdate } from '../schemas/item';
import { DEFAULT_PAGINATION, buildPageResult, pageOffset, validateListQuery } from '../query/pagination';
import type { ItemDocument, ItemDocumentChanges } from '../mongo/items';
import type { ItemStorageBackend } from '../contracts/itemStorage';
import type { ListQuery, PageResult, PaginationLimits } from '../query/pagination';
import type { CreateItemArgs, Item, ItemId, UpdateItemArgs } from '../types';

export interface MongoItemStorageOptions {
  pagination?: PaginationLimits;
}

/**
 * Implements `ItemStorageBackend` on top of the `db_items` collection helpers.
 * Each operation is a single-document write or a read; consistency is whatever
 * MongoDB gives a single operation.
 */
export class MongoItemStorageBackend implements ItemStorageBackend {
  readonly name = 'mongodb';
  private readonly pagination: PaginationLimits;

  constructor(
    private readonly collection: Collection<ItemDocument>,
    options: MongoItemStorageOptions = {},
  ) {
    this.pagination = options.pagination ?? DEFAULT_PAGINATION;
  }

  async create(fields: CreateItemArgs): Promise<Item> {
    const { name, description } = requireValid(validateItemCreate(fields));
    const now = new Date();
    const doc: ItemDocument = {
      _id: new ObjectId(),
      name,
      description: description ?? null,
      created_at: now,
      updated_at: now,
    };
    await this.run(() => insertItem(this.collection, doc));
    return toItem(doc);
  }

  async get(id: ItemId): Promise<Item> {
    const objectId = this.requireObjectId(id);
    const doc = await this.run(() => findItem(this.collection, objectId));
    if (!doc) throw new NotFoundError('Item', id);
    return toItem(doc);
  }

  async update(id: ItemId, fields: UpdateItemArgs): Promise<Item> {
    const changes = requireValid(validateItemUpdate(fields), 'invalid item update');
    const objectId = this.requireObjectId(id);

    const set: ItemDocumentChanges = { updated_at: new Date() };
    if (changes.name !== undefined) set.name = changes.name;
    if (changes.description !== undefined) set.description = changes.description;

    const doc = await this.run(() => updateItem(this.collection, objectId, set));
    if (!doc) throw new NotFoundError('Item', id);
    return toItem(doc);
  }

  async delete(id: ItemId): Promise<void> {
    const objectId = this.requireObjectId(id);
    const deleted = await this.run(() => deleteItem(this.collection, objectId));
    if (!deleted) throw new NotFoundError('Item', id);
  }

  async list(query: ListQuery): Promise<PageResult<Item>> {
    const valid = validateListQuery(query, this.pagination);
    const { docs, total } = await this.run(() =>
      findItemsPage(this.collection, buildItemFilter(valid.search), pageOffset(valid), valid.size),
    );
    return buildPageResult(docs.map(toItem), total, valid);
  }

  private requireObjectId(id: ItemId): ObjectId {
    const objectId = parseObjectId(id);
    if (!objectId) throw new NotFoundError('Item', id);
    return objectId;
  }

  private async run<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw translateMongoError(err, this.name);
    }
  }
}

export function toItem(doc: ItemDocument): Item {
  return {
    id: doc._id.toHexString(),
    name: doc.name,
    description: doc.description ?? null,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
  };
}
