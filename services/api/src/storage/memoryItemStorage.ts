import { randomUUID } from 'crypto';
import { NotFoundError } from '../errors';
import { requireValid, validateItemCreate, validateItemUpdate } from '../schemas/item';
import { DEFAULT_PAGINATION, matchesSearch, paginate, validateListQuery } from '../query/pagination';
import type { ItemStorageBackend } from '../contracts/itemStorage';
import type { ListQuery, PageResult, PaginationLimits } from '../query/pagination';
import type { CreateItemArgs, Item, ItemId, UpdateItemArgs } from '../types';

export interface MemoryItemStorageOptions {
  pagination?: PaginationLimits;
  now?: () => Date;
  generateId?: () => ItemId;
}

/**
 * Implements `ItemStorageBackend` on a plain Map owned by this instance.
 * Map insertion order is creation order, which is also the list order.
 * Concurrent writers race; the last write wins.
 */
export class MemoryItemStorageBackend implements ItemStorageBackend {
  readonly name = 'memory';
  private readonly items = new Map<ItemId, Item>();
  private readonly pagination: PaginationLimits;
  private readonly now: () => Date;
  private readonly generateId: () => ItemId;

  constructor(options: MemoryItemStorageOptions = {}) {
    this.pagination = options.pagination ?? DEFAULT_PAGINATION;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.items.size;
  }

  async create(fields: CreateItemArgs): Promise<Item> {
    const { name, description } = requireValid(validateItemCreate(fields));
    let id = this.generateId();
    while (this.items.has(id)) id = this.generateId();

    const now = this.now();
    const item: Item = {
      id,
      name,
      description: description ?? null,
      created_at: now,
      updated_at: now,
    };
    this.items.set(id, item);
    return copy(item);
  }

  async get(id: ItemId): Promise<Item> {
    return copy(this.require(id));
  }

  async update(id: ItemId, fields: UpdateItemArgs): Promise<Item> {
    // fields are checked before the id, in both backends
    const changes = requireValid(validateItemUpdate(fields), 'invalid item update');
    const existing = this.require(id);

    const now = this.now();
    // keep updated_at strictly increasing even within one clock tick
    const updated_at =
      now.getTime() <= existing.updated_at.getTime() ? new Date(existing.updated_at.getTime() + 1) : now;

    const next: Item = {
      ...existing,
      ...(changes.name !== undefined ? { name: changes.name } : {}),
      ...(changes.description !== undefined ? { description: changes.description } : {}),
      updated_at,
    };
    this.items.set(id, next);
    return copy(next);
  }

  async delete(id: ItemId): Promise<void> {
    if (!this.items.delete(id)) {
      throw new NotFoundError('Item', id);
    }
  }

  async list(query: ListQuery): Promise<PageResult<Item>> {
    const { search, page, size } = validateListQuery(query, this.pagination);
    const matching = [...this.items.values()].filter((item) => matchesSearch(item.name, search));
    const result = paginate(matching, { search, page, size });
    return { ...result, items: result.items.map(copy) };
  }

  private require(id: ItemId): Item {
    const item = this.items.get(id);
    if (!item) throw new NotFoundError('Item', id);
    return item;
  }
}

function copy(item: Item): Item {
  return {
    ...item,
    created_at: new Date(item.created_at.getTime()),
    updated_at: new Date(item.updated_at.getTime()),
  };
}
