import type { CreateItemArgs, Item, ItemId, UpdateItemArgs } from '../types';
import type { ListQuery, PageResult } from '../query/pagination';

/**
 * Defines a pluggable storage backend that the item routes rely on.
 * Implementations report failures only as `NotFoundError`, `ValidationError`
 * or `UnavailableError` so routes stay backend-agnostic.
 */
export interface ItemStorageBackend {
  /** Human-readable name used in logs and `UnavailableError`s. */
  readonly name: string;
  create(fields: CreateItemArgs): Promise<Item>;
  get(id: ItemId): Promise<Item>;
  update(id: ItemId, fields: UpdateItemArgs): Promise<Item>;
  delete(id: ItemId): Promise<void>;
  list(query: ListQuery): Promise<PageResult<Item>>;
}
