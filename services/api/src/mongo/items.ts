// src/mongo/items.ts
import { ObjectId } from 'mongodb';
import type { Collection, Filter } from 'mongodb';
import { escapeRegex } from '../query/pagination';

export const ITEMS_COLLECTION = 'db_items';

/** Persisted shape of an item; one document per item. */
export interface ItemDocument {
  _id: ObjectId;
  name: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

export type ItemDocumentChanges = Partial<Pick<ItemDocument, 'name' | 'description' | 'updated_at'>>;

const OBJECT_ID_HEX = /^[a-f0-9]{24}$/i;

// creation order, with _id breaking ties between equal timestamps
const LIST_SORT = { created_at: 1, _id: 1 } as const;

/** Returns null for anything that is not a 24-hex ObjectId string. */
export function parseObjectId(id: string): ObjectId | null {
  if (!OBJECT_ID_HEX.test(id)) return null;
  return new ObjectId(id);
}

export function buildItemFilter(search?: string): Filter<ItemDocument> {
  if (search === undefined) return {};
  return { name: { $regex: escapeRegex(search), $options: 'i' } };
}

export async function insertItem(collection: Collection<ItemDocument>, doc: ItemDocument): Promise<void> {
  await collection.insertOne(doc);
}

export async function findItem(collection: Collection<ItemDocument>, id: ObjectId): Promise<ItemDocument | null> {
  return collection.findOne({ _id: id });
}

export async function updateItem(
  collection: Collection<ItemDocument>,
  id: ObjectId,
  changes: ItemDocumentChanges,
): Promise<ItemDocument | null> {
  return collection.findOneAndUpdate({ _id: id }, { $set: changes }, { returnDocument: 'after' });
}

export async function deleteItem(collection: Collection<ItemDocument>, id: ObjectId): Promise<boolean> {
  const res = await collection.deleteOne({ _id: id });
  return res.deletedCount === 1;
}

export async function findItemsPage(
  collection: Collection<ItemDocument>,
  filter: Filter<ItemDocument>,
  skip: number,
  limit: number,
): Promise<{ docs: ItemDocument[]; total: number }> {
  const [total, docs] = await Promise.all([
    collection.countDocuments(filter),
    collection.find(filter).sort(LIST_SORT).skip(skip).limit(limit).toArray(),
  ]);
  return { docs, total };
}

export async function ensureItemIndexes(collection: Collection<ItemDocument>): Promise<void> {
  await collection.createIndex(LIST_SORT, { name: 'created_at_id' });
}
