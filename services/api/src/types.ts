export type ItemId = string;

export interface Item {
  id: ItemId;        // UUID in memory, ObjectId hex in MongoDB
  name: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

// Write inputs: id and timestamps are always generated by the backend
export interface CreateItemArgs {
  name: string;
  description?: string | null;
}

export interface UpdateItemArgs {
  name?: string;
  description?: string | null;
}

/** JSON shape returned by the HTTP layer. */
export interface ItemResponse {
  id: ItemId;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
}
