import { MongoClient } from 'mongodb';
import type { Collection, Db, Document } from 'mongodb';
import type { Logger } from '../logging/logger';

export interface MongoConnectionOptions {
  uri: string;
  database: string;
  /** Applied to server selection, connect and socket timeouts. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Owns the MongoClient for the process. Created by the bootstrap step and
 * closed on shutdown; nothing else holds a client.
 */
export class MongoConnection {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  constructor(
    private readonly options: MongoConnectionOptions,
    private readonly logger: Logger,
  ) {}

  async connect(): Promise<Db> {
    if (this.db) return this.db;

    const timeout = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const client = new MongoClient(this.options.uri, {
      serverSelectionTimeoutMS: timeout,
      connectTimeoutMS: timeout,
      socketTimeoutMS: timeout,
    });

    try {
      await client.connect();
      await client.db('admin').command({ ping: 1 });
    } catch (err) {
      this.logger.error({ err }, 'MongoDB connection failed');
      await client.close().catch((closeErr: unknown) => {
        this.logger.warn({ err: closeErr }, 'MongoDB client close after failed connect errored');
      });
      throw err;
    }

    this.client = client;
    this.db = client.db(this.options.database);
    this.logger.info({ database: this.options.database }, 'Connected to MongoDB');
    return this.db;
  }

  collection<TSchema extends Document>(name: string): Collection<TSchema> {
    if (!this.db) throw new Error('MongoDB not connected; call connect() first');
    return this.db.collection<TSchema>(name);
  }

  async ping(): Promise<boolean> {
    if (!this.client) return false;
    try {
      await this.client.db('admin').command({ ping: 1 });
      return true;
    } catch (err) {
      this.logger.warn({ err }, 'MongoDB ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.close();
      this.logger.info('MongoDB connection closed');
    } finally {
      this.client = null;
      this.db = null;
    }
  }
}

/** Builds the connection string from its parts; credentials are URI-encoded. */
export function buildMongoUri(parts: {
  user: string;
  password: string;
  host: string;
  port: number;
  database: string;
  authSource: string;
}): string {
  const credentials = parts.user
    ? `${encodeURIComponent(parts.user)}:${encodeURIComponent(parts.password)}@`
    : '';
  return `mongodb://${credentials}${parts.host}:${parts.port}/${parts.database}?authSource=${encodeURIComponent(parts.authSource)}`;
}

export function redactMongoUri(uri: string): string {
  return uri.replace(/^(mongodb(?:\+srv)?:\/\/[^:/@]+):[^@]*@/, '$1:***@');
}
