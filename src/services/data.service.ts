import mongoose, { Types } from 'mongoose';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { DataAccessError, errorMessage } from '../core/errors';
import { findForbiddenOperators } from '../utils/security';
import type { CollectionInfo, DataQuery, DataResult, Dataset, Scalar } from '../types';
import type { DataSource } from '../types/collaborators';

export interface DocumentCursor {
  toArray(): Promise<Record<string, unknown>[]>;
}

export interface DocumentCollection {
  find(
    filter: Record<string, unknown>,
    options: { projection?: Record<string, 1>; limit?: number }
  ): DocumentCursor;
}

/** The read-only slice of a MongoDB database the data source relies on. */
export interface DocumentDatabase {
  collection(name: string): DocumentCollection;
  collectionNames(): Promise<string[]>;
}

export function mongooseDatabase(connection: mongoose.Connection = mongoose.connection): DocumentDatabase {
  const db = () => {
    const handle = connection.db;
    if (!handle || connection.readyState !== 1) {
      throw new DataAccessError('connection_failed', 'MongoDB is not connected');
    }
    return handle;
  };

  return {
    collection: name => {
      const collection = db().collection(name);
      return {
        find: (filter, options) => collection.find(filter, options),
      };
    },
    collectionNames: async () => {
      const collections = await db().listCollections({}, { nameOnly: true }).toArray();
      return collections.map(c => c.name);
    },
  };
}

/**
 * External data access over the mongoose connection. Queries are read-only
 * `find` calls; documents are flattened into scalar columns so the working
 * dataset is a plain table.
 */
export class MongoDataSource implements DataSource {
  constructor(
    private readonly database: DocumentDatabase = mongooseDatabase(),
    private readonly defaultLimit: number = config.retrieval.defaultLimit
  ) {}

  async query(query: DataQuery): Promise<DataResult> {
    const forbidden = findForbiddenOperators(query.filter);
    if (forbidden.length > 0) {
      logger.warn('Rejected data query with forbidden operators', { collection: query.collection, forbidden });
      return {
        ok: false,
        error: { kind: 'invalid_query', message: `Query uses operators that are not allowed: ${forbidden.join(', ')}` },
      };
    }

    try {
      const names = await this.database.collectionNames();
      if (!names.includes(query.collection)) {
        return {
          ok: false,
          error: { kind: 'not_found', message: `Collection "${query.collection}" does not exist` },
        };
      }

      const projection = query.fields && query.fields.length > 0
        ? Object.fromEntries(query.fields.map(field => [field, 1 as const]))
        : undefined;

      const documents = await this.database
        .collection(query.collection)
        .find(query.filter, { projection, limit: query.limit ?? this.defaultLimit })
        .toArray();

      const dataset = this.toDataset(documents, query);
      logger.debug('Data query completed', {
        collection: query.collection,
        rows: dataset.rows.length,
        columns: dataset.columns.length,
      });
      return { ok: true, dataset };
    } catch (error) {
      logger.error('Data query failed', { collection: query.collection, error: errorMessage(error) });
      const kind = error instanceof DataAccessError ? error.kind : 'connection_failed';
      return { ok: false, error: { kind, message: errorMessage(error) } };
    }
  }

  async describe(): Promise<CollectionInfo[]> {
    try {
      const names = await this.database.collectionNames();
      const described: CollectionInfo[] = [];

      for (const name of names.slice(0, 20)) {
        const sample = await this.database.collection(name).find({}, { limit: 1 }).toArray();
        const fields = sample.length > 0 ? Object.keys(this.flattenObject(sample[0])) : [];
        described.push({ name, fields });
      }
      return described;
    } catch (error) {
      logger.warn('Could not describe external database', { error: errorMessage(error) });
      return [];
    }
  }

  toDataset(documents: Record<string, unknown>[], query: DataQuery | null): Dataset {
    const rows = documents.map(doc => this.flattenObject(doc));
    const columns: string[] = [];
    const seen = new Set<string>();

    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
    }

    // every row carries every column so downstream code sees a rectangular table
    for (const row of rows) {
      for (const column of columns) {
        if (!(column in row)) row[column] = null;
      }
    }

    return { columns, rows, query, retrievedAt: new Date().toISOString() };
  }

  flattenObject(value: Record<string, unknown>, prefix = ''): Record<string, Scalar> {
    const flat: Record<string, Scalar> = {};

    for (const [key, raw] of Object.entries(value)) {
      const path = prefix ? `${prefix}.${key}` : key;
      const scalar = this.toScalar(raw);

      if (scalar !== undefined) {
        flat[path] = scalar;
      } else if (Array.isArray(raw)) {
        flat[path] = JSON.stringify(raw);
      } else if (raw !== null && typeof raw === 'object') {
        Object.assign(flat, this.flattenObject(Object.fromEntries(Object.entries(raw)), path));
      }
    }

    return flat;
  }

  private toScalar(value: unknown): Scalar | undefined {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Date) return value.toISOString();
    if (value instanceof Types.ObjectId) return value.toHexString();
    if (value instanceof Types.Decimal128) return Number(value.toString());
    return undefined;
  }
}
