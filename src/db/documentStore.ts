import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { DatabaseAdapter } from './adapters/DatabaseAdapter.js';
import { Collection, Row } from './schemas.js';
import { Stored } from './types/ctf.types.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Equality match on document fields, or any of several such matches
 */
export type Filter<T> = Partial<T> | { $or: Array<Partial<T>> };

/**
 * Group documents by one field and total another, highest totals first
 */
export interface GroupSum<T> {
  groupBy: keyof T & string;
  sum: keyof T & string;
  limit: number;
}

export interface GroupTotal {
  key: string;
  total: number;
}

function isOrFilter<T extends object>(filter: Filter<T>): filter is { $or: Array<Partial<T>> } {
  return Object.prototype.hasOwnProperty.call(filter, '$or');
}

// Arrays and objects go into json columns as text
function encode(record: object): Row {
  const row: Row = {};
  for (const [field, value] of Object.entries(record)) {
    if (value === undefined) continue;
    row[field] = value !== null && typeof value === 'object' ? JSON.stringify(value) : value;
  }
  return row;
}

/**
 * Generic create/query operations over the store's collections
 */
export class DocumentStore {
  constructor(private readonly db: DatabaseAdapter) {}

  private get knex(): Knex {
    return this.db.getKnex();
  }

  /**
   * Driver failures are logged here and surface as a plain 500
   */
  private async run<R>(operation: string, collection: string, query: () => PromiseLike<R>): Promise<R> {
    try {
      return await query();
    } catch (error) {
      logger.error({ err: error, operation, collection }, 'Store operation failed');
      throw Errors.internal('Database operation failed');
    }
  }

  private applyFilter<T extends object>(query: Knex.QueryBuilder, filter: Filter<T>): Knex.QueryBuilder {
    const clauses = isOrFilter(filter) ? filter.$or : [filter];
    return query.where((builder) => {
      for (const clause of clauses) {
        builder.orWhere(encode(clause));
      }
    });
  }

  /**
   * Persist a record under a fresh identifier and return the identifier
   */
  async create<T extends object>(collection: Collection<T>, record: T): Promise<string> {
    collection.validate(record);
    const id = randomUUID();

    await this.run('create', collection.name, async () => {
      await this.knex(collection.name).insert({ id, ...encode(record) });
    });

    logger.debug({ collection: collection.name, id }, 'Document created');
    return id;
  }

  async findById<T extends object>(collection: Collection<T>, id: string): Promise<Stored<T> | null> {
    const row: Row | undefined = await this.run('findById', collection.name, () =>
      this.knex(collection.name).where('id', id).first()
    );

    return row ? collection.decode(row) : null;
  }

  async findOne<T extends object>(collection: Collection<T>, filter: Filter<T>): Promise<Stored<T> | null> {
    const row: Row | undefined = await this.run('findOne', collection.name, () =>
      this.applyFilter(this.knex(collection.name), filter).first()
    );

    return row ? collection.decode(row) : null;
  }

  /**
   * Up to `limit` matching documents in store order
   */
  async findMany<T extends object>(collection: Collection<T>, filter: Filter<T>, limit: number): Promise<Stored<T>[]> {
    const rows: Row[] = await this.run('findMany', collection.name, () =>
      this.applyFilter(this.knex(collection.name), filter).limit(limit)
    );

    return rows.map((row) => collection.decode(row));
  }

  async aggregate<T extends object>(collection: Collection<T>, grouping: GroupSum<T>): Promise<GroupTotal[]> {
    const rows: Row[] = await this.run('aggregate', collection.name, () =>
      this.knex(collection.name)
        .select({ key: grouping.groupBy })
        .sum({ total: grouping.sum })
        .groupBy(grouping.groupBy)
        .orderBy([
          { column: 'total', order: 'desc' },
          { column: 'key', order: 'asc' },
        ])
        .limit(grouping.limit)
    );

    // Postgres returns SUM over integers as a bigint string
    return rows.map((row) => ({ key: String(row.key), total: Number(row.total) }));
  }

  // Diagnostics: driver errors reach the caller unwrapped
  databaseName(): Promise<string> {
    return this.db.getDatabaseName();
  }

  listCollections(limit: number): Promise<string[]> {
    return this.db.listTables(limit);
  }
}
