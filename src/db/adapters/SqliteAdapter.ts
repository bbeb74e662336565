import { knex, Knex } from 'knex';
import fs from 'fs';
import path from 'path';
import { DatabaseAdapter } from './DatabaseAdapter.js';
import { logger } from '../../utils/logger.js';

interface SqliteMasterRow {
  name: string;
  type: string;
}

export const IN_MEMORY = ':memory:';

export class SqliteAdapter implements DatabaseAdapter {
  private knex: Knex;
  private dbPath: string;

  constructor(dbPath: string = './data/ctf.db') {
    this.dbPath = dbPath;

    // Ensure the directory exists
    if (this.dbPath !== IN_MEMORY) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    // A single pooled connection; an in-memory database lives only as long as it does
    this.knex = knex({
      client: 'better-sqlite3',
      connection: {
        filename: this.dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    await this.knex.raw('SELECT 1');
    logger.debug({ dbPath: this.dbPath }, 'SQLite database opened');
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async getDatabaseName(): Promise<string> {
    return this.dbPath === IN_MEMORY ? IN_MEMORY : path.basename(this.dbPath);
  }

  async listTables(limit: number): Promise<string[]> {
    const rows = await this.knex<SqliteMasterRow>('sqlite_master')
      .select('name')
      .where('type', 'table')
      .whereNot('name', 'like', 'knex_%')
      .whereNot('name', 'like', 'sqlite_%')
      .orderBy('name')
      .limit(limit);

    return rows.map((row) => row.name);
  }
}
