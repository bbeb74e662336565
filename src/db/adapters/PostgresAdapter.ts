import { knex, Knex } from 'knex';
import { DatabaseAdapter } from './DatabaseAdapter.js';
import { logger } from '../../utils/logger.js';

interface TableRow {
  table_name: string;
  table_schema: string;
  table_type: string;
}

export class PostgresAdapter implements DatabaseAdapter {
  private knex: Knex;
  private connectionString: string;

  constructor(connectionString: string) {
    this.connectionString = connectionString;

    this.knex = knex({
      client: 'pg',
      connection: {
        connectionString: this.connectionString,
        ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: 2,
        max: 10,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    // Test the connection
    try {
      await this.knex.raw('SELECT 1');
      logger.debug('PostgreSQL connection established');
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to PostgreSQL');
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async getDatabaseName(): Promise<string> {
    const result = await this.knex.raw<{ rows: Array<{ name: string }> }>(
      'SELECT current_database() AS name'
    );
    return result.rows[0]?.name ?? '';
  }

  async listTables(limit: number): Promise<string[]> {
    const rows = await this.knex<TableRow>('information_schema.tables')
      .select('table_name')
      .where({ table_schema: 'public', table_type: 'BASE TABLE' })
      .whereNot('table_name', 'like', 'knex_%')
      .orderBy('table_name')
      .limit(limit);

    return rows.map((row) => row.table_name);
  }
}
