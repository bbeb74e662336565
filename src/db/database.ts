import { DatabaseAdapter } from './adapters/DatabaseAdapter.js';
import { PostgresAdapter } from './adapters/PostgresAdapter.js';
import { SqliteAdapter } from './adapters/SqliteAdapter.js';
import { migrationSource } from './migrations/index.js';
import { logger } from '../utils/logger.js';

export interface DatabaseConfig {
  connectionString: string;
}

const SQLITE_PREFIX = 'sqlite:';

/**
 * Pick an adapter from the connection string: `sqlite:<path>` (or `sqlite::memory:`)
 * opens SQLite, anything else is handed to Postgres
 */
export function createAdapter(connectionString: string): DatabaseAdapter {
  if (connectionString.startsWith(SQLITE_PREFIX)) {
    return new SqliteAdapter(connectionString.slice(SQLITE_PREFIX.length));
  }
  return new PostgresAdapter(connectionString);
}

export class DatabaseConnection {
  private adapter: DatabaseAdapter;

  constructor(config: DatabaseConfig) {
    this.adapter = createAdapter(config.connectionString);
  }

  /**
   * Initialize the database connection and bring the schema up to date
   */
  async initialize(): Promise<void> {
    await this.adapter.initialize();
    const [batch, applied] = await this.adapter.getKnex().migrate.latest({ migrationSource });
    logger.debug({ batch, applied }, 'Database initialized successfully');
  }

  /**
   * Get the database adapter
   */
  getAdapter(): DatabaseAdapter {
    return this.adapter;
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    logger.debug('Closing database connection...');
    await this.adapter.close();
  }
}
