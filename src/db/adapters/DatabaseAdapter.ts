import { Knex } from 'knex';

/**
 * A SQL backend the document store runs on.
 * Postgres in deployment; SQLite for local development and tests.
 */
export interface DatabaseAdapter {
  /**
   * Get the underlying Knex instance for this adapter
   */
  getKnex(): Knex;

  /**
   * Verify the connection is usable
   */
  initialize(): Promise<void>;

  /**
   * Close the database connection
   */
  close(): Promise<void>;

  /**
   * Name of the database the adapter is connected to
   */
  getDatabaseName(): Promise<string>;

  /**
   * Application tables, alphabetically, excluding migration bookkeeping
   */
  listTables(limit: number): Promise<string[]>;
}
