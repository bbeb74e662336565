import { Knex } from 'knex';
import * as createUserTable from './20251019090000_create_user_table.js';
import * as createChallengeTable from './20251019090100_create_challenge_table.js';
import * as createSolveTable from './20251019090200_create_solve_table.js';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const migrations: NamedMigration[] = [
  { name: '20251019090000_create_user_table', migration: createUserTable },
  { name: '20251019090100_create_challenge_table', migration: createChallengeTable },
  { name: '20251019090200_create_solve_table', migration: createSolveTable },
];

/**
 * Statically imported migrations, applied in order by DatabaseConnection.initialize()
 */
export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return migrations;
  },
  getMigrationName(entry) {
    return entry.name;
  },
  async getMigration(entry) {
    return entry.migration;
  },
};
