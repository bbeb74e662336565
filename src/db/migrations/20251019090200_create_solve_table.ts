import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('solve', (table) => {
    table.uuid('id').primary();
    // No foreign key: the challenge id is kept in its string form
    table.string('challenge_id', 36).notNullable();
    table.text('username').notNullable();
    table.bigInteger('points').notNullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    // Leaderboard groups by username
    table.index('username');
    table.index('challenge_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('solve');
}
