import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('challenge', (table) => {
    table.uuid('id').primary();
    table.text('title').notNullable();
    table.text('description').notNullable();
    // SHA256 hex digest of the flag; the plaintext is never stored
    table.string('flag_hash', 64).notNullable();
    table.bigInteger('points').notNullable();
    table.text('author').notNullable();
    table.json('tags').nullable();
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.index('is_active');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('challenge');
}
