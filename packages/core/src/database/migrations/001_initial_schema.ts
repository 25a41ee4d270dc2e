import type { Knex } from 'knex';
import {
  DEFAULT_ROLE_ID,
  EMAIL_MAX_LENGTH,
  FULL_NAME_MAX_LENGTH,
  PERMISSION_NAME_MAX_LENGTH,
  ROLE_NAME_MAX_LENGTH,
  USERNAME_MAX_LENGTH,
} from '@gatehouse/shared';

export async function up(knex: Knex): Promise<void> {
  // ─── Roles ──────────────────────────────────────────
  await knex.schema.createTable('roles', (table) => {
    table.integer('id').unsigned().primary();
    table.string('name', ROLE_NAME_MAX_LENGTH).notNullable();
    table.text('description').nullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });

  // ─── Permissions ────────────────────────────────────
  await knex.schema.createTable('permissions', (table) => {
    table.increments('id');
    table.integer('role_id').unsigned().notNullable()
      .references('id').inTable('roles').onDelete('CASCADE');
    table.string('name', PERMISSION_NAME_MAX_LENGTH).notNullable();
    table.text('description').nullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.index('role_id');
  });

  // ─── Users ──────────────────────────────────────────
  await knex.schema.createTable('users', (table) => {
    table.increments('id');
    table.string('username', USERNAME_MAX_LENGTH).notNullable().unique();
    table.string('email', EMAIL_MAX_LENGTH).notNullable().unique();
    table.string('password_hash', 255).notNullable();
    table.string('full_name', FULL_NAME_MAX_LENGTH).notNullable();
    table.boolean('is_active').notNullable().defaultTo(true);
    table.integer('role_id').unsigned().notNullable().defaultTo(DEFAULT_ROLE_ID)
      .references('id').inTable('roles').onDelete('RESTRICT');
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').nullable();

    table.index('role_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('users');
  await knex.schema.dropTableIfExists('permissions');
  await knex.schema.dropTableIfExists('roles');
}
