import knex, { type Knex } from 'knex';
import { createLogger, MIGRATIONS_TABLE } from '@gatehouse/shared';
import type { DatabaseConfig } from '../config.js';
import * as initialSchema from './migrations/001_initial_schema.js';
import * as seedReferenceData from './migrations/002_seed_reference_data.js';

const logger = createLogger('Core:Database');

export interface Migration {
  version: number;
  name: string;
  up(db: Knex): Promise<void>;
  down(db: Knex): Promise<void>;
}

export const MIGRATIONS: readonly Migration[] = [
  { version: 1, name: '001_initial_schema', up: initialSchema.up, down: initialSchema.down },
  { version: 2, name: '002_seed_reference_data', up: seedReferenceData.up, down: seedReferenceData.down },
];

let db: Knex | null = null;

export function buildKnexConfig(config: DatabaseConfig): Knex.Config {
  return {
    client: 'mysql2',
    connection: {
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      charset: 'utf8mb4',
    },
    pool: {
      min: 2,
      max: 10,
      acquireTimeoutMillis: 30_000,
    },
  };
}

export async function initDatabase(config: DatabaseConfig): Promise<Knex> {
  if (db) return db;

  logger.info('Connecting to MySQL...', {
    host: config.host,
    database: config.database,
  });

  const instance = knex(buildKnexConfig(config));

  try {
    await instance.raw('SELECT 1');
    logger.info('MySQL connection established');
  } catch (error) {
    logger.error('Failed to connect to MySQL', error);
    await instance.destroy();
    throw error;
  }

  db = instance;
  return db;
}

export function getDatabase(): Knex {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

async function currentVersion(database: Knex): Promise<number> {
  const hasMigTable = await database.schema.hasTable(MIGRATIONS_TABLE);
  if (!hasMigTable) {
    await database.schema.createTable(MIGRATIONS_TABLE, (table) => {
      table.increments('id');
      table.integer('version').notNullable().unique();
      table.string('name', 255).notNullable();
      table.timestamp('applied_at').defaultTo(database.fn.now());
    });
    return 0;
  }

  const row = await database<{ version: number }>(MIGRATIONS_TABLE)
    .select('version')
    .orderBy('version', 'desc')
    .first();
  return row?.version ?? 0;
}

/** Applies every migration newer than the recorded version, in order. */
export async function runMigrations(database: Knex = getDatabase()): Promise<string[]> {
  logger.info('Running migrations...');
  const applied: string[] = [];

  try {
    const version = await currentVersion(database);

    for (const migration of MIGRATIONS) {
      if (migration.version <= version) continue;

      logger.info(`Applying migration ${migration.name}...`);
      await database.transaction(async (trx) => {
        await migration.up(trx);
        await trx(MIGRATIONS_TABLE).insert({ version: migration.version, name: migration.name });
      });
      applied.push(migration.name);
      logger.info(`Migration ${migration.name} applied`);
    }

    logger.info('All migrations applied successfully', { applied: applied.length });
    return applied;
  } catch (error) {
    logger.error('Migration failed', error);
    throw error;
  }
}

export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('MySQL connection closed');
  }
}
