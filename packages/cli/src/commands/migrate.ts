import type { Command } from 'commander';
import { closeDatabase, initDatabase, loadConfig, runMigrations } from '@gatehouse/core';
import { setDefaultLogLevel } from '@gatehouse/shared';

export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Create the schema and seed reference roles and permissions')
    .action(async () => {
      const config = loadConfig();
      setDefaultLogLevel(config.logLevel);

      try {
        const db = await initDatabase(config.database);
        const applied = await runMigrations(db);
        console.log(applied.length > 0
          ? `✅ Applied: ${applied.join(', ')}`
          : '✅ Database is up to date');
      } finally {
        await closeDatabase();
      }
    });
}
