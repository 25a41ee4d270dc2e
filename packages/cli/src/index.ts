#!/usr/bin/env node
import { Command } from 'commander';
import { config } from 'dotenv';
import { resolve } from 'node:path';
import { APP_NAME, APP_VERSION, APP_DESCRIPTION } from '@gatehouse/shared';
import { registerStartCommand } from './commands/start.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerDoctorCommand } from './commands/doctor.js';

// Load .env from the working directory
config({ path: resolve(process.cwd(), '.env') });

const program = new Command();

program
  .name('gatehouse')
  .description(`${APP_NAME} — ${APP_DESCRIPTION}`)
  .version(APP_VERSION);

registerStartCommand(program);
registerMigrateCommand(program);
registerDoctorCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
