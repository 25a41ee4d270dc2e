import type { Command } from 'commander';
import {
  closeDatabase,
  createGateway,
  initDatabase,
  loadConfig,
  runMigrations,
  MySQLRoleStore,
  MySQLUserStore,
} from '@gatehouse/core';
import { APP_NAME, isValidPort, setDefaultLogLevel } from '@gatehouse/shared';

export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description(`Start the ${APP_NAME} API`)
    .option('-H, --host <host>', 'Gateway host')
    .option('-p, --port <port>', 'Gateway port')
    .option('--migrate', 'Run database migrations before starting', false)
    .action(async (options: { host?: string; port?: string; migrate: boolean }) => {
      const config = loadConfig();
      setDefaultLogLevel(config.logLevel);
      if (options.host) config.host = options.host;
      if (options.port) config.port = Number(options.port);

      if (!isValidPort(config.port)) {
        console.error(`❌ Invalid port: ${options.port ?? config.port}`);
        process.exit(1);
      }

      // Gated routes would only ever answer 500.
      const missing = [
        config.jwt.key ? null : 'JWT_KEY',
        config.jwt.issuer ? null : 'JWT_ISSUER',
        config.jwt.audience ? null : 'JWT_AUDIENCE',
      ].filter((name): name is string => name !== null);
      if (missing.length > 0) {
        console.error(`❌ ${missing.join(', ')} not set. Set them in your .env file.`);
        process.exit(1);
      }

      console.log(`\n🔥 Starting ${APP_NAME}...\n`);

      try {
        const db = await initDatabase(config.database);

        if (options.migrate) {
          console.log('🔄 Running migrations...');
          await runMigrations(db);
        }

        const gateway = createGateway({
          config,
          users: new MySQLUserStore(db),
          roles: new MySQLRoleStore(db),
        });

        const address = await gateway.start();
        console.log(`  ✅ Listening on ${address}\n`);

        const shutdown = async (): Promise<void> => {
          console.log('\n🛑 Shutting down...');
          await gateway.stop();
          await closeDatabase();
          process.exit(0);
        };

        const onSignal = (): void => {
          shutdown().catch((error: unknown) => {
            console.error('❌ Shutdown failed:', error);
            process.exit(1);
          });
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
      } catch (error) {
        console.error('❌ Failed to start:', error);
        await closeDatabase();
        process.exit(1);
      }
    });
}
