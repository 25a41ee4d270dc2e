import type { Command } from 'commander';
import { closeDatabase, initDatabase, loadConfig, type AppConfig } from '@gatehouse/core';
import { APP_NAME, generateSecret, setDefaultLogLevel } from '@gatehouse/shared';

export interface CheckResult {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
}

const PLACEHOLDER_KEY = 'change-me-to-a-long-random-signing-key';

export function collectConfigChecks(config: AppConfig, nodeVersion: string = process.versions.node): CheckResult[] {
  const checks: CheckResult[] = [];

  const major = Number(nodeVersion.split('.')[0]);
  checks.push({
    name: 'Node.js version',
    status: major >= 20 ? 'pass' : 'fail',
    message: major >= 20 ? `v${nodeVersion} ✓` : `v${nodeVersion} — required ≥20`,
  });

  const key = config.jwt.key ?? '';
  checks.push({
    name: 'JWT_KEY',
    status: !key ? 'fail' : key === PLACEHOLDER_KEY || key.length < 32 ? 'warn' : 'pass',
    message: !key
      ? 'Not set — gated requests will answer 500'
      : key === PLACEHOLDER_KEY
        ? 'Still using the example value — change it!'
        : key.length < 32
          ? `${key.length} chars — recommended ≥32`
          : `${key.length} chars ✓`,
  });

  for (const [name, value] of [['JWT_ISSUER', config.jwt.issuer], ['JWT_AUDIENCE', config.jwt.audience]] as const) {
    checks.push({
      name,
      status: value ? 'pass' : 'fail',
      message: value ? `${value} ✓` : 'Not set — gated requests will answer 500',
    });
  }

  return checks;
}

export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description(`Diagnose ${APP_NAME} configuration`)
    .action(async () => {
      console.log(`\n🩺 ${APP_NAME} Doctor — checking your setup...\n`);

      const config = loadConfig();
      setDefaultLogLevel('fatal');
      const checks = collectConfigChecks(config);

      try {
        await initDatabase(config.database);
        checks.push({
          name: 'MySQL connection',
          status: 'pass',
          message: `Connected to ${config.database.host}:${config.database.port}`,
        });
      } catch (error) {
        checks.push({
          name: 'MySQL connection',
          status: 'fail',
          message: `Failed: ${error instanceof Error ? error.message : String(error)}`,
        });
      } finally {
        await closeDatabase();
      }

      const icons = { pass: '✅', warn: '⚠️', fail: '❌' };
      for (const check of checks) {
        console.log(`  ${icons[check.status]}  ${check.name}: ${check.message}`);
      }

      const passCount = checks.filter(c => c.status === 'pass').length;
      const warnCount = checks.filter(c => c.status === 'warn').length;
      const failCount = checks.filter(c => c.status === 'fail').length;

      console.log(`\n📊 Results: ${passCount} passed, ${warnCount} warnings, ${failCount} failed`);

      if (!config.jwt.key) {
        console.log(`\n💡 Example key: JWT_KEY=${generateSecret(48)}`);
      }

      if (failCount > 0) {
        console.log('\n⚠️  Some checks failed. Fix them before starting the API.\n');
        process.exit(1);
      }
      console.log(`\n✅ ${APP_NAME} is ready to go!\n`);
    });
}
