/**
 * Health Command
 *
 * Probes the model backend and the database. Exits 1 when degraded.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { HealthResponse } from '../../models/api-types.js';
import { ok } from '../../lib/result-types.js';
import { fail, withRagContext } from '../utils/context.js';
import { output } from '../utils/output.js';

export function createHealthCommand(): Command {
  return new Command('health')
    .description('Check the model backend and the database')
    .action(async () => {
      const result = await withRagContext(async (ctx) => ok(await ctx.embeddings.health()));

      result.match((health) => {
        output.result(health, () => renderHealth(health));
        if (health.status !== 'healthy') {
          process.exitCode = 1;
        }
      }, fail('Health check failed'));
    });
}

function renderHealth(health: HealthResponse): void {
  const mark = (up: boolean) => (up ? chalk.green('✓ up') : chalk.red('✗ down'));

  console.log(
    chalk.bold('Status: ') +
      (health.status === 'healthy' ? chalk.green(health.status) : chalk.yellow(health.status))
  );
  console.log(`  Model backend (${health.gateway.id}): ${mark(health.gateway.available)}`);
  console.log(`  Database: ${mark(health.database.available)}`);
  if (health.database.schemaVersion !== undefined) {
    console.log(chalk.gray(`    Schema version: ${health.database.schemaVersion}`));
  }
  if (health.database.dbSizeBytes !== undefined) {
    console.log(chalk.gray(`    Size: ${health.database.dbSizeBytes} bytes`));
  }
}
