/**
 * Database commands - capability report and index optimization
 */

import { Command } from 'commander';
import type { DatabaseInfo } from '../engine.js';
import { getOutputOptions, output, outputFailure } from '../utils/output.js';
import { openEngine } from './context.js';

function formatInfo(info: DatabaseInfo): string {
  const lines = [`Backend: ${info.backend} (schema v${info.schemaVersion})`, '', 'Features:'];
  for (const [feature, supported] of Object.entries(info.features)) {
    lines.push(`  ${supported ? '✓' : '✗'} ${feature}`);
  }
  lines.push('', 'Migration configuration:');
  for (const [key, value] of Object.entries(info.migration)) {
    lines.push(`  ${key}: ${String(value)}`);
  }
  return lines.join('\n');
}

export function createDbCommand(getConfigPath: () => string): Command {
  const cmd = new Command('db')
    .description('Database capabilities and optimization');

  cmd
    .command('info')
    .description('Show backend features and migration configuration')
    .action(async () => {
      try {
        const { engine } = await openEngine(getConfigPath);
        const info = engine.databaseInfo();
        output(info, formatInfo(info));
      } catch (error) {
        outputFailure('Failed to read database info', error);
        process.exit(1);
      }
    });

  cmd
    .command('optimize')
    .description('Create backend-specific search indexes')
    .option('--check', 'Only report capabilities and planned statements')
    .option('-f, --force', 'Exit successfully even if some statements fail')
    .action(async (options) => {
      try {
        const { engine } = await openEngine(getConfigPath);
        const info = engine.databaseInfo();
        const result = engine.optimize({ dryRun: options.check === true });

        if (getOutputOptions().json) {
          output({ info, ...result, check: options.check === true });
        } else {
          console.log(formatInfo(info));
          console.log();
          if (options.check) {
            console.log(result.statements.length > 0 ? 'Planned statements:' : 'No optimizations available for this backend.');
            result.statements.forEach(statement => console.log(`  ${statement}`));
          } else if (result.statements.length === 0) {
            console.log('No optimizations available for this backend.');
          } else {
            result.applied.forEach(statement => console.log(`  ✓ ${statement}`));
            result.skipped.forEach(({ statement, error }) => console.log(`  ✗ ${statement}\n      ${error}`));
          }
        }

        if (result.skipped.length > 0 && !options.force) {
          console.error(`${result.skipped.length} statement(s) failed. Use --force to ignore failures.`);
          process.exit(1);
        }
      } catch (error) {
        outputFailure('Database optimization failed', error);
        process.exit(1);
      }
    });

  return cmd;
}
