/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { getOutputOptions, output, outputError, outputSuccess, outputTable } from '../utils/output.js';

export function createConfigCommand(getConfigPath: () => string): Command {
  const cmd = new Command('config')
    .description('Manage dynattr configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .option('-p, --path <path>', 'Custom config path')
    .action(async (options) => {
      try {
        const configPath = options.path || getConfigPath();
        const manager = new ConfigManager(configPath);
        const result = await manager.init(options.force);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`);
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        outputError('Failed to initialize config', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('show')
    .description('Show the effective configuration')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const config = await manager.loadOrDefault();
        const resolved = await manager.resolve();

        if (getOutputOptions().json) {
          output({ config, resolved });
        } else {
          console.log(JSON.stringify(config, null, 2));
          console.log();
          console.log(`Database: ${resolved.dbPath}`);
        }
      } catch (error) {
        outputError('Failed to load config', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
        } else {
          output(
            { valid: false, errors: result.errors },
            `Config validation failed:\n${result.errors.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`
          );
          process.exit(1);
        }
      } catch (error) {
        outputError('Failed to validate config', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  // ============================================================
  // config hosts - entity types whose table carries a cache document
  // ============================================================
  const hosts = cmd
    .command('hosts')
    .description('Manage host tables that carry cache documents');

  hosts
    .command('list')
    .description('List configured host tables')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const resolved = await manager.resolve();
        const entries = Object.entries(resolved.hosts);

        if (entries.length === 0) {
          output([], 'No host tables configured.');
          return;
        }

        outputTable(
          ['entity_type', 'table', 'id_column', 'column'],
          entries.map(([type, host]) => [type, host.table, host.idColumn ?? 'id', host.column ?? 'dynamic_attributes'])
        );
      } catch (error) {
        outputError('Failed to list host tables', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  hosts
    .command('set')
    .description('Map an entity type to its host table')
    .argument('<entityType>', 'Entity type tag')
    .requiredOption('-t, --table <table>', 'Host table name')
    .option('--id-column <column>', 'Primary key column', 'id')
    .option('--column <column>', 'JSON cache column', 'dynamic_attributes')
    .action(async (entityType: string, options) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        await manager.setHost(entityType, {
          table: options.table,
          idColumn: options.idColumn,
          column: options.column,
        });
        outputSuccess(`Host table for '${entityType}' set to ${options.table}.${options.column}`);
      } catch (error) {
        outputError('Failed to set host table', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  hosts
    .command('remove')
    .description('Remove an entity type\'s host table mapping')
    .argument('<entityType>', 'Entity type tag')
    .action(async (entityType: string) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const removed = await manager.removeHost(entityType);
        if (!removed) {
          outputError(`No host table configured for '${entityType}'`);
          process.exit(1);
        }
        outputSuccess(`Host table mapping for '${entityType}' removed`);
      } catch (error) {
        outputError('Failed to remove host table', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  return cmd;
}
