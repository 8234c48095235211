/**
 * Cache commands - rebuild and check cache documents
 */

import { Command } from 'commander';
import { getOutputOptions, output, outputError, outputFailure, outputSuccess } from '../utils/output.js';
import { openEngine } from './context.js';

function parseBatchSize(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Batch size must be a positive integer: ${raw}`);
  }
  return value;
}

export function createCacheCommand(getConfigPath: () => string): Command {
  const cmd = new Command('cache')
    .description('Maintain per-entity cache documents');

  cmd
    .command('sync')
    .description('Rebuild cache documents from stored values')
    .argument('[entityType]', 'Entity type to rebuild')
    .option('-a, --all', 'Rebuild every configured entity type')
    .option('-b, --batch-size <n>', 'Entities per transaction', parseBatchSize)
    .option('--dry-run', 'Count documents without writing')
    .action(async (entityType: string | undefined, options) => {
      if (!entityType && !options.all) {
        outputError('Specify an entity type or --all');
        process.exit(1);
      }

      try {
        const { engine, config } = await openEngine(getConfigPath);
        const syncOptions = {
          batchSize: options.batchSize ?? config.batchSize,
          dryRun: options.dryRun === true,
          onBatch: (processed: number, total: number) => {
            if (!getOutputOptions().json) {
              console.error(`  ${processed}/${total}`);
            }
          },
        };

        const counts: Record<string, number> = entityType
          ? { [entityType]: engine.cache.resync(entityType, syncOptions) }
          : engine.cache.resyncAll(syncOptions);

        const verb = options.dryRun ? 'would be rebuilt' : 'rebuilt';
        const lines = Object.entries(counts).map(([type, count]) => `  ${type}: ${count} document(s) ${verb}`);
        if (lines.length === 0) {
          output({ counts }, 'No entity types with a cache column are configured.');
          return;
        }
        outputSuccess(`Cache sync ${options.dryRun ? 'dry run ' : ''}complete\n${lines.join('\n')}`, { counts });
      } catch (error) {
        outputFailure('Cache sync failed', error);
        process.exit(1);
      }
    });

  cmd
    .command('check')
    .description('Compare one entity\'s cache document with its stored values')
    .argument('<entityType>', 'Entity type')
    .argument('<id>', 'Entity id')
    .action(async (entityType: string, id: string) => {
      try {
        const { engine } = await openEngine(getConfigPath);
        const ref = { type: entityType, id };
        const consistent = engine.cache.documentsMatch(ref);

        output(
          { entity_type: entityType, entity_id: id, consistent },
          consistent
            ? `✓ Cache document for ${entityType}#${id} matches stored values`
            : `✗ Cache document for ${entityType}#${id} is stale. Run: dynattr cache sync ${entityType}`
        );
        if (!consistent) {
          process.exit(1);
        }
      } catch (error) {
        outputFailure('Cache check failed', error);
        process.exit(1);
      }
    });

  return cmd;
}
