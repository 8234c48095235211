/**
 * Search command - find entities from a one-line expression
 */

import { Command } from 'commander';
import { parseExpression } from '../search/expression.js';
import { output, outputError, outputFailure } from '../utils/output.js';
import { openEngine } from './context.js';

export function createSearchCommand(getConfigPath: () => string): Command {
  return new Command('search')
    .description('Find entity ids matching attribute conditions')
    .argument('<entityType>', 'Entity type to search')
    .argument('<expression>', 'Conditions, e.g. \'age >= 18 city == "Oslo"\'')
    .option('--or', 'Match any condition instead of all')
    .option('-s, --sort <name>', 'Order results by an attribute')
    .option('--desc', 'Sort descending')
    .addHelpText('after', `
Operators: == != > < >= <= ~= (substring)
  name == null     attribute unset or null
  name != null     attribute has a value

Examples:
  dynattr search user 'age > 30'
  dynattr search user 'bio ~= chess level == 3' --or
  dynattr search product 'released >= 2024-01-01' --sort released --desc
`)
    .action(async (entityType: string, expression: string, options) => {
      const parsed = parseExpression(expression);
      if (!parsed.ok) {
        outputError(`Invalid expression: ${parsed.error}`);
        process.exit(1);
      }

      try {
        const { engine } = await openEngine(getConfigPath);
        const ids = engine.search.advancedSearch(entityType, parsed.filters, options.or ? 'OR' : 'AND');
        const ordered = options.sort
          ? engine.search.sortByAttribute(entityType, ids, options.sort, options.desc ? 'desc' : 'asc')
          : [...ids].sort();

        output(
          { entity_type: entityType, count: ordered.length, ids: ordered },
          ordered.length > 0 ? ordered.join('\n') : 'No matching entities.'
        );
      } catch (error) {
        outputFailure('Search failed', error);
        process.exit(1);
      }
    });
}
