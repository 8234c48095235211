#!/usr/bin/env node
/**
 * dynattr CLI
 * Dynamic attribute engine - catalog, cache and search tooling
 *
 * Command structure:
 *   dynattr attributes   # Attribute catalog (alias: attr)
 *   dynattr cache        # Cache document maintenance
 *   dynattr db           # Backend capabilities and optimization
 *   dynattr search       # Find entities by attribute values
 *   dynattr config       # Configuration
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import { closeAllDbs } from './db/connection.js';
import {
  createAttributesCommand,
  createCacheCommand,
  createConfigCommand,
  createDbCommand,
  createSearchCommand,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function getConfigPath(): string {
  return resolveConfigPath({ configPath: globalConfigPath });
}

const HELP_HEADER = `
dynattr - dynamic attribute engine
Typed custom attributes for any record, without schema changes.

Commands:
  attributes, attr   List, show, create, update and delete attribute definitions
  cache              Rebuild or check per-entity cache documents
  db                 Show backend features, create search indexes
  search             Find entity ids from an attribute expression
  config             Configuration management

Examples:
  dynattr attr create age --label "Age" --type number --rule min=0
  dynattr attr create tier --label "Tier" --type select --options gold,silver
  dynattr cache sync user --batch-size 500
  dynattr search user 'age >= 18 tier == gold'
  dynattr db optimize --check
`;

program
  .name('dynattr')
  .description('Dynamic attribute engine - catalog, cache and search tooling')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
  })
  .hook('postAction', () => {
    closeAllDbs();
  });

// attributes
program.addCommand(createAttributesCommand(getConfigPath));

// Alias: attr = attributes
const attrCmd = createAttributesCommand(getConfigPath);
attrCmd.name('attr').description('Alias for attributes');
program.addCommand(attrCmd);

program.addCommand(createCacheCommand(getConfigPath));
program.addCommand(createDbCommand(getConfigPath));
program.addCommand(createSearchCommand(getConfigPath));
program.addCommand(createConfigCommand(getConfigPath));

// Parse and run
await program.parseAsync();
