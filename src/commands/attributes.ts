/**
 * Attribute commands - manage the attribute catalog
 */

import { Command } from 'commander';
import { RULES_BY_TYPE } from '../catalog/definition.js';
import type { AttributeChanges, AttributeDefinition, AttributeType } from '../types/index.js';
import { ATTRIBUTE_TYPES } from '../types/index.js';
import { output, outputError, outputFailure, outputSuccess, outputTable } from '../utils/output.js';
import { openEngine } from './context.js';

/** Collect repeated `--rule key=value` options */
export function collectRule(raw: string, previous: Record<string, string | number> = {}): Record<string, string | number> {
  const eq = raw.indexOf('=');
  if (eq <= 0) {
    throw new Error(`Rule must be key=value: ${raw}`);
  }
  const key = raw.slice(0, eq).trim();
  const value = raw.slice(eq + 1).trim();
  const numeric = value !== '' && Number.isFinite(Number(value));
  return { ...previous, [key]: numeric ? Number(value) : value };
}

/** Split a comma-separated option list */
export function parseOptionList(raw: string): string[] {
  return raw.split(',').map(option => option.trim()).filter(option => option.length > 0);
}

function describeRules(definition: AttributeDefinition): string {
  const entries = Object.entries(definition.validationRules);
  return entries.length > 0 ? entries.map(([key, value]) => `${key}=${value}`).join(' ') : '-';
}

function isAttributeType(value: string): value is AttributeType {
  return (ATTRIBUTE_TYPES as readonly string[]).includes(value);
}

export function createAttributesCommand(getConfigPath: () => string): Command {
  const cmd = new Command('attributes')
    .description('Manage attribute definitions');

  cmd
    .command('list')
    .description('List attribute definitions')
    .option('-t, --type <type>', `Only attributes of this type (${ATTRIBUTE_TYPES.join(', ')})`)
    .action(async (options) => {
      try {
        if (options.type !== undefined && !isAttributeType(options.type)) {
          outputError(`Unknown attribute type: ${options.type}`);
          process.exit(1);
        }

        const { engine } = await openEngine(getConfigPath);
        const definitions = engine.catalog.list({ type: options.type });
        const counts = engine.catalog.valueCounts();

        if (definitions.length === 0) {
          output([], 'No attributes defined.');
          return;
        }

        outputTable(
          ['name', 'label', 'type', 'required', 'options', 'rules', 'values'],
          definitions.map(def => [
            def.name,
            def.label,
            def.type,
            def.required ? 'yes' : 'no',
            def.options ? def.options.join(', ') : '-',
            describeRules(def),
            String(counts.get(def.name) ?? 0),
          ])
        );
      } catch (error) {
        outputFailure('Failed to list attributes', error);
        process.exit(1);
      }
    });

  cmd
    .command('show')
    .description('Show one attribute definition')
    .argument('<name>', 'Attribute name')
    .action(async (name: string) => {
      try {
        const { engine } = await openEngine(getConfigPath);
        const definition = engine.catalog.require(name);
        const values = engine.catalog.valueCounts().get(name) ?? 0;

        output(
          { ...definition, values },
          [
            `Name:      ${definition.name}`,
            `Label:     ${definition.label}`,
            `Type:      ${definition.type}`,
            `Required:  ${definition.required ? 'yes' : 'no'}`,
            `Options:   ${definition.options ? definition.options.join(', ') : '-'}`,
            `Rules:     ${describeRules(definition)}`,
            `Values:    ${values}`,
            `Created:   ${definition.createdAt}`,
            `Updated:   ${definition.updatedAt}`,
          ].join('\n')
        );
      } catch (error) {
        outputFailure('Failed to show attribute', error);
        process.exit(1);
      }
    });

  cmd
    .command('create')
    .description('Define a new attribute')
    .argument('<name>', 'Attribute name (letters, digits, underscores; starts with a letter)')
    .requiredOption('-l, --label <label>', 'Human-readable label used in messages')
    .requiredOption('-t, --type <type>', `Attribute type (${ATTRIBUTE_TYPES.join(', ')})`)
    .option('-r, --required', 'Values may not be empty')
    .option('-o, --options <list>', 'Comma-separated options (select)', parseOptionList)
    .option('--rule <key=value>', 'Validation rule, repeatable (e.g. --rule min=0 --rule max=120)', collectRule)
    .addHelpText('after', `
Rules per type:
${ATTRIBUTE_TYPES.map(type => `  ${type.padEnd(8)} ${RULES_BY_TYPE[type].join(', ') || '(none)'}`).join('\n')}
  Date rules accept a date or 'today'.
`)
    .action(async (name: string, options) => {
      try {
        const { engine } = await openEngine(getConfigPath);
        const definition = engine.catalog.define({
          name,
          label: options.label,
          type: options.type,
          required: options.required === true,
          options: options.options,
          validationRules: options.rule,
        });
        outputSuccess(`Attribute '${definition.name}' created (${definition.type})`, definition);
      } catch (error) {
        outputFailure('Failed to create attribute', error);
        process.exit(1);
      }
    });

  cmd
    .command('update')
    .description('Change label, required flag, options or rules of an attribute')
    .argument('<name>', 'Attribute name')
    .option('-l, --label <label>', 'New label')
    .option('-r, --required', 'Make the attribute required')
    .option('--optional', 'Make the attribute optional')
    .option('-o, --options <list>', 'Replace options (select)', parseOptionList)
    .option('--rule <key=value>', 'Replace rules, repeatable', collectRule)
    .option('--clear-rules', 'Remove every rule')
    .action(async (name: string, options) => {
      try {
        if (options.required && options.optional) {
          outputError('Use either --required or --optional, not both');
          process.exit(1);
        }

        const changes: AttributeChanges = {};
        if (options.label !== undefined) changes.label = options.label;
        if (options.required) changes.required = true;
        if (options.optional) changes.required = false;
        if (options.options !== undefined) changes.options = options.options;
        if (options.clearRules) changes.validationRules = {};
        if (options.rule !== undefined) changes.validationRules = options.rule;

        if (Object.keys(changes).length === 0) {
          outputError('Nothing to update');
          process.exit(1);
        }

        const { engine } = await openEngine(getConfigPath);
        const definition = engine.catalog.update(name, changes);
        outputSuccess(`Attribute '${definition.name}' updated`, definition);
      } catch (error) {
        outputFailure('Failed to update attribute', error);
        process.exit(1);
      }
    });

  cmd
    .command('delete')
    .description('Delete an attribute and all of its values')
    .argument('<name>', 'Attribute name')
    .option('-f, --force', 'Delete even when values are stored')
    .action(async (name: string, options) => {
      try {
        const { engine } = await openEngine(getConfigPath);
        engine.catalog.require(name);
        const stored = engine.catalog.valueCounts().get(name) ?? 0;

        if (stored > 0 && !options.force) {
          output(
            { deleted: false, name, values: stored },
            `Attribute '${name}' has ${stored} stored value(s). Use --force to delete it and its values.`
          );
          process.exit(1);
        }

        const result = engine.deleteAttribute(name);
        outputSuccess(
          `Attribute '${name}' deleted (${result.deleted} value(s), ${result.entities.length} entit${result.entities.length === 1 ? 'y' : 'ies'})`,
          result
        );
      } catch (error) {
        outputFailure('Failed to delete attribute', error);
        process.exit(1);
      }
    });

  return cmd;
}
