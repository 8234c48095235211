/**
 * Config schema validation
 */

import type { Config } from '../types/index.js';
import { LOG_LEVELS } from '../utils/logger.js';

export interface ConfigIssue {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function validateIdentifier(value: unknown, path: string, required: boolean): ConfigIssue[] {
  if (value === undefined && !required) {
    return [];
  }
  if (typeof value !== 'string' || !IDENTIFIER_PATTERN.test(value)) {
    return [{ path, message: 'must be a SQL identifier (letters, digits, underscores)' }];
  }
  return [];
}

function validateDatabase(database: unknown): ConfigIssue[] {
  const errors: ConfigIssue[] = [];

  if (!isObject(database)) {
    return [{ path: 'database', message: 'database must be an object' }];
  }

  if (database.path !== undefined && (typeof database.path !== 'string' || !database.path.trim())) {
    errors.push({ path: 'database.path', message: 'path must be a non-empty string' });
  }

  if (database.serverVersion !== undefined && typeof database.serverVersion !== 'string') {
    errors.push({ path: 'database.serverVersion', message: 'serverVersion must be a string' });
  }

  return errors;
}

function validateCache(cache: unknown): ConfigIssue[] {
  const errors: ConfigIssue[] = [];

  if (!isObject(cache)) {
    return [{ path: 'cache', message: 'cache must be an object' }];
  }

  if (cache.hosts === undefined) {
    return errors;
  }

  if (!isObject(cache.hosts)) {
    return [{ path: 'cache.hosts', message: 'hosts must be an object keyed by entity type' }];
  }

  for (const [entityType, host] of Object.entries(cache.hosts)) {
    const path = `cache.hosts.${entityType}`;
    if (!isObject(host)) {
      errors.push({ path, message: 'host must be an object' });
      continue;
    }
    errors.push(...validateIdentifier(host.table, `${path}.table`, true));
    errors.push(...validateIdentifier(host.idColumn, `${path}.idColumn`, false));
    errors.push(...validateIdentifier(host.column, `${path}.column`, false));
  }

  return errors;
}

export function validateConfig(config: unknown): ConfigValidationResult {
  const errors: ConfigIssue[] = [];

  if (!isObject(config)) {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  if (config.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  if (config.database !== undefined) {
    errors.push(...validateDatabase(config.database));
  }

  if (config.cache !== undefined) {
    errors.push(...validateCache(config.cache));
  }

  if (config.catalog !== undefined) {
    if (!isObject(config.catalog)) {
      errors.push({ path: 'catalog', message: 'catalog must be an object' });
    } else {
      const ttl = config.catalog.definitionCacheTtlMs;
      if (ttl !== undefined && (typeof ttl !== 'number' || !Number.isInteger(ttl) || ttl < 0)) {
        errors.push({ path: 'catalog.definitionCacheTtlMs', message: 'definitionCacheTtlMs must be a non-negative integer' });
      }
    }
  }

  if (config.sync !== undefined) {
    if (!isObject(config.sync)) {
      errors.push({ path: 'sync', message: 'sync must be an object' });
    } else if (config.sync.batchSize !== undefined && !isPositiveInteger(config.sync.batchSize)) {
      errors.push({ path: 'sync.batchSize', message: 'batchSize must be a positive integer' });
    }
  }

  if (config.logging !== undefined) {
    if (!isObject(config.logging)) {
      errors.push({ path: 'logging', message: 'logging must be an object' });
    } else {
      const level = config.logging.level;
      if (level !== undefined && !(typeof level === 'string' && (LOG_LEVELS as readonly string[]).includes(level))) {
        errors.push({ path: 'logging.level', message: `level must be one of: ${LOG_LEVELS.join(', ')}` });
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ConfigIssue[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  const result = validateConfig(parsed);
  if (!result.valid) {
    return { config: null, errors: result.errors };
  }

  return { config: parsed as Config, errors: [] };
}
