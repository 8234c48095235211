/**
 * Shared setup for commands that work on the attributes database
 */

import { basename, dirname } from 'path';
import { ConfigManager, type ResolvedConfig } from '../config/index.js';
import { getAttributesDb } from '../db/connection.js';
import { createEngine, type Engine } from '../engine.js';
import { createLogger } from '../utils/logger.js';
import { getOutputOptions } from '../utils/output.js';

export interface CommandContext {
  config: ResolvedConfig;
  engine: Engine;
}

export async function openEngine(getConfigPath: () => string): Promise<CommandContext> {
  const manager = new ConfigManager(getConfigPath());
  const config = await manager.resolve();
  const db = getAttributesDb(dirname(config.dbPath), basename(config.dbPath));
  const logger = createLogger(undefined, getOutputOptions().verbose ? 'debug' : config.logLevel);

  const engine = createEngine({
    db,
    hosts: config.hosts,
    serverVersion: config.serverVersion,
    definitionCacheTtlMs: config.definitionCacheTtlMs,
    logger,
  });

  return { config, engine };
}
