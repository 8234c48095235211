/**
 * Config manager - handles reading, writing, and resolving config
 */

import { dirname } from 'path';
import {
  type Config,
  type HostTableConfig,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONFIG,
  DEFAULT_DB_FILE,
  DEFAULT_DEFINITION_CACHE_TTL_MS,
} from '../types/index.js';
import { resolveDbPath } from '../db/connection.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { atomicWriteFile, fileExists, readFileSafe } from '../utils/fs.js';
import type { LogLevel } from '../utils/logger.js';
import { parseConfig, validateConfig, type ConfigValidationResult } from './schema.js';

/** Config with every default filled in */
export interface ResolvedConfig {
  dbPath: string;
  serverVersion?: string;
  hosts: Record<string, HostTableConfig>;
  definitionCacheTtlMs: number;
  batchSize: number;
  logLevel: LogLevel;
}

export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;
  /** Cache TTL in milliseconds (default: 5 seconds) */
  private cacheTtlMs: number;
  /** Timestamp when cache was last updated */
  private cacheUpdatedAt: number = 0;

  constructor(configPath?: string, options?: { cacheTtlMs?: number }) {
    this.configPath = resolveConfigPath({ configPath });
    this.cacheTtlMs = options?.cacheTtlMs ?? 5000;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return dirname(this.configPath);
  }

  async exists(): Promise<boolean> {
    return fileExists(this.configPath);
  }

  async load(): Promise<Config> {
    // Return cached config if still valid
    const now = Date.now();
    if (this.config && (now - this.cacheUpdatedAt) < this.cacheTtlMs) {
      return this.config;
    }

    const content = await readFileSafe(this.configPath);
    if (content === null) {
      throw new Error(`Config file not found: ${this.configPath}`);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new Error(`Invalid config: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    this.config = config;
    this.cacheUpdatedAt = now;
    return config;
  }

  /**
   * Invalidate the config cache (force reload on next access)
   */
  invalidateCache(): void {
    this.cacheUpdatedAt = 0;
  }

  /**
   * Load the config file, or the defaults when there is none.
   * An existing but invalid file still throws.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return { ...DEFAULT_CONFIG };
    }
    return this.load();
  }

  /**
   * Config with defaults applied and the database path resolved
   */
  async resolve(): Promise<ResolvedConfig> {
    const config = await this.loadOrDefault();
    return {
      dbPath: resolveDbPath(this.getConfigDir(), config.database?.path ?? DEFAULT_DB_FILE),
      serverVersion: config.database?.serverVersion,
      hosts: config.cache?.hosts ?? {},
      definitionCacheTtlMs: config.catalog?.definitionCacheTtlMs ?? DEFAULT_DEFINITION_CACHE_TTL_MS,
      batchSize: config.sync?.batchSize ?? DEFAULT_BATCH_SIZE,
      logLevel: config.logging?.level ?? 'info',
    };
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new Error(`Invalid config: ${result.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    await atomicWriteFile(this.configPath, JSON.stringify(config, null, 2) + '\n');
    this.config = config;
    this.cacheUpdatedAt = Date.now();
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save({ ...DEFAULT_CONFIG });
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ConfigValidationResult> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }

  // Cache host operations
  async setHost(entityType: string, host: HostTableConfig): Promise<void> {
    const config = await this.loadOrDefault();
    const hosts = { ...(config.cache?.hosts ?? {}), [entityType]: host };
    await this.save({ ...config, cache: { ...config.cache, hosts } });
  }

  async removeHost(entityType: string): Promise<boolean> {
    const config = await this.loadOrDefault();
    const hosts = { ...(config.cache?.hosts ?? {}) };
    if (!(entityType in hosts)) {
      return false;
    }
    delete hosts[entityType];
    await this.save({ ...config, cache: { ...config.cache, hosts } });
    return true;
  }
}
