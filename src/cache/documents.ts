/**
 * Cache documents - JSON snapshots stored in a column of the host table
 */

import type Database from 'better-sqlite3';
import type { CapabilityAdapter } from '../backend/capabilities.js';
import type { AttributeValue, CacheDocument, HostTableConfig } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface ResolvedHost {
  table: string;
  idColumn: string;
  column: string;
}

function quoteIdentifier(name: string): string {
  return `"${name}"`;
}

function isAttributeValue(value: unknown): value is AttributeValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/**
 * Parse a stored document; null when the text is not a flat JSON object
 */
export function parseDocument(text: string): CacheDocument | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const document: CacheDocument = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isAttributeValue(value)) {
      return null;
    }
    document[key] = value;
  }
  return document;
}

export class CacheDocumentStore {
  private readonly hosts = new Map<string, ResolvedHost>();
  private readonly slotPresence = new Map<string, boolean>();
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    private readonly adapter: CapabilityAdapter,
    hosts: Record<string, HostTableConfig> = {},
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;

    for (const [entityType, host] of Object.entries(hosts)) {
      const resolved: ResolvedHost = {
        table: host.table,
        idColumn: host.idColumn ?? 'id',
        column: host.column ?? 'dynamic_attributes',
      };
      for (const identifier of Object.values(resolved)) {
        if (!IDENTIFIER_PATTERN.test(identifier)) {
          throw new Error(`Invalid identifier '${identifier}' in cache host for '${entityType}'`);
        }
      }
      this.hosts.set(entityType, resolved);
    }
  }

  /** Entity types with a configured host table */
  hostTypes(): string[] {
    return [...this.hosts.keys()].sort();
  }

  /**
   * Whether entities of this type carry a cache document
   * (configured host whose table has the document column)
   */
  hasSlot(entityType: string): boolean {
    const known = this.slotPresence.get(entityType);
    if (known !== undefined) {
      return known;
    }

    const host = this.hosts.get(entityType);
    let present = false;
    if (host) {
      const columns = this.db.prepare(`PRAGMA table_info(${quoteIdentifier(host.table)})`).all() as Array<{ name: string }>;
      present = columns.some(c => c.name === host.column);
      if (!present) {
        this.logger.warn({
          event: 'cache_slot_missing',
          entity_type: entityType,
          table: host.table,
          column: host.column,
        });
      }
    }

    this.slotPresence.set(entityType, present);
    return present;
  }

  /**
   * Whether the host row exists. Types without a host table have no rows to check.
   */
  exists(entityType: string, entityId: string): boolean {
    const host = this.hosts.get(entityType);
    if (!host) {
      return true;
    }
    const row = this.db.prepare(`
      SELECT 1 FROM ${quoteIdentifier(host.table)} WHERE ${quoteIdentifier(host.idColumn)} = ?
    `).get(entityId);
    return row !== undefined;
  }

  /**
   * @returns The stored document, or null when none has been written
   */
  read(entityType: string, entityId: string): CacheDocument | null {
    if (!this.hasSlot(entityType)) {
      return null;
    }
    const host = this.requireHost(entityType);

    const row = this.db.prepare(`
      SELECT ${quoteIdentifier(host.column)} AS document
      FROM ${quoteIdentifier(host.table)}
      WHERE ${quoteIdentifier(host.idColumn)} = ?
    `).get(entityId) as { document: string | null } | undefined;

    if (!row || row.document === null) {
      return null;
    }

    const document = parseDocument(row.document);
    if (!document) {
      this.logger.warn({ event: 'cache_document_invalid', entity_type: entityType, entity_id: entityId });
    }
    return document;
  }

  /**
   * Overwrite the stored document
   * @returns false when the host row does not exist
   */
  write(entityType: string, entityId: string, document: CacheDocument): boolean {
    const host = this.requireHost(entityType);
    const placeholder = this.adapter.supports('json_functions') ? 'json(?)' : '?';

    const result = this.db.prepare(`
      UPDATE ${quoteIdentifier(host.table)}
      SET ${quoteIdentifier(host.column)} = ${placeholder}
      WHERE ${quoteIdentifier(host.idColumn)} = ?
    `).run(JSON.stringify(document), entityId);
    return result.changes > 0;
  }

  private requireHost(entityType: string): ResolvedHost {
    const host = this.hosts.get(entityType);
    if (!host) {
      throw new Error(`No cache host configured for entity type '${entityType}'`);
    }
    return host;
  }
}
