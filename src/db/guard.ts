/**
 * Storage failure boundary
 *
 * Engine errors pass through untouched. Anything else raised by the driver
 * is logged with the operation context and replaced by a StorageError that
 * does not carry the driver's message.
 */

import { AttributeEngineError, StorageError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

export interface StorageContext {
  entityType?: string;
  entityId?: string | null;
  attributes?: string[];
  [key: string]: unknown;
}

export function guardStorage<T>(
  logger: Logger,
  operation: string,
  context: StorageContext,
  fn: () => T
): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof AttributeEngineError) {
      throw error;
    }

    const { entityType, entityId, attributes, ...rest } = context;
    logger.error({
      event: 'storage_failed',
      operation,
      entity_type: entityType,
      entity_id: entityId,
      attributes,
      ...rest,
      error: error instanceof Error ? error.message : String(error),
    });

    throw new StorageError(operation, {
      entity_type: entityType ?? null,
      entity_id: entityId ?? null,
      attributes: attributes ?? [],
      ...rest,
    });
  }
}
