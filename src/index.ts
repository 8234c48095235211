/**
 * dynattr - dynamic attribute engine
 * Programmatic API exports
 */

// Types
export type {
  AttributeType,
  AttributeValue,
  ValidationRules,
  AttributeDefinition,
  AttributeInput,
  AttributeChanges,
  EntityId,
  EntityRef,
  CacheDocument,
  HostTableConfig,
  Config,
} from './types/index.js';
export { ATTRIBUTE_TYPES, DEFAULT_CONFIG } from './types/index.js';

// Errors
export {
  AttributeEngineError,
  DefinitionError,
  DuplicateAttributeError,
  AttributeNotFoundError,
  ValidationError,
  EntityNotPersistedError,
  InvalidFilterError,
  StorageError,
} from './errors.js';
export type { ErrorCode, ErrorResponse, DefinitionViolation, ValidationIssue, FieldError } from './errors.js';

// Engine
export { createEngine } from './engine.js';
export type { Engine, EngineOptions, OptimizeOptions, OptimizeResult, DatabaseInfo } from './engine.js';

// Components
export { AttributeCatalog } from './catalog/catalog.js';
export type { CatalogOptions, DeleteResult } from './catalog/catalog.js';
export { validateDefinition } from './catalog/definition.js';
export { ValidationEngine } from './validation/engine.js';
export type { ValidationResult } from './validation/engine.js';
export { columnFor, slotValuesFor } from './validation/types.js';
export { ValueStore } from './store/value-store.js';
export { CacheSynchronizer } from './cache/synchronizer.js';
export type { ResyncOptions } from './cache/synchronizer.js';
export { CacheDocumentStore } from './cache/documents.js';
export { SearchCompiler } from './search/compiler.js';
export { parseExpression } from './search/expression.js';
export type { FilterMap, FilterValue, FilterCriteria, FilterOperator, LikeOptions, SearchLogic, SortDirection } from './search/types.js';
export { CapabilityAdapter, clearFeatureCache } from './backend/capabilities.js';
export type { BackendKind, Feature, FeatureSet, SqlFragment, MigrationConfig } from './backend/capabilities.js';

// Config
export { ConfigManager, parseConfig, validateConfig } from './config/index.js';

// Database
export { openAttributesDb, getAttributesDb, closeAllDbs } from './db/connection.js';

// Utils
export { createLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { resolveConfigPath, getDefaultConfigDir, getDefaultConfigPath } from './utils/config-path.js';
