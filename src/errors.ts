/**
 * Error types for attribute engine operations
 *
 * Every error carries a stable code, an HTTP-like status and a context
 * record, and serializes to { error, message, context } for API responses.
 * User-facing messages use attribute labels, never internal names.
 */

import type { AttributeType, EntityRef } from './types/index.js';

export type ErrorCode =
  | 'DEFINITION_INVALID'
  | 'DUPLICATE_ATTRIBUTE'
  | 'ATTRIBUTE_NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'ENTITY_NOT_PERSISTED'
  | 'INVALID_FILTER'
  | 'STORAGE_FAILED';

export interface ErrorResponse {
  error: string;
  message: string;
  context: Record<string, unknown>;
}

export abstract class AttributeEngineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }

  /** Message suitable for end users */
  get userMessage(): string {
    return this.message;
  }

  toJSON(): ErrorResponse {
    return {
      error: this.name,
      message: this.userMessage,
      context: this.context,
    };
  }
}

export interface DefinitionViolation {
  field: string;
  message: string;
}

export class DefinitionError extends AttributeEngineError {
  readonly code = 'DEFINITION_INVALID';
  readonly status = 422;

  constructor(readonly violations: DefinitionViolation[], context: Record<string, unknown> = {}) {
    super(
      `Invalid attribute definition: ${violations.map(v => `${v.field}: ${v.message}`).join('; ')}`,
      { ...context, violations }
    );
  }
}

export class DuplicateAttributeError extends AttributeEngineError {
  readonly code = 'DUPLICATE_ATTRIBUTE';
  readonly status = 409;

  constructor(readonly attributeName: string) {
    super(`An attribute with the name '${attributeName}' already exists.`, { attribute_name: attributeName });
  }
}

export class AttributeNotFoundError extends AttributeEngineError {
  readonly code = 'ATTRIBUTE_NOT_FOUND';
  readonly status = 404;

  constructor(readonly attributeName: string, context: Record<string, unknown> = {}) {
    super(`Attribute '${attributeName}' does not exist.`, { ...context, attribute_name: attributeName });
  }

  get userMessage(): string {
    return `The attribute '${this.attributeName}' does not exist. Please check the attribute name and try again.`;
  }
}

/** One attribute's failures inside a ValidationError */
export interface ValidationIssue {
  attributeName: string;
  /** null when the attribute itself is unknown */
  label: string | null;
  type: AttributeType | null;
  messages: string[];
  value: unknown;
}

/** API-facing shape of a single attribute failure */
export interface FieldError {
  attributeName: string;
  userMessage: string;
  machineContext: {
    code: ErrorCode;
    type: AttributeType | null;
    value: unknown;
    messages: string[];
  };
}

export class ValidationError extends AttributeEngineError {
  readonly code = 'VALIDATION_FAILED';
  readonly status = 422;

  constructor(readonly issues: ValidationIssue[], context: Record<string, unknown> = {}) {
    super(
      `Validation failed for ${issues.map(i => `'${i.attributeName}'`).join(', ')}: ` +
        issues.flatMap(i => i.messages).join(' '),
      { ...context, failed_attributes: issues.map(i => i.attributeName) }
    );
  }

  /** All messages, flattened in attribute order */
  get messages(): string[] {
    return this.issues.flatMap(i => i.messages);
  }

  get userMessage(): string {
    if (this.issues.length === 1) {
      const issue = this.issues[0];
      return `Validation failed for ${issue.label ?? issue.attributeName}: ${issue.messages.join(' ')}`;
    }
    return `Validation failed for ${this.issues.length} attributes.`;
  }

  toFieldErrors(): FieldError[] {
    return this.issues.map(issue => ({
      attributeName: issue.attributeName,
      userMessage: issue.messages.join(' '),
      machineContext: {
        code: this.code,
        type: issue.type,
        value: issue.value,
        messages: issue.messages,
      },
    }));
  }

  toJSON(): ErrorResponse & { errors: FieldError[] } {
    return { ...super.toJSON(), errors: this.toFieldErrors() };
  }
}

export class EntityNotPersistedError extends AttributeEngineError {
  readonly code = 'ENTITY_NOT_PERSISTED';
  readonly status = 409;

  constructor(ref: EntityRef, context: Record<string, unknown> = {}) {
    super(`Entity of type '${ref.type}' must be saved before setting attributes.`, {
      ...context,
      entity_type: ref.type,
      entity_id: ref.id ?? null,
    });
  }
}

export class InvalidFilterError extends AttributeEngineError {
  readonly code = 'INVALID_FILTER';
  readonly status = 400;

  constructor(readonly attributeName: string, reason: string) {
    super(`Invalid filter for '${attributeName}': ${reason}`, { attribute_name: attributeName, reason });
  }
}

/**
 * Unexpected persistence failure. The driver's message is logged where the
 * failure happens and never surfaced through this error.
 */
export class StorageError extends AttributeEngineError {
  readonly code = 'STORAGE_FAILED';
  readonly status = 500;

  constructor(readonly operation: string, context: Record<string, unknown> = {}) {
    super(`Attribute operation '${operation}' failed.`, { ...context, operation });
  }

  get userMessage(): string {
    return `The attribute ${this.operation} could not be completed. Please try again later.`;
  }
}
