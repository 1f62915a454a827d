import type { JoinKind } from './sql/sql.js';

/**
 * Machine-readable error codes raised by the builder.
 */
export type QuillSqlErrorCode =
  | 'UNSUPPORTED_DIALECT'
  | 'INCOMPLETE_QUERY'
  | 'UNKNOWN_FIELD'
  | 'UNSUPPORTED_CAPABILITY'
  | 'INVALID_JOIN_TYPE'
  | 'INVALID_IDENTIFIER';

// --- Base Error ---

export class QuillSqlError extends Error {
  readonly code: QuillSqlErrorCode;

  constructor(code: QuillSqlErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QuillSqlError';
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message
    };
  }
}

// --- Dialect lookup ---

export class UnsupportedDialectError extends QuillSqlError {
  declare readonly code: 'UNSUPPORTED_DIALECT';
  readonly dialect: string | undefined;

  constructor(dialect: string | undefined, message?: string) {
    super(
      'UNSUPPORTED_DIALECT',
      message ??
        `Dialect "${String(dialect)}" is not registered. Use DialectFactory.register(...) to register it.`
    );
    this.name = 'UnsupportedDialectError';
    this.dialect = dialect;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), dialect: this.dialect };
  }
}

// --- Query building ---

export class IncompleteQueryError extends QuillSqlError {
  declare readonly code: 'INCOMPLETE_QUERY';

  constructor(message = 'Cannot build query: no source table. Call from(...) first.') {
    super('INCOMPLETE_QUERY', message);
    this.name = 'IncompleteQueryError';
  }
}

export class InvalidJoinTypeError extends QuillSqlError {
  declare readonly code: 'INVALID_JOIN_TYPE';
  readonly joinType: string;

  constructor(joinType: string, allowed: readonly JoinKind[]) {
    super('INVALID_JOIN_TYPE', `Invalid join type "${joinType}". Expected one of: ${allowed.join(', ')}`);
    this.name = 'InvalidJoinTypeError';
    this.joinType = joinType;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), joinType: this.joinType };
  }
}

export class UnsupportedCapabilityError extends QuillSqlError {
  declare readonly code: 'UNSUPPORTED_CAPABILITY';
  readonly capability: string;
  readonly dialect: string;

  constructor(capability: string, dialect: string) {
    super('UNSUPPORTED_CAPABILITY', `${capability} is not supported by the ${dialect} dialect.`);
    this.name = 'UnsupportedCapabilityError';
    this.capability = capability;
    this.dialect = dialect;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), capability: this.capability, dialect: this.dialect };
  }
}

// --- Schema access ---

export class UnknownFieldError extends QuillSqlError {
  declare readonly code: 'UNKNOWN_FIELD';
  readonly owner: string;
  readonly field: string;

  constructor(owner: string, field: string) {
    super('UNKNOWN_FIELD', `"${owner}" has no field "${field}"`);
    this.name = 'UnknownFieldError';
    this.owner = owner;
    this.field = field;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), owner: this.owner, field: this.field };
  }
}

export class InvalidIdentifierError extends QuillSqlError {
  declare readonly code: 'INVALID_IDENTIFIER';
  readonly identifier: string;

  constructor(identifier: string, kind: string) {
    super('INVALID_IDENTIFIER', `Invalid ${kind} name "${identifier}"`);
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), identifier: this.identifier };
  }
}
