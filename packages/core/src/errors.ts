/**
 * Error taxonomy for field auditing
 *
 * @module errors
 *
 * @remarks
 * Declaration problems surface at startup as {@link ConfigurationError}.
 * Serialization problems surface on the write path ({@link UnsupportedTypeError})
 * and the read path ({@link DeserializationError}). Every write-path error aborts
 * the enclosing transaction.
 */

/** Base class for every error raised by the audit engine */
export class AuditError extends Error {
  constructor(message: string) {
    super(`[@field-audit] ${message}`);
    this.name = 'AuditError';
  }
}

/** Invalid tracked-schema declaration or engine options */
export class ConfigurationError extends AuditError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** No handler exists for a value, or the handler rejected it */
export class UnsupportedTypeError extends AuditError {
  constructor(
    public readonly valueType: string,
    message: string,
  ) {
    super(message);
    this.name = 'UnsupportedTypeError';
  }
}

/** A stored form could not be restored to its declared type */
export class DeserializationError extends AuditError {
  constructor(
    public readonly valueType: string,
    public readonly stored: string,
    message: string,
  ) {
    super(message);
    this.name = 'DeserializationError';
  }
}

/** Pop without matching push, or a frame left behind inside a scope */
export class ContextStackError extends AuditError {
  constructor(message: string) {
    super(message);
    this.name = 'ContextStackError';
  }
}

/** Tracked instance without a usable business key */
export class MissingResourceIdError extends AuditError {
  constructor(
    public readonly recordType: string,
    public readonly resourceIdField: string,
  ) {
    super(`Record of type "${recordType}" has no usable resource id in field "${resourceIdField}"`);
    this.name = 'MissingResourceIdError';
  }
}

export class TableNotTrackedError extends AuditError {
  constructor(public readonly recordType: string) {
    super(`Record type "${recordType}" is not declared for auditing. Call declare() at startup.`);
    this.name = 'TableNotTrackedError';
  }
}

/** Rejected retrieval filters */
export class QueryValidationError extends AuditError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}
