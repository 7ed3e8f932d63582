/**
 * Smart Constructors Module - Validated object creation with Result pattern
 *
 * Validates input data and returns Result types instead of throwing exceptions.
 */

import { createCommitId, createResourceId } from './branded-types.js';
import type { ChangeLogEntry, ChangeLogInput } from './change-log-types.js';

// ============================================================================
// Type Definitions
// ============================================================================

/** Validation error type with field name and error message */
export interface ValidationError {
  /** Field that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Result type for operations that can fail
 *
 * Discriminated union type representing success or failure, following Railway Oriented Programming pattern.
 *
 * @template T - Type of the successful value
 * @template E - Type of error (defaults to ValidationError)
 *
 * @example
 * ```typescript
 * const result = createChangeLogEntry(input);
 * if (result.success) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export type Result<T, E = ValidationError> = { success: true; value: T } | { success: false; errors: E[] };

/** Creates a successful Result */
export const success = <T>(value: T): Result<T, never> => ({
  success: true,
  value,
});

/** Creates a failed Result */
export const failure = <E = ValidationError>(errors: E[]): Result<never, E> => ({
  success: false,
  errors,
});

/** @internal Validates that a string field is non-empty */
const validateNonEmptyStringField = (value: string | undefined, fieldName: string, errors: ValidationError[]): void => {
  if (!value || value.trim() === '') {
    errors.push({
      field: fieldName,
      message: `${fieldName} cannot be empty`,
    });
  }
};

/** @internal Validates that a Date field is valid */
const validateDateField = (value: Date | undefined, fieldName: string, errors: ValidationError[]): void => {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    errors.push({
      field: fieldName,
      message: `${fieldName} must be a valid Date`,
    });
  }
};

/** @internal Rejects no-op transitions */
const validateTransition = (input: ChangeLogInput, errors: ValidationError[]): void => {
  if (input.oldValue === null && input.newValue === null) {
    errors.push({ field: 'newValue', message: 'oldValue and newValue cannot both be absent' });
  } else if (input.oldValue === input.newValue) {
    errors.push({ field: 'newValue', message: 'newValue must differ from oldValue' });
  }
};

/** @internal Safely creates a branded ID and accumulates errors on failure */
const tryCreateBrandedId = <T>(
  id: string,
  fieldName: string,
  createFn: (id: string) => T,
  errors: ValidationError[],
): T | undefined => {
  try {
    return createFn(id);
  } catch (error) {
    errors.push({
      field: fieldName,
      message: error instanceof Error ? error.message : `Invalid ${fieldName}`,
    });
    return undefined;
  }
};

/**
 * Creates a validated ChangeLogEntry with Branded IDs
 *
 * Collects all validation errors and returns them together.
 *
 * @example
 * ```typescript
 * const result = createChangeLogEntry({
 *   commitId: 'tz4a98xxat96iws9zmbrgj3a',
 *   recordType: 'Customer',
 *   tableLabel: 'Customer',
 *   field: 'name',
 *   resourceId: '1',
 *   oldValue: 'John',
 *   newValue: 'Jane',
 *   timestamp: new Date(),
 *   actingUserId: 'user-123',
 *   reason: null,
 *   impersonatedBy: null,
 * });
 * ```
 */
export const createChangeLogEntry = (input: ChangeLogInput): Result<ChangeLogEntry> => {
  const validationErrors: ValidationError[] = [];

  const validatedCommitId = tryCreateBrandedId(input.commitId, 'commitId', createCommitId, validationErrors);
  const validatedResourceId = tryCreateBrandedId(input.resourceId, 'resourceId', createResourceId, validationErrors);

  validateNonEmptyStringField(input.recordType, 'recordType', validationErrors);
  validateNonEmptyStringField(input.tableLabel, 'tableLabel', validationErrors);
  validateNonEmptyStringField(input.field, 'field', validationErrors);
  validateDateField(input.timestamp, 'timestamp', validationErrors);
  validateTransition(input, validationErrors);

  if (validationErrors.length > 0 || validatedCommitId === undefined || validatedResourceId === undefined) {
    return failure(validationErrors);
  }

  return success({
    commitId: validatedCommitId,
    recordType: input.recordType,
    tableLabel: input.tableLabel,
    field: input.field,
    resourceId: validatedResourceId,
    oldValue: input.oldValue,
    newValue: input.newValue,
    timestamp: input.timestamp,
    actingUserId: input.actingUserId,
    reason: input.reason,
    impersonatedBy: input.impersonatedBy,
  });
};
