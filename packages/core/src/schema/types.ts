/**
 * Tracked schema type definitions
 *
 * @module schema/types
 */

import type { ValueType } from '../serialization/types.js';

export interface TrackedField {
  name: string;
  type: ValueType;
}

/**
 * Static audit metadata of one record type, immutable once declared
 */
export interface TrackedSchema {
  readonly recordType: string;
  /** Tracked fields in declaration order (never empty) */
  readonly trackedFields: readonly TrackedField[];
  /** Field holding the business key of an instance */
  readonly resourceIdField: string;
  /** Field holding the owning user of an instance, used when no actor is resolved */
  readonly userIdField: string | undefined;
  /** Human label, defaults to the record type */
  readonly label: string;
}

/**
 * Options for declaring a record type
 *
 * @example
 * ```typescript
 * registry.declare('Customer', {
 *   trackedFields: ['name', 'email', { name: 'balance', type: 'Money' }],
 *   resourceIdField: 'id',
 *   label: 'Customers',
 * });
 * ```
 */
export interface DeclareOptions {
  trackedFields: ReadonlyArray<string | TrackedField>;
  resourceIdField?: string;
  userIdField?: string;
  label?: string;
  /** Per-field type overrides, applied on top of inferred types */
  fieldTypes?: Readonly<Record<string, ValueType>>;
}

export interface TrackedSchemaRegistry {
  /** Declare a record type; redeclaring with the same field set returns the existing schema */
  declare(recordType: string, options: DeclareOptions): TrackedSchema;
  lookup(recordType: string): TrackedSchema | undefined;
  /** @throws {TableNotTrackedError} When the record type was never declared */
  require(recordType: string): TrackedSchema;
  has(recordType: string): boolean;
  list(): TrackedSchema[];
  /** Remove every declaration (tests only) */
  clear(): void;
}
