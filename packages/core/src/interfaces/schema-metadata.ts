/**
 * Schema Metadata Interfaces
 *
 * Framework-agnostic interfaces for runtime introspection of the host's record types.
 * The persistence layer owns this information; the audit engine only reads it.
 *
 * @packageDocumentation
 */

/**
 * Schema metadata provider interface
 *
 * Provides runtime access to the fields of each record type.
 */
export interface SchemaMetadata {
  /** All fields of a record type, or `undefined` when the type is unknown */
  getAllFields(recordType: string): FieldMetadata[] | undefined;
  getFieldMetadata(recordType: string, fieldName: string): FieldMetadata | undefined;
}

/**
 * Field kind as reported by the persistence layer
 *
 * - `scalar`: plain column
 * - `enum`: enumerated column, stored as text
 * - `object`: relation to another record type (never trackable)
 */
export type FieldKind = 'scalar' | 'enum' | 'object';

/**
 * Field metadata
 *
 * @example
 * ```typescript
 * { name: 'id', type: 'Int', kind: 'scalar', isId: true, isList: false, isRequired: true }
 * { name: 'orders', type: 'Order', kind: 'object', isId: false, isList: true, isRequired: false }
 * ```
 */
export interface FieldMetadata {
  name: string;
  type: string;
  kind: FieldKind;
  isRequired: boolean;
  isId: boolean;
  isList: boolean;
}
