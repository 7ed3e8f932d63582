/**
 * Mapping from persistence-layer field types to value types
 *
 * @module schema/field-types
 */

import type { FieldMetadata } from '../interfaces/schema-metadata.js';
import type { BuiltInValueType, ValueType } from '../serialization/types.js';

const SCALAR_TYPE_MAP: Readonly<Record<string, BuiltInValueType>> = {
  String: 'string',
  Int: 'integer',
  Float: 'float',
  Decimal: 'decimal',
  BigInt: 'bigint',
  Boolean: 'boolean',
  DateTime: 'timestamp',
  Json: 'json',
  Bytes: 'bytes',
  Uuid: 'uuid',
};

/**
 * Infers the value type of a field from its metadata
 *
 * Unknown scalar types keep their own name, so a handler registered under that name
 * picks them up. `Decimal` columns map to `'decimal'`, which takes decimal strings;
 * register the client's decimal class under that name to track decimal objects.
 *
 * @example
 * ```typescript
 * inferValueType({ name: 'age', type: 'Int', kind: 'scalar', ... }); // => 'integer'
 * inferValueType({ name: 'status', type: 'Status', kind: 'enum', ... }); // => 'string'
 * inferValueType({ name: 'total', type: 'Decimal', kind: 'scalar', ... }); // => 'decimal'
 * inferValueType({ name: 'price', type: 'Money', kind: 'scalar', ... }); // => 'Money'
 * ```
 */
export const inferValueType = (field: FieldMetadata): ValueType => {
  if (field.kind === 'enum') {
    return 'string';
  }
  if (field.isList) {
    return 'json';
  }
  return SCALAR_TYPE_MAP[field.type] ?? field.type;
};
