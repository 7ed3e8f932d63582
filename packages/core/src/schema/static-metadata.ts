/**
 * Schema metadata backed by a static field list per record type
 *
 * @module schema/static-metadata
 *
 * @remarks
 * Useful for hosts whose persistence layer has no runtime introspection, and for tests.
 */

import type { FieldMetadata, SchemaMetadata } from '../interfaces/schema-metadata.js';

/** Field description where everything but name and type is optional */
export type FieldDefinition = Pick<FieldMetadata, 'name' | 'type'> & Partial<Omit<FieldMetadata, 'name' | 'type'>>;

const toFieldMetadata = (definition: FieldDefinition): FieldMetadata => ({
  kind: 'scalar',
  isRequired: false,
  isId: false,
  isList: false,
  ...definition,
});

/**
 * @example
 * ```typescript
 * const metadata = createStaticSchemaMetadata({
 *   Customer: [
 *     { name: 'id', type: 'Int', isId: true },
 *     { name: 'name', type: 'String' },
 *     { name: 'orders', type: 'Order', kind: 'object', isList: true },
 *   ],
 * });
 * ```
 */
export const createStaticSchemaMetadata = (models: Readonly<Record<string, FieldDefinition[]>>): SchemaMetadata => {
  const fieldsByModel = new Map(
    Object.entries(models).map(([recordType, definitions]) => [recordType, definitions.map(toFieldMetadata)]),
  );

  return {
    getAllFields: (recordType) => fieldsByModel.get(recordType),
    getFieldMetadata: (recordType, fieldName) =>
      fieldsByModel.get(recordType)?.find((field) => field.name === fieldName),
  };
};
