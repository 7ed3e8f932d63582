/**
 * Fluent declaration builder
 *
 * @module schema/builder
 *
 * @example
 * ```typescript
 * const customerSchema = trackRecordType(schemas, 'Customer')
 *   .fields('name', 'email')
 *   .field('balance', 'Money')
 *   .resourceId('customerNumber')
 *   .label('Customers')
 *   .declare();
 * ```
 */

import type { ValueType } from '../serialization/types.js';
import type { DeclareOptions, TrackedField, TrackedSchema, TrackedSchemaRegistry } from './types.js';

export interface TrackRecordTypeBuilder {
  /** Track fields with types inferred from the schema metadata */
  fields(...names: string[]): TrackRecordTypeBuilder;
  /** Track one field with an explicit value type */
  field(name: string, type: ValueType): TrackRecordTypeBuilder;
  resourceId(fieldName: string): TrackRecordTypeBuilder;
  userId(fieldName: string): TrackRecordTypeBuilder;
  label(label: string): TrackRecordTypeBuilder;
  /** Register the declaration; fails fast on invalid input */
  declare(): TrackedSchema;
}

export const trackRecordType = (registry: TrackedSchemaRegistry, recordType: string): TrackRecordTypeBuilder => {
  const trackedFields: Array<string | TrackedField> = [];
  const options: Omit<DeclareOptions, 'trackedFields'> = {};

  const builder: TrackRecordTypeBuilder = {
    fields: (...names) => {
      trackedFields.push(...names);
      return builder;
    },
    field: (name, type) => {
      trackedFields.push({ name, type });
      return builder;
    },
    resourceId: (fieldName) => {
      options.resourceIdField = fieldName;
      return builder;
    },
    userId: (fieldName) => {
      options.userIdField = fieldName;
      return builder;
    },
    label: (label) => {
      options.label = label;
      return builder;
    },
    declare: () => registry.declare(recordType, { ...options, trackedFields }),
  };

  return builder;
};
