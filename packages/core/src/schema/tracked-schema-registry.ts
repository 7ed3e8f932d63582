/**
 * Tracked schema registry
 *
 * @module schema/tracked-schema-registry
 *
 * @remarks
 * Declarations run once at startup and fail fast. The diff path only reads from
 * the registry.
 *
 * @example
 * ```typescript
 * const schemas = createTrackedSchemaRegistry({ schemaMetadata });
 * schemas.declare('Customer', { trackedFields: ['name', 'email'] });
 *
 * schemas.lookup('Customer')?.trackedFields;
 * // => [{ name: 'name', type: 'string' }, { name: 'email', type: 'string' }]
 * ```
 */

import { DEFAULTS } from '../constants.js';
import { ConfigurationError, TableNotTrackedError } from '../errors.js';
import type { FieldMetadata, SchemaMetadata } from '../interfaces/schema-metadata.js';
import { coreLog } from '../utils/debug.js';
import { inferValueType } from './field-types.js';
import type { DeclareOptions, TrackedField, TrackedSchema, TrackedSchemaRegistry } from './types.js';

export interface TrackedSchemaRegistryOptions {
  schemaMetadata: SchemaMetadata;
  /** User-id field applied to record types that declare none and have such a field */
  defaultUserIdField?: string;
  /** Resource-id field used when neither the declaration nor the metadata names one */
  defaultResourceIdField?: string;
}

const requireScalarField = (
  fields: Map<string, FieldMetadata>,
  recordType: string,
  fieldName: string,
  role: string,
): FieldMetadata => {
  const field = fields.get(fieldName);
  if (!field) {
    throw new ConfigurationError(`${role} "${fieldName}" does not exist on record type "${recordType}"`);
  }
  if (field.kind === 'object') {
    throw new ConfigurationError(
      `${role} "${fieldName}" on record type "${recordType}" is a relation; only scalar fields can be tracked`,
    );
  }
  return field;
};

const normalizeTrackedFields = (
  recordType: string,
  options: DeclareOptions,
  fields: Map<string, FieldMetadata>,
): TrackedField[] => {
  if (options.trackedFields.length === 0) {
    throw new ConfigurationError(`trackedFields for record type "${recordType}" must not be empty`);
  }

  const seen = new Set<string>();
  return options.trackedFields.map((entry) => {
    const name = typeof entry === 'string' ? entry : entry.name;
    if (seen.has(name)) {
      throw new ConfigurationError(`Tracked field "${name}" is listed twice for record type "${recordType}"`);
    }
    seen.add(name);

    const metadata = requireScalarField(fields, recordType, name, 'Tracked field');
    const type = options.fieldTypes?.[name] ?? (typeof entry === 'string' ? inferValueType(metadata) : entry.type);
    return Object.freeze({ name, type });
  });
};

const isSameSchema = (left: TrackedSchema, right: TrackedSchema): boolean =>
  left.resourceIdField === right.resourceIdField &&
  left.userIdField === right.userIdField &&
  left.label === right.label &&
  left.trackedFields.length === right.trackedFields.length &&
  left.trackedFields.every((field, index) => {
    const other = right.trackedFields[index];
    return other !== undefined && other.name === field.name && other.type === field.type;
  });

/**
 * Creates an isolated tracked schema registry
 */
export const createTrackedSchemaRegistry = (options: TrackedSchemaRegistryOptions): TrackedSchemaRegistry => {
  const { schemaMetadata, defaultUserIdField } = options;
  const defaultResourceIdField = options.defaultResourceIdField ?? DEFAULTS.RESOURCE_ID_FIELD;
  const schemas = new Map<string, TrackedSchema>();

  const declare = (recordType: string, declareOptions: DeclareOptions): TrackedSchema => {
    const allFields = schemaMetadata.getAllFields(recordType);
    if (!allFields) {
      throw new ConfigurationError(`Record type "${recordType}" is unknown to the schema metadata`);
    }
    const fields = new Map(allFields.map((field) => [field.name, field]));

    const trackedFields = normalizeTrackedFields(recordType, declareOptions, fields);

    const resourceIdField =
      declareOptions.resourceIdField ?? allFields.find((field) => field.isId)?.name ?? defaultResourceIdField;
    requireScalarField(fields, recordType, resourceIdField, 'Resource id field');

    let userIdField: string | undefined;
    if (declareOptions.userIdField !== undefined) {
      userIdField = requireScalarField(fields, recordType, declareOptions.userIdField, 'User id field').name;
    } else if (defaultUserIdField !== undefined && fields.get(defaultUserIdField)?.kind === 'scalar') {
      userIdField = defaultUserIdField;
    }

    const schema: TrackedSchema = Object.freeze({
      recordType,
      trackedFields: Object.freeze(trackedFields),
      resourceIdField,
      userIdField,
      label: declareOptions.label ?? recordType,
    });

    const existing = schemas.get(recordType);
    if (existing) {
      if (isSameSchema(existing, schema)) {
        return existing;
      }
      throw new ConfigurationError(`Record type "${recordType}" is already declared with a different field set`);
    }

    schemas.set(recordType, schema);
    coreLog(
      'Declared %s tracking [%s] (resource id: %s)',
      recordType,
      trackedFields.map((field) => `${field.name}:${field.type}`).join(', '),
      resourceIdField,
    );
    return schema;
  };

  return {
    declare,
    lookup: (recordType) => schemas.get(recordType),
    require: (recordType) => {
      const schema = schemas.get(recordType);
      if (!schema) {
        throw new TableNotTrackedError(recordType);
      }
      return schema;
    },
    has: (recordType) => schemas.has(recordType),
    list: () => [...schemas.values()],
    clear: () => {
      schemas.clear();
    },
  };
};
