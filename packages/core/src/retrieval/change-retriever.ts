/**
 * Change Retriever
 *
 * Reads change log rows back under filters and restores their typed values.
 *
 * @module retrieval/change-retriever
 *
 * @remarks
 * An entry whose stored values can no longer be restored (for example after a
 * custom handler was unregistered) is returned as an `Unreadable` record carrying
 * the {@link DeserializationError}. It never fails the whole query.
 *
 * @example
 * ```typescript
 * const retriever = createChangeRetriever({ client: prisma, schemas, types });
 *
 * const records = await retriever.query('Customer', {
 *   resourceIds: [1],
 *   fields: ['email'],
 *   dateRange: { from: new Date('2025-01-01T00:00:00.000Z') },
 * });
 * ```
 */

import { DeserializationError } from '../errors.js';
import type { AuditChangeRow, AuditChangeWhere, AuditDbClient } from '../interfaces/db-client.js';
import type { TrackedSchema, TrackedSchemaRegistry } from '../schema/types.js';
import type { TypeRegistry, ValueType } from '../serialization/types.js';
import { queryLog } from '../utils/debug.js';
import type { NormalizedFilters } from './filters.js';
import { normalizeFilters } from './filters.js';
import type { ChangeQueryFilters, ChangeRecord, ChangeRetriever } from './types.js';

export interface ChangeRetrieverOptions {
  /** Default client for reads */
  client: AuditDbClient;
  schemas: TrackedSchemaRegistry;
  types: TypeRegistry;
}

const buildWhere = (fieldIds: number[], resourceIds: number[], filters: NormalizedFilters): AuditChangeWhere => {
  const where: AuditChangeWhere = {
    fieldId: { in: fieldIds },
    resourceId: { in: resourceIds },
  };

  if (filters.userIds !== undefined) {
    where.userId = { in: filters.userIds };
  }

  if (filters.from !== undefined || filters.to !== undefined) {
    where.timestamp = {};
    if (filters.from !== undefined) where.timestamp.gte = filters.from;
    if (filters.to !== undefined) where.timestamp.lte = filters.to;
  }

  return where;
};

const toRecord = (
  row: AuditChangeRow,
  schema: TrackedSchema,
  fieldName: string,
  externalId: string,
  valueType: ValueType | undefined,
  types: TypeRegistry,
): ChangeRecord => {
  const base = {
    id: row.id,
    commitId: row.commitId,
    recordType: schema.recordType,
    tableLabel: schema.label,
    field: fieldName,
    resourceId: externalId,
    timestamp: row.timestamp,
    actingUserId: row.userId,
    reason: row.reason,
    impersonatedBy: row.impersonatedBy,
    oldStored: row.oldValue,
    newStored: row.newValue,
  };

  if (valueType === undefined) {
    return {
      ...base,
      _tag: 'Unreadable',
      valueType,
      error: new DeserializationError(
        'unknown',
        row.newValue ?? row.oldValue ?? '',
        `Field "${fieldName}" of ${schema.recordType} is no longer tracked; its type is unknown`,
      ),
    };
  }

  try {
    return {
      ...base,
      _tag: 'Resolved',
      valueType,
      oldValue: types.deserialize(row.oldValue, valueType),
      newValue: types.deserialize(row.newValue, valueType),
    };
  } catch (error) {
    if (!(error instanceof DeserializationError)) {
      throw error;
    }
    queryLog('Unreadable change %d (%s.%s): %s', row.id, schema.recordType, fieldName, error.message);
    return { ...base, _tag: 'Unreadable', valueType, error };
  }
};

export const createChangeRetriever = (options: ChangeRetrieverOptions): ChangeRetriever => {
  const { schemas, types } = options;

  const query = async (
    recordType: string,
    filters: ChangeQueryFilters,
    client: AuditDbClient = options.client,
  ): Promise<ChangeRecord[]> => {
    const schema = schemas.require(recordType);
    const normalized = normalizeFilters(schema, filters);

    const table = await client.auditTable.findUnique({ where: { name: schema.recordType } });
    if (!table) {
      queryLog('No audit table row for %s yet', recordType);
      return [];
    }

    const fieldRows = await client.auditField.findMany({
      where: normalized.fields ? { tableId: table.id, name: { in: normalized.fields } } : { tableId: table.id },
    });
    const resourceRows = await client.auditResource.findMany({
      where: { tableId: table.id, externalId: { in: normalized.resourceIds } },
    });
    if (fieldRows.length === 0 || resourceRows.length === 0) {
      return [];
    }

    const fieldNames = new Map(fieldRows.map((row) => [row.id, row.name]));
    const externalIds = new Map(resourceRows.map((row) => [row.id, row.externalId]));
    const fieldTypes = new Map(schema.trackedFields.map((field) => [field.name, field.type]));

    const rows = await client.auditChange.findMany({
      where: buildWhere([...fieldNames.keys()], [...externalIds.keys()], normalized),
      orderBy: [{ timestamp: normalized.order }, { id: normalized.order }],
      ...(normalized.offset !== undefined ? { skip: normalized.offset } : {}),
      ...(normalized.limit !== undefined ? { take: normalized.limit } : {}),
    });
    queryLog('Fetched %d change row(s) for %s', rows.length, recordType);

    return rows.map((row) => {
      const fieldName = fieldNames.get(row.fieldId) ?? `#${row.fieldId}`;
      const externalId = externalIds.get(row.resourceId) ?? `#${row.resourceId}`;
      return toRecord(row, schema, fieldName, externalId, fieldTypes.get(fieldName), types);
    });
  };

  return { query };
};
