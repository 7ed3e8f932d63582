/**
 * Retrieval filter normalization
 *
 * @module retrieval/filters
 */

import type { SortOrder } from '../constants.js';
import { DEFAULTS } from '../constants.js';
import type { RawId } from '../domain/branded-types.js';
import { tryNormalizeId } from '../domain/branded-types.js';
import { QueryValidationError } from '../errors.js';
import type { TrackedSchema } from '../schema/types.js';
import type { ChangeQueryFilters } from './types.js';

export interface NormalizedFilters {
  resourceIds: string[];
  fields: string[] | undefined;
  userIds: string[] | undefined;
  from: Date | undefined;
  to: Date | undefined;
  limit: number | undefined;
  offset: number | undefined;
  order: SortOrder;
}

const isList = <T>(value: T | readonly T[]): value is readonly T[] => Array.isArray(value);

const toList = <T>(value: T | readonly T[]): T[] => (isList(value) ? [...value] : [value]);

const normalizeIds = (value: RawId | readonly RawId[], name: string): string[] => {
  const ids = toList(value).map((raw) => {
    const id = tryNormalizeId(raw);
    if (id === undefined) {
      throw new QueryValidationError(`${name} contains an invalid identifier: ${String(raw)}`);
    }
    return id;
  });
  return [...new Set(ids)];
};

const validateDate = (value: Date | undefined, name: string): Date | undefined => {
  if (value !== undefined && (!(value instanceof Date) || Number.isNaN(value.getTime()))) {
    throw new QueryValidationError(`${name} must be a valid Date`);
  }
  return value;
};

const validateCount = (value: number | undefined, name: string): number | undefined => {
  if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
    throw new QueryValidationError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
};

/**
 * Validates filters against the schema and converts them to lists of strings
 *
 * @throws {QueryValidationError}
 */
export const normalizeFilters = (schema: TrackedSchema, filters: ChangeQueryFilters): NormalizedFilters => {
  const resourceIds = normalizeIds(filters.resourceIds, 'resourceIds');
  if (resourceIds.length === 0) {
    throw new QueryValidationError('resourceIds must contain at least one resource id');
  }

  let fields: string[] | undefined;
  if (filters.fields !== undefined) {
    fields = [...new Set(toList(filters.fields))];
    const tracked = new Set(schema.trackedFields.map((field) => field.name));
    const unknown = fields.filter((field) => !tracked.has(field));
    if (unknown.length > 0) {
      throw new QueryValidationError(`Fields not tracked on ${schema.recordType}: ${unknown.join(', ')}`);
    }
  }

  const from = validateDate(filters.dateRange?.from, 'dateRange.from');
  const to = validateDate(filters.dateRange?.to, 'dateRange.to');
  if (from && to && from.getTime() > to.getTime()) {
    throw new QueryValidationError('dateRange.from cannot be after dateRange.to');
  }

  const order = filters.order ?? DEFAULTS.SORT_ORDER;
  if (order !== 'asc' && order !== 'desc') {
    throw new QueryValidationError(`order must be 'asc' or 'desc', got ${String(order)}`);
  }

  return {
    resourceIds,
    fields,
    userIds: filters.userIds === undefined ? undefined : normalizeIds(filters.userIds, 'userIds'),
    from,
    to,
    limit: validateCount(filters.limit, 'limit'),
    offset: validateCount(filters.offset, 'offset'),
    order,
  };
};
