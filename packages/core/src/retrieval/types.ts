/**
 * Change retrieval type definitions
 *
 * @module retrieval/types
 */

import type { SortOrder } from '../constants.js';
import type { RawId } from '../domain/branded-types.js';
import type { DeserializationError } from '../errors.js';
import type { AuditDbClient } from '../interfaces/db-client.js';
import type { StoredValue, ValueType } from '../serialization/types.js';

/** Inclusive timestamp range; either bound may be omitted */
export interface DateRange {
  from?: Date;
  to?: Date;
}

/**
 * Retrieval filters, combined with AND
 *
 * @example
 * ```typescript
 * const filters: ChangeQueryFilters = {
 *   resourceIds: [1, 2],
 *   fields: ['email'],
 *   dateRange: { from: new Date('2025-01-01T00:00:00.000Z') },
 * };
 * ```
 */
export interface ChangeQueryFilters {
  /** Business keys to include (required, at least one) */
  resourceIds: RawId | readonly RawId[];
  fields?: string | readonly string[];
  userIds?: RawId | readonly RawId[];
  dateRange?: DateRange;
  limit?: number;
  offset?: number;
  /** Timestamp order, ties broken by insertion order (default: asc) */
  order?: SortOrder;
}

interface ChangeRecordBase {
  /** Insertion sequence of the stored row */
  id: number;
  commitId: string;
  recordType: string;
  tableLabel: string;
  field: string;
  resourceId: string;
  timestamp: Date;
  actingUserId: string | null;
  reason: string | null;
  impersonatedBy: string | null;
  oldStored: StoredValue;
  newStored: StoredValue;
}

/** Entry whose values were restored to the field's declared type */
export interface ResolvedChangeRecord extends ChangeRecordBase {
  _tag: 'Resolved';
  valueType: ValueType;
  oldValue: unknown;
  newValue: unknown;
}

/** Entry whose stored values could not be restored; the query still succeeds */
export interface UnreadableChangeRecord extends ChangeRecordBase {
  _tag: 'Unreadable';
  valueType: ValueType | undefined;
  error: DeserializationError;
}

/**
 * Typed change record ADT
 *
 * @example
 * ```typescript
 * for (const record of records) {
 *   if (record._tag === 'Resolved') {
 *     console.log(record.field, record.oldValue, '->', record.newValue);
 *   } else {
 *     console.warn('Unreadable change', record.id, record.error.message);
 *   }
 * }
 * ```
 */
export type ChangeRecord = ResolvedChangeRecord | UnreadableChangeRecord;

export interface ChangeRetriever {
  /**
   * Query changes of one record type
   *
   * @param client - Store client to read through (default: the retriever's client)
   * @throws {TableNotTrackedError} If the record type was never declared
   * @throws {QueryValidationError} If the filters are invalid
   */
  query(recordType: string, filters: ChangeQueryFilters, client?: AuditDbClient): Promise<ChangeRecord[]>;
}
