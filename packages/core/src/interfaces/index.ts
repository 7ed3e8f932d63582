/**
 * Core Interfaces
 *
 * Framework-agnostic interfaces enabling field auditing against any store.
 *
 * @packageDocumentation
 */

export type {
  AuditChangeCreateInput,
  AuditChangeDelegate,
  AuditChangeRow,
  AuditChangeWhere,
  AuditDbClient,
  AuditFieldDelegate,
  AuditFieldRow,
  AuditResourceDelegate,
  AuditResourceRow,
  AuditTableDelegate,
  AuditTableRow,
  DateRangeFilter,
  InFilter,
  SortDirection,
} from './db-client.js';

export type { FieldKind, FieldMetadata, SchemaMetadata } from './schema-metadata.js';

export type { AuditTransaction, TransactionalAuditDbClient } from './transaction.js';
