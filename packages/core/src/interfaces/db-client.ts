/**
 * Audit Store Client Interfaces
 *
 * Model delegates the engine needs from the external store, shaped after the
 * Prisma client API so a generated client for `schema/audit.prisma` satisfies them.
 * Any store exposing the same delegates can be used.
 *
 * @packageDocumentation
 */

export interface AuditTableRow {
  id: number;
  name: string;
  label: string;
  resourceIdField: string;
}

export interface AuditFieldRow {
  id: number;
  tableId: number;
  name: string;
}

export interface AuditResourceRow {
  id: number;
  tableId: number;
  externalId: string;
}

export interface AuditChangeRow {
  /** Autoincrement key; defines insertion order */
  id: number;
  commitId: string;
  fieldId: number;
  resourceId: number;
  oldValue: string | null;
  newValue: string | null;
  timestamp: Date;
  userId: string | null;
  reason: string | null;
  impersonatedBy: string | null;
}

export type AuditChangeCreateInput = Omit<AuditChangeRow, 'id'>;

/** `{ in: [...] }` list filter */
export interface InFilter<T> {
  in: T[];
}

/** Inclusive range filter */
export interface DateRangeFilter {
  gte?: Date;
  lte?: Date;
}

export type SortDirection = 'asc' | 'desc';

export interface AuditTableDelegate {
  upsert(args: {
    where: { name: string };
    create: Omit<AuditTableRow, 'id'>;
    update: Partial<Omit<AuditTableRow, 'id' | 'name'>>;
  }): Promise<AuditTableRow>;
  findUnique(args: { where: { name: string } }): Promise<AuditTableRow | null>;
}

export interface AuditFieldDelegate {
  upsert(args: {
    where: { tableId_name: { tableId: number; name: string } };
    create: Omit<AuditFieldRow, 'id'>;
    update: Record<string, never>;
  }): Promise<AuditFieldRow>;
  findMany(args: { where: { tableId: number; name?: InFilter<string> } }): Promise<AuditFieldRow[]>;
}

export interface AuditResourceDelegate {
  upsert(args: {
    where: { tableId_externalId: { tableId: number; externalId: string } };
    create: Omit<AuditResourceRow, 'id'>;
    update: Record<string, never>;
  }): Promise<AuditResourceRow>;
  findMany(args: { where: { tableId: number; externalId: InFilter<string> } }): Promise<AuditResourceRow[]>;
}

export interface AuditChangeWhere {
  fieldId: InFilter<number>;
  resourceId: InFilter<number>;
  userId?: InFilter<string>;
  timestamp?: DateRangeFilter;
}

export interface AuditChangeDelegate {
  createMany(args: { data: AuditChangeCreateInput[] }): Promise<{ count: number }>;
  findMany(args: {
    where: AuditChangeWhere;
    orderBy: [{ timestamp: SortDirection }, { id: SortDirection }];
    skip?: number;
    take?: number;
  }): Promise<AuditChangeRow[]>;
}

/**
 * Store client (base or transactional) holding the four audit delegates
 *
 * @example
 * ```typescript
 * const client: AuditDbClient = prisma;
 * await client.auditTable.findUnique({ where: { name: 'Customer' } });
 * ```
 */
export interface AuditDbClient {
  auditTable: AuditTableDelegate;
  auditField: AuditFieldDelegate;
  auditResource: AuditResourceDelegate;
  auditChange: AuditChangeDelegate;
}
