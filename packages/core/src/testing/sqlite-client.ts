/**
 * SQLite-backed audit store for tests
 *
 * Runs the audit delegates against an in-process SQLite database (sql.js) created
 * with the tables, unique keys and foreign keys of `schema/audit.prisma`.
 * Timestamps are stored as epoch milliseconds, the way Prisma stores `DateTime`
 * on SQLite. `$transaction` wraps its callback in BEGIN/COMMIT and rolls back on
 * a throw; SQLite allows one writer, so transactions on a client run one at a time.
 *
 * @module testing/sqlite-client
 */

import sqlJs from 'sql.js';
import type { BindParams, Database, SqlJsStatic, SqlValue } from 'sql.js';
import type {
  AuditChangeRow,
  AuditChangeWhere,
  AuditDbClient,
  AuditFieldRow,
  AuditResourceRow,
  AuditTableRow,
} from '../interfaces/db-client.js';
import type { TransactionalAuditDbClient } from '../interfaces/transaction.js';

const SCHEMA = [
  `CREATE TABLE audit_tables (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    label TEXT NOT NULL,
    resource_id_field TEXT NOT NULL
  )`,
  `CREATE TABLE audit_fields (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    table_id INTEGER NOT NULL REFERENCES audit_tables (id),
    name TEXT NOT NULL,
    UNIQUE (table_id, name)
  )`,
  `CREATE TABLE audit_resources (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    table_id INTEGER NOT NULL REFERENCES audit_tables (id),
    external_id TEXT NOT NULL,
    UNIQUE (table_id, external_id)
  )`,
  `CREATE TABLE audit_changes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    commit_id TEXT NOT NULL,
    field_id INTEGER NOT NULL REFERENCES audit_fields (id),
    resource_id INTEGER NOT NULL REFERENCES audit_resources (id),
    old_value TEXT,
    new_value TEXT,
    timestamp INTEGER NOT NULL,
    user_id TEXT,
    reason TEXT,
    impersonated_by TEXT
  )`,
  'CREATE INDEX audit_changes_resource_field_timestamp ON audit_changes (resource_id, field_id, timestamp)',
  'CREATE INDEX audit_changes_commit ON audit_changes (commit_id)',
];

const TABLE_COLUMNS = 'id, name, label, resource_id_field';
const CHANGE_COLUMNS =
  'id, commit_id, field_id, resource_id, old_value, new_value, timestamp, user_id, reason, impersonated_by';

export interface SqliteRowCounts {
  tables: number;
  fields: number;
  resources: number;
  changes: number;
}

export interface SqliteAuditClient extends TransactionalAuditDbClient {
  /** Row counts per audit table */
  counts(): SqliteRowCounts;
  /** All stored rows, ordered by id */
  dump(): {
    tables: AuditTableRow[];
    fields: AuditFieldRow[];
    resources: AuditResourceRow[];
    changes: AuditChangeRow[];
  };
  /** Number of transactions that committed */
  readonly committedTransactions: number;
  /** Number of transactions that rolled back */
  readonly rolledBackTransactions: number;
  /** Delete every row and restart the id sequences */
  reset(): void;
  close(): void;
}

type SqlRow = Record<string, SqlValue>;

let sqlite: Promise<SqlJsStatic> | undefined;

// sql.js ships CommonJS; its `default` export points back at the init function
const loadSqlite = (): Promise<SqlJsStatic> => {
  sqlite ??= sqlJs.default();
  return sqlite;
};

const readInteger = (row: SqlRow, column: string): number => {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new TypeError(`Column ${column} holds ${typeof value}, expected an integer`);
  }
  return value;
};

const readText = (row: SqlRow, column: string): string => {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new TypeError(`Column ${column} holds ${typeof value}, expected text`);
  }
  return value;
};

const readNullableText = (row: SqlRow, column: string): string | null =>
  row[column] === null ? null : readText(row, column);

const toTableRow = (row: SqlRow): AuditTableRow => ({
  id: readInteger(row, 'id'),
  name: readText(row, 'name'),
  label: readText(row, 'label'),
  resourceIdField: readText(row, 'resource_id_field'),
});

const toFieldRow = (row: SqlRow): AuditFieldRow => ({
  id: readInteger(row, 'id'),
  tableId: readInteger(row, 'table_id'),
  name: readText(row, 'name'),
});

const toResourceRow = (row: SqlRow): AuditResourceRow => ({
  id: readInteger(row, 'id'),
  tableId: readInteger(row, 'table_id'),
  externalId: readText(row, 'external_id'),
});

const toChangeRow = (row: SqlRow): AuditChangeRow => ({
  id: readInteger(row, 'id'),
  commitId: readText(row, 'commit_id'),
  fieldId: readInteger(row, 'field_id'),
  resourceId: readInteger(row, 'resource_id'),
  oldValue: readNullableText(row, 'old_value'),
  newValue: readNullableText(row, 'new_value'),
  timestamp: new Date(readInteger(row, 'timestamp')),
  userId: readNullableText(row, 'user_id'),
  reason: readNullableText(row, 'reason'),
  impersonatedBy: readNullableText(row, 'impersonated_by'),
});

/** `column IN (?, ...)`, or a false condition for an empty list */
const inList = (column: string, values: readonly SqlValue[], params: SqlValue[]): string => {
  if (values.length === 0) {
    return '0';
  }
  params.push(...values);
  return `${column} IN (${values.map(() => '?').join(', ')})`;
};

const buildChangeWhere = (where: AuditChangeWhere, params: SqlValue[]): string => {
  const conditions = [inList('field_id', where.fieldId.in, params), inList('resource_id', where.resourceId.in, params)];
  if (where.userId !== undefined) {
    conditions.push(inList('user_id', where.userId.in, params));
  }
  if (where.timestamp?.gte !== undefined) {
    conditions.push('timestamp >= ?');
    params.push(where.timestamp.gte.getTime());
  }
  if (where.timestamp?.lte !== undefined) {
    conditions.push('timestamp <= ?');
    params.push(where.timestamp.lte.getTime());
  }
  return conditions.join(' AND ');
};

/**
 * Creates an audit store over a fresh in-memory SQLite database
 *
 * @example
 * ```typescript
 * const client = await createSqliteAuditClient();
 * const engine = createAuditEngine({ client, schemaMetadata });
 *
 * // ... run audited transactions
 * expect(client.counts().changes).toBe(2);
 * ```
 */
export const createSqliteAuditClient = async (): Promise<SqliteAuditClient> => {
  const SQL = await loadSqlite();
  const db: Database = new SQL.Database();
  db.run('PRAGMA foreign_keys = ON');
  for (const statement of SCHEMA) {
    db.run(statement);
  }

  let queue: Promise<void> = Promise.resolve();
  let committedTransactions = 0;
  let rolledBackTransactions = 0;

  const selectAll = (sql: string, params: BindParams = []): SqlRow[] => {
    const statement = db.prepare(sql);
    try {
      statement.bind(params);
      const rows: SqlRow[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  };

  const selectOne = (sql: string, params: BindParams): SqlRow => {
    const [row] = selectAll(sql, params);
    if (!row) {
      throw new Error(`Expected a row from: ${sql}`);
    }
    return row;
  };

  const delegates: AuditDbClient = {
    auditTable: {
      upsert: async ({ where, create, update }) => {
        const assignments: string[] = [];
        const updateParams: SqlValue[] = [];
        if (update.label !== undefined) {
          assignments.push('label = ?');
          updateParams.push(update.label);
        }
        if (update.resourceIdField !== undefined) {
          assignments.push('resource_id_field = ?');
          updateParams.push(update.resourceIdField);
        }
        const onConflict = assignments.length > 0 ? `DO UPDATE SET ${assignments.join(', ')}` : 'DO NOTHING';

        db.run(`INSERT INTO audit_tables (name, label, resource_id_field) VALUES (?, ?, ?) ON CONFLICT (name) ${onConflict}`, [
          create.name,
          create.label,
          create.resourceIdField,
          ...updateParams,
        ]);
        return toTableRow(selectOne(`SELECT ${TABLE_COLUMNS} FROM audit_tables WHERE name = ?`, [where.name]));
      },
      findUnique: async ({ where }) => {
        const [row] = selectAll(`SELECT ${TABLE_COLUMNS} FROM audit_tables WHERE name = ?`, [where.name]);
        return row ? toTableRow(row) : null;
      },
    },

    auditField: {
      upsert: async ({ where, create }) => {
        db.run('INSERT INTO audit_fields (table_id, name) VALUES (?, ?) ON CONFLICT (table_id, name) DO NOTHING', [
          create.tableId,
          create.name,
        ]);
        const { tableId, name } = where.tableId_name;
        return toFieldRow(
          selectOne('SELECT id, table_id, name FROM audit_fields WHERE table_id = ? AND name = ?', [tableId, name]),
        );
      },
      findMany: async ({ where }) => {
        const params: SqlValue[] = [where.tableId];
        const nameCondition = where.name === undefined ? '' : ` AND ${inList('name', where.name.in, params)}`;
        return selectAll(`SELECT id, table_id, name FROM audit_fields WHERE table_id = ?${nameCondition} ORDER BY id`, params).map(
          toFieldRow,
        );
      },
    },

    auditResource: {
      upsert: async ({ where, create }) => {
        db.run(
          'INSERT INTO audit_resources (table_id, external_id) VALUES (?, ?) ON CONFLICT (table_id, external_id) DO NOTHING',
          [create.tableId, create.externalId],
        );
        const { tableId, externalId } = where.tableId_externalId;
        return toResourceRow(
          selectOne('SELECT id, table_id, external_id FROM audit_resources WHERE table_id = ? AND external_id = ?', [
            tableId,
            externalId,
          ]),
        );
      },
      findMany: async ({ where }) => {
        const params: SqlValue[] = [where.tableId];
        const condition = inList('external_id', where.externalId.in, params);
        return selectAll(
          `SELECT id, table_id, external_id FROM audit_resources WHERE table_id = ? AND ${condition} ORDER BY id`,
          params,
        ).map(toResourceRow);
      },
    },

    auditChange: {
      createMany: async ({ data }) => {
        db.run('SAVEPOINT create_many');
        try {
          for (const input of data) {
            db.run(
              `INSERT INTO audit_changes (commit_id, field_id, resource_id, old_value, new_value, timestamp, user_id, reason, impersonated_by)
               VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
              [
                input.commitId,
                input.fieldId,
                input.resourceId,
                input.oldValue,
                input.newValue,
                input.timestamp.getTime(),
                input.userId,
                input.reason,
                input.impersonatedBy,
              ],
            );
          }
        } catch (error) {
          db.run('ROLLBACK TO create_many');
          db.run('RELEASE create_many');
          throw error;
        }
        db.run('RELEASE create_many');
        return { count: data.length };
      },
      findMany: async ({ where, orderBy, skip, take }) => {
        const [{ timestamp: timestampOrder }, { id: idOrder }] = orderBy;
        const params: SqlValue[] = [];
        const condition = buildChangeWhere(where, params);
        let sql = `SELECT ${CHANGE_COLUMNS} FROM audit_changes WHERE ${condition} ORDER BY timestamp ${timestampOrder.toUpperCase()}, id ${idOrder.toUpperCase()}`;
        if (take !== undefined || skip !== undefined) {
          sql += ' LIMIT ? OFFSET ?';
          params.push(take ?? -1, skip ?? 0);
        }
        return selectAll(sql, params).map(toChangeRow);
      },
    },
  };

  const $transaction = <T>(fn: (tx: AuditDbClient) => Promise<T>): Promise<T> => {
    const run = queue.then(async () => {
      db.run('BEGIN');
      try {
        const result = await fn(delegates);
        db.run('COMMIT');
        committedTransactions += 1;
        return result;
      } catch (error) {
        db.run('ROLLBACK');
        rolledBackTransactions += 1;
        throw error;
      }
    });
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };

  const countRows = (table: string): number => readInteger(selectOne(`SELECT COUNT(*) AS count FROM ${table}`, []), 'count');

  return {
    ...delegates,
    $transaction,
    counts: () => ({
      tables: countRows('audit_tables'),
      fields: countRows('audit_fields'),
      resources: countRows('audit_resources'),
      changes: countRows('audit_changes'),
    }),
    dump: () => ({
      tables: selectAll(`SELECT ${TABLE_COLUMNS} FROM audit_tables ORDER BY id`).map(toTableRow),
      fields: selectAll('SELECT id, table_id, name FROM audit_fields ORDER BY id').map(toFieldRow),
      resources: selectAll('SELECT id, table_id, external_id FROM audit_resources ORDER BY id').map(toResourceRow),
      changes: selectAll(`SELECT ${CHANGE_COLUMNS} FROM audit_changes ORDER BY id`).map(toChangeRow),
    }),
    get committedTransactions() {
      return committedTransactions;
    },
    get rolledBackTransactions() {
      return rolledBackTransactions;
    },
    reset: () => {
      for (const table of ['audit_changes', 'audit_resources', 'audit_fields', 'audit_tables']) {
        db.run(`DELETE FROM ${table}`);
      }
      db.run('DELETE FROM sqlite_sequence');
      committedTransactions = 0;
      rolledBackTransactions = 0;
    },
    close: () => {
      db.close();
    },
  };
};
