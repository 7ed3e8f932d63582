/**
 * Audit Writer
 *
 * Persists pending changes as normalized, immutable change log rows. Table, field
 * and resource labels are stored once in identity rows and referenced by id.
 *
 * @module writer/audit-writer
 *
 * @example
 * ```typescript
 * const writer = createAuditWriter({ schemas });
 *
 * await prisma.$transaction(async (tx) => {
 *   await tx.customer.update({ where: { id: 1 }, data: { name: 'Jane' } });
 *   await writer.commit(changes, context, tx);
 * });
 * ```
 */

import { createId } from '@paralleldrive/cuid2';
import type { EffectiveAuditContext } from '../context/types.js';
import { createCommitId } from '../domain/branded-types.js';
import type { ChangeLogEntry, PendingChange } from '../domain/change-log-types.js';
import { createChangeLogEntry } from '../domain/smart-constructors.js';
import { AuditError } from '../errors.js';
import type { AuditChangeCreateInput, AuditDbClient } from '../interfaces/db-client.js';
import type { TrackedSchema, TrackedSchemaRegistry } from '../schema/types.js';
import { writeLog } from '../utils/debug.js';
import type { IdentityUnit } from './identity-cache.js';
import { createIdentityCache, identityKeys } from './identity-cache.js';
import type { AuditWriter, WriteReceipt } from './types.js';

export interface AuditWriterOptions {
  schemas: TrackedSchemaRegistry;
  /** Timestamp factory, called once per batch */
  now?: () => Date;
  /** Commit id factory (default: cuid2) */
  generateCommitId?: () => string;
}

/**
 * Resolves identity rows through unique-key upserts, memoized per unit
 *
 * @internal
 */
const createIdentityResolver = (client: AuditDbClient, unit: IdentityUnit) => {
  const resolveTable = async (schema: TrackedSchema): Promise<number> => {
    const key = identityKeys.table(schema.recordType);
    const cached = unit.get(key);
    if (cached !== undefined) return cached;

    const row = await client.auditTable.upsert({
      where: { name: schema.recordType },
      create: { name: schema.recordType, label: schema.label, resourceIdField: schema.resourceIdField },
      update: { label: schema.label, resourceIdField: schema.resourceIdField },
    });
    writeLog('Resolved table %s -> %d', schema.recordType, row.id);
    unit.set(key, row.id);
    return row.id;
  };

  const resolveField = async (tableId: number, name: string): Promise<number> => {
    const key = identityKeys.field(tableId, name);
    const cached = unit.get(key);
    if (cached !== undefined) return cached;

    const row = await client.auditField.upsert({
      where: { tableId_name: { tableId, name } },
      create: { tableId, name },
      update: {},
    });
    unit.set(key, row.id);
    return row.id;
  };

  const resolveResource = async (tableId: number, externalId: string): Promise<number> => {
    const key = identityKeys.resource(tableId, externalId);
    const cached = unit.get(key);
    if (cached !== undefined) return cached;

    const row = await client.auditResource.upsert({
      where: { tableId_externalId: { tableId, externalId } },
      create: { tableId, externalId },
      update: {},
    });
    unit.set(key, row.id);
    return row.id;
  };

  return { resolveTable, resolveField, resolveResource };
};

export const createAuditWriter = (options: AuditWriterOptions): AuditWriter => {
  const { schemas } = options;
  const now = options.now ?? (() => new Date());
  const generateCommitId = options.generateCommitId ?? createId;
  const identities = createIdentityCache();

  const commit = async (
    changes: readonly PendingChange[],
    context: EffectiveAuditContext,
    client: AuditDbClient,
    unit?: IdentityUnit,
  ): Promise<WriteReceipt> => {
    const timestamp = now();
    if (changes.length === 0) {
      return { _tag: 'Skipped', reason: 'no field changes', timestamp };
    }

    const commitId = createCommitId(generateCommitId());
    const ownUnit = unit ?? identities.beginUnit();
    const resolver = createIdentityResolver(client, ownUnit);

    const entries: ChangeLogEntry[] = [];
    const rows: AuditChangeCreateInput[] = [];

    for (const change of changes) {
      const schema = schemas.require(change.recordType);
      const result = createChangeLogEntry({
        commitId,
        recordType: schema.recordType,
        tableLabel: schema.label,
        field: change.field,
        resourceId: change.resourceId,
        oldValue: change.oldValue,
        newValue: change.newValue,
        timestamp,
        actingUserId: context.actingUserId ?? change.ownerUserId,
        reason: context.reason,
        impersonatedBy: context.impersonatedBy,
      });
      if (!result.success) {
        throw new AuditError(
          `Invalid change for ${change.recordType}.${change.field}: ${result.errors
            .map((error) => `${error.field}: ${error.message}`)
            .join('; ')}`,
        );
      }
      const entry = result.value;

      const tableId = await resolver.resolveTable(schema);
      const fieldId = await resolver.resolveField(tableId, entry.field);
      const resourceId = await resolver.resolveResource(tableId, entry.resourceId);

      entries.push(entry);
      rows.push({
        commitId: entry.commitId,
        fieldId,
        resourceId,
        oldValue: entry.oldValue,
        newValue: entry.newValue,
        timestamp: entry.timestamp,
        userId: entry.actingUserId,
        reason: entry.reason,
        impersonatedBy: entry.impersonatedBy,
      });
    }

    await client.auditChange.createMany({ data: rows });
    writeLog('Wrote %d change row(s) in commit %s', rows.length, commitId);

    if (!unit) {
      ownUnit.promote();
    }

    return { _tag: 'Written', commitId, timestamp, entries };
  };

  return { commit, identities };
};
