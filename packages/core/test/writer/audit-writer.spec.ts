import { describe, expect, it, vi } from 'vitest';
import type { EffectiveAuditContext } from '../../src/context/types.js';
import { createResourceId } from '../../src/domain/branded-types.js';
import type { PendingChange } from '../../src/domain/change-log-types.js';
import { AuditError, TableNotTrackedError } from '../../src/errors.js';
import { createTrackedSchemaRegistry } from '../../src/schema/tracked-schema-registry.js';
import { createSqliteAuditClient } from '../../src/testing/index.js';
import { createAuditWriter } from '../../src/writer/audit-writer.js';
import { schemaMetadata } from '../schema/fixtures.js';

const TIMESTAMP = new Date('2025-03-01T12:00:00.000Z');

const context: EffectiveAuditContext = { actingUserId: 'admin-1', reason: 'Onboarding', impersonatedBy: null };

const change = (overrides: Partial<PendingChange> = {}): PendingChange => ({
  recordType: 'Customer',
  resourceId: createResourceId(1),
  state: 'created',
  field: 'name',
  valueType: 'string',
  oldValue: null,
  newValue: 'John',
  ownerUserId: null,
  ...overrides,
});

const setup = async () => {
  const schemas = createTrackedSchemaRegistry({ schemaMetadata });
  schemas.declare('Customer', { trackedFields: ['name', 'email'], label: 'Customers' });
  let sequence = 0;
  const writer = createAuditWriter({
    schemas,
    now: () => TIMESTAMP,
    generateCommitId: () => {
      sequence += 1;
      return `commit-${sequence}`;
    },
  });
  const client = await createSqliteAuditClient();
  return { schemas, writer, client };
};

describe('createAuditWriter', () => {
  it('should skip empty batches without touching the store', async () => {
    const { writer, client } = await setup();

    const receipt = await writer.commit([], context, client);

    expect(receipt).toEqual({ _tag: 'Skipped', reason: 'no field changes', timestamp: TIMESTAMP });
    expect(client.counts()).toEqual({ tables: 0, fields: 0, resources: 0, changes: 0 });
  });

  it('should write one row per change with a shared commit id and timestamp', async () => {
    const { writer, client } = await setup();

    const receipt = await writer.commit(
      [change(), change({ field: 'email', newValue: 'john@example.com' })],
      context,
      client,
    );

    expect(receipt._tag).toBe('Written');
    if (receipt._tag === 'Written') {
      expect(receipt.commitId).toBe('commit-1');
      expect(receipt.entries.map((entry) => entry.field)).toEqual(['name', 'email']);
    }

    const rows = client.dump();
    expect(rows.tables).toEqual([{ id: 1, name: 'Customer', label: 'Customers', resourceIdField: 'id' }]);
    expect(rows.fields).toEqual([
      { id: 1, tableId: 1, name: 'name' },
      { id: 2, tableId: 1, name: 'email' },
    ]);
    expect(rows.resources).toEqual([{ id: 1, tableId: 1, externalId: '1' }]);
    expect(rows.changes).toEqual([
      {
        id: 1,
        commitId: 'commit-1',
        fieldId: 1,
        resourceId: 1,
        oldValue: null,
        newValue: 'John',
        timestamp: TIMESTAMP,
        userId: 'admin-1',
        reason: 'Onboarding',
        impersonatedBy: null,
      },
      {
        id: 2,
        commitId: 'commit-1',
        fieldId: 2,
        resourceId: 1,
        oldValue: null,
        newValue: 'john@example.com',
        timestamp: TIMESTAMP,
        userId: 'admin-1',
        reason: 'Onboarding',
        impersonatedBy: null,
      },
    ]);
  });

  it('should reuse identity rows across commits', async () => {
    const { writer, client } = await setup();
    await writer.commit([change()], context, client);
    const tableUpsert = vi.spyOn(client.auditTable, 'upsert');
    const fieldUpsert = vi.spyOn(client.auditField, 'upsert');

    await writer.commit([change({ state: 'updated', oldValue: 'John', newValue: 'Jane' })], context, client);

    expect(tableUpsert).not.toHaveBeenCalled();
    expect(fieldUpsert).not.toHaveBeenCalled();
    expect(client.counts()).toEqual({ tables: 1, fields: 1, resources: 1, changes: 2 });
  });

  it('should converge concurrent first writes on one identity row', async () => {
    const { writer, client } = await setup();

    await Promise.all([
      writer.commit([change()], context, client),
      writer.commit([change({ newValue: 'Johnny' })], context, client),
    ]);

    const { changes } = client.dump();
    expect(client.counts()).toEqual({ tables: 1, fields: 1, resources: 1, changes: 2 });
    expect(changes.map((row) => [row.fieldId, row.resourceId])).toEqual([
      [1, 1],
      [1, 1],
    ]);
    expect(changes.map((row) => row.newValue).sort()).toEqual(['John', 'Johnny']);
  });

  it('should fall back to the owner user id without an acting user', async () => {
    const { writer, client } = await setup();

    await writer.commit(
      [change({ ownerUserId: 'owner-5' })],
      { actingUserId: null, reason: null, impersonatedBy: null },
      client,
    );

    expect(client.dump().changes[0]?.userId).toBe('owner-5');
  });

  it('should keep identities staged in a caller-owned unit', async () => {
    const { writer, client } = await setup();
    const unit = writer.identities.beginUnit();

    await writer.commit([change()], context, client, unit);

    expect(writer.identities.size).toBe(0);
    expect(unit.stagedCount).toBe(3);
    unit.promote();
    expect(writer.identities.size).toBe(3);
  });

  it('should reject no-op changes', async () => {
    const { writer, client } = await setup();

    await expect(writer.commit([change({ oldValue: 'John', newValue: 'John' })], context, client)).rejects.toThrow(
      AuditError,
    );
    await expect(writer.commit([change({ oldValue: 'John', newValue: 'John' })], context, client)).rejects.toThrow(
      'Invalid change for Customer.name: newValue: newValue must differ from oldValue',
    );
    expect(client.counts().changes).toBe(0);
  });

  it('should reject changes of undeclared record types', async () => {
    const { writer, client } = await setup();

    await expect(writer.commit([change({ recordType: 'Order' })], context, client)).rejects.toThrow(
      TableNotTrackedError,
    );
  });
});
