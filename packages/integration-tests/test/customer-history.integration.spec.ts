/**
 * Integration Tests: Customer change history
 *
 * Create, update and delete a customer and read its history back.
 */

import type { ChangeRecord } from '@field-audit/core';
import { beforeEach, describe, expect, it } from 'vitest';
import { setupTestContext, type TestContext } from './helpers/setup.js';

const T0 = new Date('2025-01-01T00:00:00.000Z');
const T1 = new Date('2025-01-01T00:00:01.000Z');
const T2 = new Date('2025-01-01T00:00:02.000Z');

const transitions = (records: ChangeRecord[]) =>
  records.map((record) =>
    record._tag === 'Resolved'
      ? [record.field, record.oldValue, record.newValue, record.timestamp.toISOString()]
      : [record.field, 'unreadable'],
  );

describe('Customer history', () => {
  let context: TestContext;

  beforeEach(async () => {
    context = await setupTestContext();
    context.engine.declare('Customer', { trackedFields: ['name', 'email'] });
  });

  it('should record creation then a single-field update', async () => {
    const { engine, session } = context;

    const create = session();
    create.insert('Customer', { id: 1, name: 'John', email: 'john@example.com' });
    await create.commit();

    const rename = session();
    rename.update('Customer', 1, { name: 'Jane' });
    await rename.commit();

    const records = await engine.getResourceChanges('Customer', { resourceIds: 1 });

    expect(transitions(records)).toEqual([
      ['name', null, 'John', T0.toISOString()],
      ['email', null, 'john@example.com', T0.toISOString()],
      ['name', 'John', 'Jane', T1.toISOString()],
    ]);
    expect(records[0]?.commitId).toBe(records[1]?.commitId);
    expect(records[2]?.commitId).not.toBe(records[0]?.commitId);
  });

  it('should write nothing for updates that keep the stored values', async () => {
    const { client, session } = context;
    const create = session();
    create.insert('Customer', { id: 1, name: 'John', email: null });
    await create.commit();

    const noop = session();
    noop.update('Customer', 1, { name: 'John', email: null });
    await noop.commit();

    expect(client.counts().changes).toBe(1);
  });

  it('should record every non-absent value on deletion', async () => {
    const { engine, session } = context;
    const create = session();
    create.insert('Customer', { id: 1, name: 'John', email: null });
    await create.commit();

    const drop = session();
    drop.remove('Customer', 1);
    await drop.commit();

    const records = await engine.getResourceChanges('Customer', { resourceIds: 1 });
    expect(transitions(records)).toEqual([
      ['name', null, 'John', T0.toISOString()],
      ['name', 'John', null, T1.toISOString()],
    ]);
    expect(context.find('Customer', 1)).toBeUndefined();
  });

  it('should collapse several operations on one record into one transition', async () => {
    const { engine, session } = context;
    const create = session();
    create.insert('Customer', { id: 1, name: 'John', email: null });
    create.update('Customer', 1, { name: 'Johnny' });
    await create.commit();

    const churn = session();
    churn.update('Customer', 1, { email: 'a@example.com' });
    churn.update('Customer', 1, { email: 'b@example.com' });
    await churn.commit();

    const records = await engine.getResourceChanges('Customer', { resourceIds: 1 });
    expect(transitions(records)).toEqual([
      ['name', null, 'Johnny', T0.toISOString()],
      ['email', null, 'b@example.com', T1.toISOString()],
    ]);
  });

  it('should write nothing for a record created and deleted in one transaction', async () => {
    const { client, session } = context;
    const transient = session();
    transient.insert('Customer', { id: 1, name: 'John' });
    transient.remove('Customer', 1);
    await transient.commit();

    expect(client.counts()).toEqual({ tables: 0, fields: 0, resources: 0, changes: 0 });
  });

  it('should return history filtered by field and date', async () => {
    const { engine, session } = context;
    const create = session();
    create.insert('Customer', { id: 1, name: 'John', email: 'john@example.com' });
    await create.commit();
    for (const name of ['Jane', 'Janet']) {
      const rename = session();
      rename.update('Customer', 1, { name });
      await rename.commit();
    }

    const names = await engine.getResourceChanges('Customer', {
      resourceIds: 1,
      fields: ['name'],
      dateRange: { from: T1, to: T2 },
      order: 'desc',
    });

    expect(transitions(names)).toEqual([
      ['name', 'Jane', 'Janet', T2.toISOString()],
      ['name', 'John', 'Jane', T1.toISOString()],
    ]);
  });
});
