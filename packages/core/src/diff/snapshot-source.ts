/**
 * Dirty-state source over plain before/after snapshots
 *
 * @module diff/snapshot-source
 */

import type { InstanceState } from '../constants.js';
import { INSTANCE_STATE } from '../constants.js';
import type { DirtyStateSource } from './types.js';

/**
 * Instance described by its state and the field values around the transaction
 *
 * @example
 * ```typescript
 * const snapshot: RecordSnapshot = {
 *   recordType: 'Customer',
 *   state: 'updated',
 *   before: { id: 1, name: 'John' },
 *   after: { id: 1, name: 'Jane' },
 * };
 * ```
 */
export interface RecordSnapshot {
  recordType: string;
  state: InstanceState;
  before?: Readonly<Record<string, unknown>>;
  after?: Readonly<Record<string, unknown>>;
}

/** Fields missing from `after` of an updated snapshot keep their `before` value */
export const createSnapshotSource = (): DirtyStateSource<RecordSnapshot> => ({
  recordTypeOf: (snapshot) => snapshot.recordType,
  stateOf: (snapshot) => snapshot.state,
  previousValue: (snapshot, field) => snapshot.before?.[field],
  pendingValue: (snapshot, field) => {
    if (snapshot.after && Object.hasOwn(snapshot.after, field)) {
      return snapshot.after[field];
    }
    return snapshot.state === INSTANCE_STATE.UPDATED ? snapshot.before?.[field] : undefined;
  },
});
