/**
 * Field-level change detection
 *
 * @module diff/diff-engine
 *
 * @remarks
 * Two values are equal when their stored forms are equal, so a value never
 * differs from what a round trip through the type registry produces.
 *
 * @example
 * ```typescript
 * const engine = createDiffEngine(types);
 * const changes = engine.computeChanges(
 *   [{ instance: customer, schema: customerSchema }],
 *   unitOfWorkSource,
 * );
 * // => [{ field: 'name', oldValue: 'John', newValue: 'Jane', ... }]
 * ```
 */

import type { InstanceState } from '../constants.js';
import { INSTANCE_STATE } from '../constants.js';
import type { ResourceId } from '../domain/branded-types.js';
import { createResourceId, tryNormalizeId } from '../domain/branded-types.js';
import type { PendingChange } from '../domain/change-log-types.js';
import { MissingResourceIdError } from '../errors.js';
import type { TrackedSchema, TrackedSchemaRegistry } from '../schema/types.js';
import type { TypeRegistry } from '../serialization/types.js';
import { diffLog } from '../utils/debug.js';
import type { DiffEngine, DirtyEntry, DirtyStateSource } from './types.js';

/** Reads a field as it stands after the transaction, falling back to the previous value */
const readCurrent = <TInstance>(
  source: DirtyStateSource<TInstance>,
  instance: TInstance,
  state: InstanceState,
  field: string,
): unknown => {
  if (state === INSTANCE_STATE.DELETED) {
    return source.previousValue(instance, field);
  }
  return source.pendingValue(instance, field) ?? source.previousValue(instance, field);
};

const resolveResourceId = <TInstance>(
  source: DirtyStateSource<TInstance>,
  instance: TInstance,
  state: InstanceState,
  schema: TrackedSchema,
): ResourceId => {
  const id = tryNormalizeId(readCurrent(source, instance, state, schema.resourceIdField));
  if (id === undefined) {
    throw new MissingResourceIdError(schema.recordType, schema.resourceIdField);
  }
  return createResourceId(id);
};

const resolveOwnerUserId = <TInstance>(
  source: DirtyStateSource<TInstance>,
  instance: TInstance,
  state: InstanceState,
  schema: TrackedSchema,
): string | null => {
  if (schema.userIdField === undefined) {
    return null;
  }
  return tryNormalizeId(readCurrent(source, instance, state, schema.userIdField)) ?? null;
};

export const createDiffEngine = (types: TypeRegistry): DiffEngine => {
  const computeChanges = <TInstance>(
    entries: ReadonlyArray<DirtyEntry<TInstance>>,
    source: DirtyStateSource<TInstance>,
  ): PendingChange[] => {
    const changes: PendingChange[] = [];

    for (const { instance, schema } of entries) {
      const state = source.stateOf(instance);
      const resourceId = resolveResourceId(source, instance, state, schema);
      const ownerUserId = resolveOwnerUserId(source, instance, state, schema);

      for (const field of schema.trackedFields) {
        const oldValue =
          state === INSTANCE_STATE.CREATED ? null : types.serialize(source.previousValue(instance, field.name), field.type);
        const newValue =
          state === INSTANCE_STATE.DELETED ? null : types.serialize(source.pendingValue(instance, field.name), field.type);

        if (oldValue === newValue) {
          continue;
        }

        changes.push({
          recordType: schema.recordType,
          resourceId,
          state,
          field: field.name,
          valueType: field.type,
          oldValue,
          newValue,
          ownerUserId,
        });
      }
    }

    diffLog('Computed %d field change(s) across %d instance(s)', changes.length, entries.length);
    return changes;
  };

  return { computeChanges };
};

/**
 * Pairs dirty instances with their schemas, dropping instances of undeclared record types
 */
export const collectDirtyEntries = <TInstance>(
  instances: Iterable<TInstance>,
  schemas: TrackedSchemaRegistry,
  source: DirtyStateSource<TInstance>,
): DirtyEntry<TInstance>[] => {
  const entries: DirtyEntry<TInstance>[] = [];
  for (const instance of instances) {
    const recordType = source.recordTypeOf(instance);
    const schema = recordType === undefined ? undefined : schemas.lookup(recordType);
    if (schema) {
      entries.push({ instance, schema });
    }
  }
  return entries;
};
