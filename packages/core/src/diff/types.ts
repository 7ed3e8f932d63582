/**
 * Diff engine type definitions
 *
 * @module diff/types
 */

import type { InstanceState } from '../constants.js';
import type { PendingChange } from '../domain/change-log-types.js';
import type { TrackedSchema } from '../schema/types.js';

/**
 * Dirty-state capability supplied by the persistence framework
 *
 * The engine never tracks object graphs itself; it only reads what this source reports.
 *
 * @example
 * ```typescript
 * const source: DirtyStateSource<Entity> = {
 *   recordTypeOf: (entity) => entity.constructor.name,
 *   stateOf: (entity) => unitOfWork.classify(entity),
 *   previousValue: (entity, field) => unitOfWork.originalValue(entity, field),
 *   pendingValue: (entity, field) => entity[field],
 * };
 * ```
 */
export interface DirtyStateSource<TInstance = unknown> {
  /** Record type of an instance, or undefined when it has none */
  recordTypeOf(instance: TInstance): string | undefined;
  stateOf(instance: TInstance): InstanceState;
  /** Value before the transaction (ignored for created instances) */
  previousValue(instance: TInstance, field: string): unknown;
  /** Value about to be committed (ignored for deleted instances) */
  pendingValue(instance: TInstance, field: string): unknown;
}

/** Dirty instance paired with the schema of its record type */
export interface DirtyEntry<TInstance = unknown> {
  instance: TInstance;
  schema: TrackedSchema;
}

export interface DiffEngine {
  /**
   * Computes field-level changes in instance order, then field declaration order
   *
   * @throws {UnsupportedTypeError} If any value cannot be serialized; no partial result is returned
   * @throws {MissingResourceIdError} If an instance has no usable business key
   */
  computeChanges<TInstance>(
    entries: ReadonlyArray<DirtyEntry<TInstance>>,
    source: DirtyStateSource<TInstance>,
  ): PendingChange[];
}
