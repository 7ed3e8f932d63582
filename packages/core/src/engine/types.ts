/**
 * Audit engine type definitions
 *
 * @module engine/types
 */

import type { AuditContextStack } from '../context/context-stack.js';
import type { AuditContextProvider, AuditFrame, EffectiveAuditContext } from '../context/types.js';
import type { DiffEngine, DirtyStateSource } from '../diff/types.js';
import type { AuditDbClient } from '../interfaces/db-client.js';
import type { AuditTransaction, TransactionalAuditDbClient } from '../interfaces/transaction.js';
import type { ChangeQueryFilters, ChangeRecord, ChangeRetriever } from '../retrieval/types.js';
import type { DeclareOptions, TrackedSchema, TrackedSchemaRegistry } from '../schema/types.js';
import type { TypeHandler, TypeRegistry, ValueType } from '../serialization/types.js';
import type { AuditWriter, WriteReceipt } from '../writer/types.js';

/** Callback run inside {@link AuditEngine.runAudited}; `track` flags an instance as dirty */
export type AuditedWork<T, TInstance> = (tx: AuditDbClient, track: (instance: TInstance) => void) => Promise<T>;

export interface RunAuditedOptions {
  /** Explicit context stack for this unit of work */
  context?: AuditContextStack;
}

export interface AuditEngine {
  readonly types: TypeRegistry;
  readonly schemas: TrackedSchemaRegistry;
  readonly contextProvider: AuditContextProvider;
  readonly diff: DiffEngine;
  readonly writer: AuditWriter;
  readonly retriever: ChangeRetriever;

  declare(recordType: string, options: DeclareOptions): TrackedSchema;
  registerType<T>(type: ValueType, handler: TypeHandler<T>): void;

  /** Run `fn` with the frame pushed on the ambient context */
  withContext<T>(frame: AuditFrame, fn: () => Promise<T>): Promise<T>;

  /**
   * Effective context for the next write
   *
   * Reads the top of `stack` when given, otherwise the ambient provider.
   */
  currentContext(stack?: AuditContextStack): EffectiveAuditContext;

  /**
   * Diffs the transaction's dirty instances and writes their change entries
   * through the transaction's client
   *
   * @throws Any diff or write failure, after it was reported to `onError`
   */
  beforeCommit<TInstance>(tx: AuditTransaction<TInstance>): Promise<WriteReceipt>;

  /** Publishes identities staged by `beforeCommit` for this transaction */
  afterCommit<TInstance>(tx: AuditTransaction<TInstance>): void;

  /** Drops identities staged by `beforeCommit` for this transaction */
  afterRollback<TInstance>(tx: AuditTransaction<TInstance>): void;

  /**
   * Runs `work` in one transaction of `client` and audits the instances it tracks
   *
   * @example
   * ```typescript
   * await engine.runAudited(prisma, snapshots, async (tx, track) => {
   *   const customer = await tx.customer.create({ data: { name: 'John' } });
   *   track({ recordType: 'Customer', state: 'created', after: customer });
   * });
   * ```
   */
  runAudited<T, TInstance>(
    client: TransactionalAuditDbClient,
    source: DirtyStateSource<TInstance>,
    work: AuditedWork<T, TInstance>,
    options?: RunAuditedOptions,
  ): Promise<T>;

  getResourceChanges(recordType: string, filters: ChangeQueryFilters, client?: AuditDbClient): Promise<ChangeRecord[]>;
}
