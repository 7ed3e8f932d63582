/**
 * Transaction Interfaces
 *
 * Framework-agnostic interfaces for the transaction boundary the engine runs inside.
 *
 * @packageDocumentation
 */

import type { AuditContextStack } from '../context/context-stack.js';
import type { DirtyStateSource } from '../diff/types.js';
import type { AuditDbClient } from './db-client.js';

/**
 * Client able to run a callback inside one transaction
 *
 * @example
 * ```typescript
 * const result = await client.$transaction(async (tx) => {
 *   await tx.auditChange.createMany({ data: rows });
 *   return { success: true };
 * });
 * ```
 */
export interface TransactionalAuditDbClient extends AuditDbClient {
  $transaction<T>(fn: (tx: AuditDbClient) => Promise<T>): Promise<T>;
}

/**
 * One transaction as seen by the commit hooks
 *
 * The persistence framework supplies the dirty instances and the transactional
 * client; the same object must be passed to `beforeCommit` and to the matching
 * `afterCommit` or `afterRollback`.
 */
export interface AuditTransaction<TInstance = unknown> {
  /** Client bound to the transaction the data mutation runs in */
  client: AuditDbClient;
  /** Instances flagged new, dirty or deleted, in processing order */
  dirtyInstances: Iterable<TInstance>;
  /** Dirty-state classification and previous/pending values */
  source: DirtyStateSource<TInstance>;
  /** Explicit context stack; the ambient provider is used when omitted */
  context?: AuditContextStack;
}
