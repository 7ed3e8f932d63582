/**
 * Audit engine
 *
 * Wires the type registry, tracked schemas, context, diff engine, writer and
 * retriever behind the commit hooks a persistence framework calls.
 *
 * @module engine/audit-engine
 *
 * @remarks
 * `beforeCommit` runs inside the host transaction: any error it raises aborts
 * the transaction together with the data mutation. Identities resolved during
 * the write stay staged until `afterCommit` or `afterRollback`.
 *
 * @example
 * ```typescript
 * const engine = createAuditEngine({
 *   client: prisma,
 *   schemaMetadata: createStaticSchemaMetadata(models),
 *   resolveUserId: () => session.getUserId(),
 * });
 *
 * engine.declare('Customer', { trackedFields: ['name', 'email'] });
 *
 * await engine.withContext({ reason: 'Support ticket #42' }, () =>
 *   engine.runAudited(prisma, snapshots, async (tx, track) => {
 *     // mutate, then track(snapshot)
 *   }),
 * );
 * ```
 */

import type { AuditContextStack } from '../context/context-stack.js';
import { createAsyncLocalStorageProvider } from '../context/context-provider.js';
import { resolveEffectiveContext } from '../context/frame.js';
import type { EffectiveAuditContext } from '../context/types.js';
import { collectDirtyEntries, createDiffEngine } from '../diff/diff-engine.js';
import type { DirtyStateSource } from '../diff/types.js';
import type { AuditTransaction, TransactionalAuditDbClient } from '../interfaces/transaction.js';
import { createChangeRetriever } from '../retrieval/change-retriever.js';
import { createTrackedSchemaRegistry } from '../schema/tracked-schema-registry.js';
import { createTypeRegistry } from '../serialization/type-registry.js';
import { coreLog } from '../utils/debug.js';
import { withErrorReporting } from '../utils/error-handler.js';
import { createAuditWriter } from '../writer/audit-writer.js';
import type { IdentityUnit } from '../writer/identity-cache.js';
import type { WriteReceipt } from '../writer/types.js';
import type { AuditEngineOptions } from './config.js';
import { validateEngineOptions } from './config.js';
import type { AuditEngine, AuditedWork, RunAuditedOptions } from './types.js';

export const createAuditEngine = (options: AuditEngineOptions): AuditEngine => {
  validateEngineOptions(options);

  const { onError, resolveUserId } = options;
  const types = options.types ?? createTypeRegistry();
  const schemas =
    options.schemas ??
    createTrackedSchemaRegistry({
      schemaMetadata: options.schemaMetadata,
      defaultUserIdField: options.defaultUserIdField,
      defaultResourceIdField: options.defaultResourceIdField,
    });
  const contextProvider = options.contextProvider ?? createAsyncLocalStorageProvider();
  const diff = createDiffEngine(types);
  const writer = createAuditWriter({ schemas, now: options.now, generateCommitId: options.generateCommitId });
  const retriever = createChangeRetriever({ client: options.client, schemas, types });

  /** Identity units staged per open transaction */
  const units = new WeakMap<object, IdentityUnit>();

  const currentContext = (stack?: AuditContextStack): EffectiveAuditContext => {
    const frame = stack ? stack.peek() : contextProvider.getFrame();
    return resolveEffectiveContext(frame, resolveUserId);
  };

  const beforeCommit = async <TInstance>(tx: AuditTransaction<TInstance>): Promise<WriteReceipt> => {
    const entries = collectDirtyEntries(tx.dirtyInstances, schemas, tx.source);
    const recordTypes = [...new Set(entries.map((entry) => entry.schema.recordType))];

    const changes = await withErrorReporting(async () => diff.computeChanges(entries, tx.source), onError, {
      phase: 'diff',
      recordTypes,
    });

    return withErrorReporting(
      async () => {
        const context = currentContext(tx.context);
        if (changes.length === 0) {
          return writer.commit(changes, context, tx.client);
        }
        let unit = units.get(tx);
        if (!unit) {
          unit = writer.identities.beginUnit();
          units.set(tx, unit);
        }
        return writer.commit(changes, context, tx.client, unit);
      },
      onError,
      { phase: 'write', recordTypes },
    );
  };

  const afterCommit = <TInstance>(tx: AuditTransaction<TInstance>): void => {
    const unit = units.get(tx);
    if (unit) {
      unit.promote();
      units.delete(tx);
    }
  };

  const afterRollback = <TInstance>(tx: AuditTransaction<TInstance>): void => {
    const unit = units.get(tx);
    if (unit) {
      coreLog('Rollback: discarding %d staged identity row(s)', unit.stagedCount);
      unit.discard();
      units.delete(tx);
    }
  };

  const runAudited = async <T, TInstance>(
    client: TransactionalAuditDbClient,
    source: DirtyStateSource<TInstance>,
    work: AuditedWork<T, TInstance>,
    runOptions?: RunAuditedOptions,
  ): Promise<T> => {
    const handle: { tx?: AuditTransaction<TInstance> } = {};
    try {
      const result = await client.$transaction(async (txClient) => {
        const dirtyInstances: TInstance[] = [];
        const tx: AuditTransaction<TInstance> = {
          client: txClient,
          dirtyInstances,
          source,
          context: runOptions?.context,
        };
        handle.tx = tx;

        const value = await work(txClient, (instance) => {
          dirtyInstances.push(instance);
        });
        await beforeCommit(tx);
        return value;
      });
      if (handle.tx) afterCommit(handle.tx);
      return result;
    } catch (error) {
      if (handle.tx) afterRollback(handle.tx);
      throw error;
    }
  };

  return {
    types,
    schemas,
    contextProvider,
    diff,
    writer,
    retriever,
    declare: (recordType, declareOptions) => schemas.declare(recordType, declareOptions),
    registerType: (type, handler) => {
      types.register(type, handler);
    },
    withContext: (frame, fn) => contextProvider.runAsync(frame, fn),
    currentContext,
    beforeCommit,
    afterCommit,
    afterRollback,
    runAudited,
    getResourceChanges: (recordType, filters, client) =>
      withErrorReporting(() => retriever.query(recordType, filters, client), onError, {
        phase: 'query',
        recordTypes: [recordType],
      }),
  };
};
