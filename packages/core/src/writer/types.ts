/**
 * Audit writer type definitions
 *
 * @module writer/types
 */

import type { EffectiveAuditContext } from '../context/types.js';
import type { CommitId } from '../domain/branded-types.js';
import type { ChangeLogEntry, PendingChange } from '../domain/change-log-types.js';
import type { AuditDbClient } from '../interfaces/db-client.js';
import type { IdentityCache, IdentityUnit } from './identity-cache.js';

export interface WrittenReceipt {
  _tag: 'Written';
  commitId: CommitId;
  /** Shared by every entry of the batch */
  timestamp: Date;
  entries: ChangeLogEntry[];
}

export interface SkippedReceipt {
  _tag: 'Skipped';
  reason: string;
  timestamp: Date;
}

/**
 * Write receipt ADT
 *
 * @example
 * ```typescript
 * const receipt = await writer.commit(changes, context, tx, unit);
 *
 * switch (receipt._tag) {
 *   case 'Written':
 *     console.log(`${receipt.entries.length} entries in commit ${receipt.commitId}`);
 *     break;
 *   case 'Skipped':
 *     console.log('Nothing written:', receipt.reason);
 *     break;
 * }
 * ```
 */
export type WriteReceipt = WrittenReceipt | SkippedReceipt;

export interface AuditWriter {
  /**
   * Writes one immutable entry per pending change through the given client
   *
   * Pass the transactional client of the data mutation so audit rows commit or roll
   * back with it. Identities resolved during the call are staged in `unit`; without
   * a unit they are published as soon as the write succeeds.
   */
  commit(
    changes: readonly PendingChange[],
    context: EffectiveAuditContext,
    client: AuditDbClient,
    unit?: IdentityUnit,
  ): Promise<WriteReceipt>;
  readonly identities: IdentityCache;
}
