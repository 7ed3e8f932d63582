/**
 * Change Log Type Definitions
 *
 * Core change log data structures that are store-independent.
 */

import type { InstanceState } from '../constants.js';
import type { StoredValue, ValueType } from '../serialization/types.js';
import type { CommitId, ResourceId } from './branded-types.js';

/**
 * Field-level change computed by the diff engine, not yet written
 */
export interface PendingChange {
  recordType: string;
  resourceId: ResourceId;
  state: InstanceState;
  field: string;
  valueType: ValueType;
  /** `null` on creation */
  oldValue: StoredValue;
  /** `null` on deletion */
  newValue: StoredValue;
  /** Value of the schema's user-id field, used when no acting user is resolved */
  ownerUserId: string | null;
}

/** Immutable change log entry with Branded IDs (validated domain model) */
export interface ChangeLogEntry {
  commitId: CommitId;
  recordType: string;
  tableLabel: string;
  field: string;
  resourceId: ResourceId;
  oldValue: StoredValue;
  newValue: StoredValue;
  timestamp: Date;
  actingUserId: string | null;
  reason: string | null;
  impersonatedBy: string | null;
}

/** Input for creating a ChangeLogEntry (uses plain strings for IDs) */
export interface ChangeLogInput {
  commitId: string;
  recordType: string;
  tableLabel: string;
  field: string;
  resourceId: string;
  oldValue: StoredValue;
  newValue: StoredValue;
  timestamp: Date;
  actingUserId: string | null;
  reason: string | null;
  impersonatedBy: string | null;
}
