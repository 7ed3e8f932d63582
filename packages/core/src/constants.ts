/** Constants and default configuration values for field auditing */

/** Dirty-state classification of an instance inside a transaction */
export type InstanceState = 'created' | 'updated' | 'deleted';

/** Instance state constants */
export const INSTANCE_STATE = {
  CREATED: 'created',
  UPDATED: 'updated',
  DELETED: 'deleted',
} as const satisfies Record<string, InstanceState>;

/** Sort direction for change retrieval */
export type SortOrder = 'asc' | 'desc';

/** Default configuration values for the audit engine */
export const DEFAULTS = {
  RESOURCE_ID_FIELD: 'id',
  SORT_ORDER: 'asc',
} as const satisfies Record<string, string>;
