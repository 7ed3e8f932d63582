/**
 * Memoized identity rows (table, field, resource)
 *
 * @module writer/identity-cache
 *
 * @remarks
 * Ids resolved inside a transaction are staged in an {@link IdentityUnit}. They
 * become visible to other transactions only after `promote()`, which the commit
 * hooks call once the transaction committed. A rolled-back transaction discards
 * its staged ids, so an id whose row was rolled back is never reused.
 */

export interface IdentityUnit {
  get(key: string): number | undefined;
  set(key: string, id: number): void;
  /** Publish staged ids to the shared cache */
  promote(): void;
  /** Drop staged ids */
  discard(): void;
  readonly stagedCount: number;
}

export interface IdentityCache {
  get(key: string): number | undefined;
  beginUnit(): IdentityUnit;
  readonly size: number;
  clear(): void;
}

export const identityKeys = {
  table: (recordType: string): string => `table:${recordType}`,
  field: (tableId: number, fieldName: string): string => `field:${tableId}:${fieldName}`,
  resource: (tableId: number, externalId: string): string => `resource:${tableId}:${externalId}`,
};

export const createIdentityCache = (): IdentityCache => {
  const committed = new Map<string, number>();

  const beginUnit = (): IdentityUnit => {
    const staged = new Map<string, number>();
    let closed = false;

    return {
      get: (key) => staged.get(key) ?? committed.get(key),
      set: (key, id) => {
        if (!closed) {
          staged.set(key, id);
        }
      },
      promote: () => {
        if (closed) return;
        for (const [key, id] of staged) {
          committed.set(key, id);
        }
        staged.clear();
        closed = true;
      },
      discard: () => {
        staged.clear();
        closed = true;
      },
      get stagedCount() {
        return staged.size;
      },
    };
  };

  return {
    get: (key) => committed.get(key),
    beginUnit,
    get size() {
      return committed.size;
    },
    clear: () => {
      committed.clear();
    },
  };
};
