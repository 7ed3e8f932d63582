/**
 * Value type and handler definitions for stored-form serialization
 *
 * @module serialization/types
 */

/**
 * Built-in semantic value types
 */
export type BuiltInValueType =
  | 'string'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'bigint'
  | 'boolean'
  | 'timestamp'
  | 'uuid'
  | 'json'
  | 'bytes';

/**
 * Semantic type of a tracked field
 *
 * Supports both built-in types with TypeScript autocompletion and custom names
 * registered on a {@link TypeRegistry}.
 *
 * @example
 * ```typescript
 * const builtIn: ValueType = 'timestamp';
 * const custom: ValueType = 'Money';
 * ```
 */
export type ValueType = BuiltInValueType | (string & {});

/** Any class whose instances a handler claims by exact constructor identity */
export type Constructor = abstract new (...args: never[]) => unknown;

/**
 * Pair of pure functions converting a value to its stored form and back
 *
 * Handlers must satisfy `deserialize(serialize(v))` equal to `v` for every value
 * they accept.
 *
 * @example
 * ```typescript
 * const moneyHandler: TypeHandler<Money> = {
 *   serialize: (money) => `${money.currency}:${money.cents}`,
 *   deserialize: (stored) => Money.parse(stored),
 *   instanceOf: Money,
 * };
 * ```
 */
export interface TypeHandler<T = unknown> {
  serialize(value: T): string;
  deserialize(stored: string): T;
  /** Rejects values outside the handler's domain before serialization */
  accepts?(value: unknown): value is T;
  /** Claims values whose constructor is exactly this class during runtime detection */
  instanceOf?: Constructor;
}

/** Stored form of a field value; `null` means absent */
export type StoredValue = string | null;

/**
 * Process-wide registry of type handlers, owned explicitly by the engine
 */
export interface TypeRegistry {
  /** Register a handler, replacing any handler for the same type (last registration wins) */
  register<T>(type: ValueType, handler: TypeHandler<T>): void;
  /** Remove a custom handler; returns whether one was removed */
  unregister(type: ValueType): boolean;
  has(type: ValueType): boolean;
  /** Detect the value type of a runtime value by exact type identity */
  resolveType(value: unknown): ValueType | undefined;
  serialize(value: unknown, type?: ValueType): StoredValue;
  deserialize(stored: StoredValue, type: ValueType): unknown;
  /** Equality of two values as defined by their stored forms */
  areEqual(left: unknown, right: unknown, type?: ValueType): boolean;
}
