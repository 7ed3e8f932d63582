/**
 * Type registry for stored-form serialization
 *
 * @module serialization/type-registry
 *
 * @remarks
 * Handlers are looked up by exact type identity. A subclass of a registered class
 * is not serialized by its parent's handler, not even for a field declared with
 * the parent's type; it needs its own registration. When several names claim the
 * same class, the latest registration wins.
 *
 * @example
 * ```typescript
 * const types = createTypeRegistry();
 * types.register('Money', {
 *   serialize: (money: Money) => money.toString(),
 *   deserialize: (stored) => Money.parse(stored),
 *   instanceOf: Money,
 * });
 *
 * types.serialize(new Money('EUR', 1250)); // => 'EUR:1250'
 * types.deserialize('EUR:1250', 'Money'); // => Money { currency: 'EUR', cents: 1250 }
 * ```
 */

import { AuditError, DeserializationError, UnsupportedTypeError } from '../errors.js';
import { BUILT_IN_HANDLERS, isBuiltInValueType, isPlainObject } from './built-in-handlers.js';
import type { StoredValue, TypeHandler, TypeRegistry, ValueType } from './types.js';

const constructorOf = (value: unknown): unknown =>
  typeof value === 'object' && value !== null ? Object.getPrototypeOf(value)?.constructor : undefined;

const describeValue = (value: unknown): string => {
  if (typeof value !== 'object' || value === null) {
    return typeof value;
  }
  const ctor = constructorOf(value);
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
};

const detectBuiltInType = (value: unknown): ValueType | undefined => {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'float';
    case 'bigint':
      return 'bigint';
    case 'boolean':
      return 'boolean';
    case 'object': {
      if (value === null) return undefined;
      const prototype = Object.getPrototypeOf(value);
      if (prototype === Date.prototype) return 'timestamp';
      if (prototype === Uint8Array.prototype) return 'bytes';
      if (Array.isArray(value) || isPlainObject(value)) return 'json';
      return undefined;
    }
    default:
      return undefined;
  }
};

/**
 * Creates an isolated type registry seeded with the built-in handlers
 */
export const createTypeRegistry = (): TypeRegistry => {
  const customHandlers = new Map<ValueType, TypeHandler>();

  const getHandler = (type: ValueType): TypeHandler | undefined => {
    const custom = customHandlers.get(type);
    if (custom) {
      return custom;
    }
    return isBuiltInValueType(type) ? BUILT_IN_HANDLERS[type] : undefined;
  };

  const resolveType = (value: unknown): ValueType | undefined => {
    if (value === null || value === undefined) {
      return undefined;
    }

    if (typeof value === 'object') {
      const ctor = constructorOf(value);
      let claimed: ValueType | undefined;
      for (const [type, handler] of customHandlers) {
        if (handler.instanceOf !== undefined && handler.instanceOf === ctor) {
          claimed = type;
        }
      }
      if (claimed !== undefined) {
        return claimed;
      }
    }

    return detectBuiltInType(value);
  };

  const serialize = (value: unknown, declaredType?: ValueType): StoredValue => {
    if (value === null || value === undefined) {
      return null;
    }

    const type = declaredType ?? resolveType(value);
    if (type === undefined) {
      throw new UnsupportedTypeError(describeValue(value), `No type handler matches values of type ${describeValue(value)}`);
    }

    const handler = getHandler(type);
    if (!handler) {
      throw new UnsupportedTypeError(type, `No type handler is registered for "${type}"`);
    }
    if (handler.instanceOf !== undefined && constructorOf(value) !== handler.instanceOf) {
      throw new UnsupportedTypeError(
        type,
        `Handler "${type}" only takes ${handler.instanceOf.name} instances, got ${describeValue(value)}`,
      );
    }
    if (handler.accepts && !handler.accepts(value)) {
      throw new UnsupportedTypeError(type, `Handler "${type}" does not accept a value of type ${describeValue(value)}`);
    }

    let stored: unknown;
    try {
      stored = handler.serialize(value);
    } catch (error) {
      if (error instanceof AuditError) throw error;
      throw new UnsupportedTypeError(
        type,
        `Handler "${type}" failed to serialize: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (typeof stored !== 'string') {
      throw new UnsupportedTypeError(type, `Handler "${type}" returned ${typeof stored} instead of a string`);
    }
    return stored;
  };

  const deserialize = (stored: StoredValue, type: ValueType): unknown => {
    if (stored === null) {
      return null;
    }

    const handler = getHandler(type);
    if (!handler) {
      throw new DeserializationError(type, stored, `No type handler is registered for "${type}"`);
    }

    try {
      return handler.deserialize(stored);
    } catch (error) {
      if (error instanceof DeserializationError) throw error;
      throw new DeserializationError(
        type,
        stored,
        `Handler "${type}" failed to restore "${stored}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  };

  return {
    register: <T>(type: ValueType, handler: TypeHandler<T>): void => {
      customHandlers.delete(type);
      customHandlers.set(type, handler);
    },
    unregister: (type: ValueType): boolean => customHandlers.delete(type),
    has: (type: ValueType): boolean => getHandler(type) !== undefined,
    resolveType,
    serialize,
    deserialize,
    areEqual: (left: unknown, right: unknown, type?: ValueType): boolean =>
      serialize(left, type) === serialize(right, type),
  };
};
