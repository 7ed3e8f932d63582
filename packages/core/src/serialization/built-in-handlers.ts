/**
 * Built-in type handlers
 *
 * @module serialization/built-in-handlers
 *
 * @remarks
 * Every handler is total over the values its `accepts` guard admits and
 * round-trips them exactly. Floats use the shortest text that parses back to the
 * same double, with `-0`, `NaN` and the infinities spelled out.
 */

import { Buffer } from 'node:buffer';
import { DeserializationError } from '../errors.js';
import type { BuiltInValueType, TypeHandler } from './types.js';

const INTEGER_PATTERN = /^-?(0|[1-9]\d*)$/;
const DECIMAL_PATTERN = /^-?(0|[1-9]\d*)(\.\d+)?$/;
const FLOAT_PATTERN = /^(-?(\d+(\.\d+)?(e[+-]\d+)?|Infinity)|NaN)$/;
const TIMESTAMP_PATTERN = /^([+-]\d{6}|\d{4})-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const BASE64_PATTERN = /^([A-Za-z0-9+/]{4})*([A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const malformed = (type: BuiltInValueType, stored: string, reason: string): DeserializationError =>
  new DeserializationError(type, stored, `Cannot restore ${type} from "${stored}": ${reason}`);

const hasExactPrototype = (value: unknown, ctor: { prototype: unknown }): boolean =>
  typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === ctor.prototype;

/** Plain objects, arrays and primitives that survive JSON encoding unchanged */
export const isJsonValue = (value: unknown): boolean => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    // JSON text has no negative zero
    return Number.isFinite(value) && !Object.is(value, -0);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
};

export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * JSON with object keys sorted at every depth
 *
 * Two mappings with the same entries encode identically regardless of insertion order.
 */
export const toCanonicalJson = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map(toCanonicalJson).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${toCanonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
};

const stringHandler: TypeHandler<string> = {
  accepts: (value): value is string => typeof value === 'string',
  serialize: (value) => value,
  deserialize: (stored) => stored,
};

const integerHandler: TypeHandler<number> = {
  accepts: (value): value is number => typeof value === 'number' && Number.isSafeInteger(value),
  serialize: (value) => String(value),
  deserialize: (stored) => {
    if (!INTEGER_PATTERN.test(stored)) {
      throw malformed('integer', stored, 'not an integer literal');
    }
    const value = Number(stored);
    if (!Number.isSafeInteger(value)) {
      throw malformed('integer', stored, 'outside the safe integer range');
    }
    return value;
  },
};

const floatHandler: TypeHandler<number> = {
  accepts: (value): value is number => typeof value === 'number',
  serialize: (value) => (Object.is(value, -0) ? '-0' : String(value)),
  deserialize: (stored) => {
    if (!FLOAT_PATTERN.test(stored)) {
      throw malformed('float', stored, 'not a numeric literal');
    }
    return Number(stored);
  },
};

/**
 * Exact decimals as plain-notation strings
 *
 * Hosts whose persistence layer hands out decimal objects register their class
 * under `'decimal'`, which takes precedence over this handler.
 */
const decimalHandler: TypeHandler<string> = {
  accepts: (value): value is string => typeof value === 'string' && DECIMAL_PATTERN.test(value),
  serialize: (value) => value,
  deserialize: (stored) => {
    if (!DECIMAL_PATTERN.test(stored)) {
      throw malformed('decimal', stored, 'not a decimal literal');
    }
    return stored;
  },
};

const bigintHandler: TypeHandler<bigint> = {
  accepts: (value): value is bigint => typeof value === 'bigint',
  serialize: (value) => value.toString(),
  deserialize: (stored) => {
    if (!INTEGER_PATTERN.test(stored)) {
      throw malformed('bigint', stored, 'not an integer literal');
    }
    return BigInt(stored);
  },
};

const booleanHandler: TypeHandler<boolean> = {
  accepts: (value): value is boolean => typeof value === 'boolean',
  serialize: (value) => (value ? 'true' : 'false'),
  deserialize: (stored) => {
    if (stored === 'true') return true;
    if (stored === 'false') return false;
    throw malformed('boolean', stored, 'expected "true" or "false"');
  },
};

const timestampHandler: TypeHandler<Date> = {
  accepts: (value): value is Date =>
    hasExactPrototype(value, Date) && value instanceof Date && !Number.isNaN(value.getTime()),
  serialize: (value) => value.toISOString(),
  deserialize: (stored) => {
    if (!TIMESTAMP_PATTERN.test(stored)) {
      throw malformed('timestamp', stored, 'not an ISO-8601 UTC timestamp');
    }
    const value = new Date(stored);
    if (Number.isNaN(value.getTime()) || value.toISOString() !== stored) {
      throw malformed('timestamp', stored, 'not a valid calendar instant');
    }
    return value;
  },
};

const uuidHandler: TypeHandler<string> = {
  accepts: (value): value is string => typeof value === 'string' && UUID_PATTERN.test(value),
  serialize: (value) => value,
  deserialize: (stored) => {
    if (!UUID_PATTERN.test(stored)) {
      throw malformed('uuid', stored, 'not a UUID');
    }
    return stored;
  },
};

const jsonHandler: TypeHandler<unknown> = {
  accepts: (value): value is unknown => (Array.isArray(value) || isPlainObject(value)) && isJsonValue(value),
  serialize: (value) => toCanonicalJson(value),
  deserialize: (stored) => {
    try {
      return JSON.parse(stored);
    } catch (error) {
      throw malformed('json', stored, error instanceof Error ? error.message : String(error));
    }
  },
};

const bytesHandler: TypeHandler<Uint8Array> = {
  accepts: (value): value is Uint8Array => hasExactPrototype(value, Uint8Array),
  serialize: (value) => Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64'),
  deserialize: (stored) => {
    if (!BASE64_PATTERN.test(stored)) {
      throw malformed('bytes', stored, 'not base64');
    }
    return new Uint8Array(Buffer.from(stored, 'base64'));
  },
};

/** Handlers available on every registry unless overridden */
export const BUILT_IN_HANDLERS: Readonly<Record<BuiltInValueType, TypeHandler>> = {
  string: stringHandler,
  integer: integerHandler,
  float: floatHandler,
  decimal: decimalHandler,
  bigint: bigintHandler,
  boolean: booleanHandler,
  timestamp: timestampHandler,
  uuid: uuidHandler,
  json: jsonHandler,
  bytes: bytesHandler,
};

export const isBuiltInValueType = (type: string): type is BuiltInValueType => Object.hasOwn(BUILT_IN_HANDLERS, type);
