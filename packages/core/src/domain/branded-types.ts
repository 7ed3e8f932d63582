/**
 * Branded Types Module - Type-safe ID wrappers with validation
 */

/**
 * Branded type utility
 *
 * @template T - Underlying primitive type (e.g., string, number)
 * @template TBrand - Brand identifier (e.g., 'ResourceId', 'CommitId')
 *
 * @example
 * ```typescript
 * const commitId: CommitId = createCommitId('commit-1');
 * const resourceId: ResourceId = commitId; // ❌ Type error
 * ```
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/** Business key of an audited record instance */
export type ResourceId = Brand<string, 'ResourceId'>;
/** Identifier shared by every change written in one commit batch */
export type CommitId = Brand<string, 'CommitId'>;

/** Raw identifier values accepted from hosts */
export type RawId = string | number | bigint;

/** Validation error thrown when ID creation fails */
export class IdValidationError extends Error {
  constructor(
    public readonly idType: string,
    public readonly value: string,
    message: string,
  ) {
    super(`[${idType}] ${message}: received "${value}"`);
    this.name = 'IdValidationError';
  }
}

/** @internal */
const isNonEmptyString = (value: string): boolean => {
  return value.trim() !== '';
};

/** @internal */
const validateNonEmptyString = (id: string, idType: string): void => {
  if (!id || !isNonEmptyString(id)) {
    throw new IdValidationError(idType, id, `${idType} cannot be empty or whitespace-only`);
  }
};

/**
 * Converts a raw identifier to its string form
 *
 * @example
 * ```typescript
 * normalizeId('abc-123'); // 'abc-123'
 * normalizeId(456);       // '456'
 * normalizeId(789n);      // '789'
 * ```
 */
export const normalizeId = (id: RawId): string => {
  if (typeof id === 'string') return id;
  return id.toString();
};

/** Like {@link normalizeId}, but returns undefined for values that are not identifiers */
export const tryNormalizeId = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    return isNonEmptyString(value) ? value : undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return undefined;
};

/** Creates a validated ResourceId */
export const createResourceId = (id: RawId): ResourceId => {
  const normalized = normalizeId(id);
  validateNonEmptyString(normalized, 'ResourceId');
  return normalized as ResourceId;
};

/** Creates a validated CommitId */
export const createCommitId = (id: string): CommitId => {
  validateNonEmptyString(id, 'CommitId');
  return id as CommitId;
};
