/**
 * Frame validation and effective context resolution
 *
 * @module context/frame
 */

import { normalizeId } from '../domain/branded-types.js';
import type { Result, ValidationError } from '../domain/smart-constructors.js';
import { failure, success } from '../domain/smart-constructors.js';
import { ConfigurationError } from '../errors.js';
import type { AuditFrame, EffectiveAuditContext, UserIdResolver } from './types.js';

/** Maximum lengths of frame values, matching the audit store columns */
export const FRAME_LIMITS = {
  ACTING_USER_ID: 256,
  IMPERSONATED_BY: 256,
  REASON: 512,
} as const;

const validateOptionalText = (
  value: string | undefined,
  field: keyof AuditFrame,
  maxLength: number,
  errors: ValidationError[],
): void => {
  if (value === undefined) {
    return;
  }
  if (value.trim() === '') {
    errors.push({ field, message: `${field} cannot be empty` });
  } else if (value.length > maxLength) {
    errors.push({ field, message: `${field} cannot exceed ${maxLength} characters` });
  }
};

const collectFrameErrors = (frame: AuditFrame): ValidationError[] => {
  const errors: ValidationError[] = [];
  validateOptionalText(frame.actingUserId, 'actingUserId', FRAME_LIMITS.ACTING_USER_ID, errors);
  validateOptionalText(frame.impersonatedBy, 'impersonatedBy', FRAME_LIMITS.IMPERSONATED_BY, errors);
  validateOptionalText(frame.reason, 'reason', FRAME_LIMITS.REASON, errors);
  return errors;
};

/**
 * Creates a validated, frozen frame
 *
 * @example
 * ```typescript
 * const result = createAuditFrame({ actingUserId: 'user-1', reason: '' });
 * if (!result.success) {
 *   console.error(result.errors); // [{ field: 'reason', message: 'reason cannot be empty' }]
 * }
 * ```
 */
export const createAuditFrame = (input: AuditFrame): Result<AuditFrame> => {
  const errors = collectFrameErrors(input);
  if (errors.length > 0) {
    return failure(errors);
  }
  return success(Object.freeze({ ...input }));
};

/**
 * Validates a frame before it is pushed
 *
 * @throws {ConfigurationError} Listing every invalid value
 */
export const assertValidFrame = (frame: AuditFrame): AuditFrame => {
  const result = createAuditFrame(frame);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid audit frame: ${result.errors.map((error) => `${error.field}: ${error.message}`).join('; ')}`,
    );
  }
  return result.value;
};

/**
 * Merges the top frame with the identity callback
 *
 * The callback runs only when the frame names no acting user. Nested frames do
 * not inherit values from their parents.
 */
export const resolveEffectiveContext = (
  frame: AuditFrame | undefined,
  resolveUserId?: UserIdResolver,
): EffectiveAuditContext => {
  let actingUserId = frame?.actingUserId ?? null;
  if (actingUserId === null && resolveUserId) {
    const resolved = resolveUserId();
    actingUserId = resolved === null || resolved === undefined ? null : normalizeId(resolved);
  }

  return {
    actingUserId,
    reason: frame?.reason ?? null,
    impersonatedBy: frame?.impersonatedBy ?? null,
  };
};
