/**
 * Error reporting utilities for the audit engine
 *
 * @module error-handler
 *
 * @remarks
 * Errors raised while computing or writing changes always propagate to the
 * transaction boundary so the transaction aborts. The configurable handler only
 * observes them (e.g. forwards to monitoring); it cannot swallow them.
 *
 * @example
 * ```typescript
 * const engine = createAuditEngine({
 *   client,
 *   schemaMetadata,
 *   onError: ({ phase, recordTypes, error }) => {
 *     monitoringService.captureError(error, { phase, recordTypes });
 *   },
 * });
 * ```
 */

export type AuditErrorPhase = 'diff' | 'write' | 'query';

/**
 * Context information for audit error handling
 */
export interface AuditErrorContext {
  phase: AuditErrorPhase;
  /** Record types involved in the failing operation */
  recordTypes: string[];
  error: Error;
}

/**
 * Audit error observer callback
 *
 * @remarks
 * The original error is rethrown after the handler returns. If the handler itself
 * throws, its error is logged and the original error still propagates.
 */
export type AuditErrorHandler = (context: AuditErrorContext) => void | Promise<void>;

/**
 * Normalizes any thrown value to an Error instance
 *
 * @remarks
 * Handles cases where non-Error values are thrown (strings, objects, etc.)
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

/**
 * Default audit error handler: logs the failing phase
 */
export const defaultAuditErrorHandler: AuditErrorHandler = (context: AuditErrorContext) => {
  console.error(
    `[@field-audit] Audit error in ${context.phase} phase:`,
    `Record types: ${context.recordTypes.join(', ') || '(none)'}`,
    context.error,
  );
};

/**
 * Safely executes an error handler
 *
 * @remarks
 * Wraps handler in try-catch so a failing handler never replaces the original error
 */
const executeHandler = async (handler: AuditErrorHandler, context: AuditErrorContext): Promise<void> => {
  try {
    await handler(context);
  } catch (handlerError) {
    console.error(
      '[@field-audit] Error in custom error handler:',
      handlerError instanceof Error ? handlerError.message : String(handlerError),
    );
  }
};

/**
 * Reports an error to the handler, then rethrows it
 */
export const reportAuditError = async (
  handler: AuditErrorHandler | undefined,
  context: AuditErrorContext,
): Promise<never> => {
  await executeHandler(handler ?? defaultAuditErrorHandler, context);
  throw context.error;
};

/**
 * Runs an async step, reporting and rethrowing any failure
 *
 * @example
 * ```typescript
 * const receipt = await withErrorReporting(
 *   () => writer.commit(changes, context, tx, unit),
 *   onError,
 *   { phase: 'write', recordTypes: ['Customer'] },
 * );
 * ```
 */
export const withErrorReporting = async <T>(
  fn: () => Promise<T>,
  handler: AuditErrorHandler | undefined,
  context: Omit<AuditErrorContext, 'error'>,
): Promise<T> => {
  try {
    return await fn();
  } catch (thrownValue: unknown) {
    return reportAuditError(handler, { ...context, error: normalizeError(thrownValue) });
  }
};
