/**
 * Audit context type definitions
 *
 * @module context/types
 */

/**
 * Scoped override of actor, reason and impersonator for a block of operations
 *
 * @example
 * ```typescript
 * const frame: AuditFrame = {
 *   actingUserId: 'user-123',
 *   reason: 'Customer requested email change',
 *   impersonatedBy: 'support-7',
 * };
 * ```
 */
export interface AuditFrame {
  /** User performing the change; resolved from the identity callback when absent */
  actingUserId?: string;
  /** Free-text justification recorded with every change */
  reason?: string;
  /** User acting on behalf of `actingUserId` */
  impersonatedBy?: string;
}

/**
 * Context stamped onto change log entries
 */
export interface EffectiveAuditContext {
  actingUserId: string | null;
  reason: string | null;
  impersonatedBy: string | null;
}

/**
 * Identity callback supplied by the host application
 *
 * Invoked when the current frame names no acting user.
 */
export type UserIdResolver = () => string | number | bigint | null | undefined;

/**
 * Framework-agnostic interface for ambient audit context providers
 * Implementations should use AsyncLocalStorage or similar mechanism
 */
export interface AuditContextProvider {
  /**
   * Get the innermost frame of the current unit of work
   * @returns The top frame or undefined if no scope is active
   */
  getFrame(): AuditFrame | undefined;

  /**
   * Get the innermost frame (throws if no scope is active)
   *
   * @throws {ContextStackError} If no frame is available
   */
  useFrame(): AuditFrame;

  /** All frames of the current unit of work, outermost first */
  getFrames(): readonly AuditFrame[];

  /**
   * Run a synchronous function with the frame pushed on top of the current stack
   * @returns The return value of the function
   */
  run<T>(frame: AuditFrame, fn: () => T): T;

  /**
   * Run an asynchronous function with the frame pushed on top of the current stack
   * @returns A promise that resolves to the return value of the function
   */
  runAsync<T>(frame: AuditFrame, fn: () => Promise<T>): Promise<T>;
}
