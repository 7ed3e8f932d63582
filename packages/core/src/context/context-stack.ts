/**
 * Explicit per-unit-of-work context stack
 *
 * @module context/context-stack
 *
 * @remarks
 * Create one stack per request, job or transaction and pass it along explicitly.
 * Stacks are never shared between units of work.
 *
 * @example
 * ```typescript
 * const stack = createContextStack();
 *
 * await stack.scopeAsync({ actingUserId: 'admin-1', reason: 'Bulk import' }, async () => {
 *   await importCustomers(stack);
 * });
 *
 * stack.depth; // => 0
 * ```
 */

import { ContextStackError } from '../errors.js';
import { contextLog } from '../utils/debug.js';
import { assertValidFrame, resolveEffectiveContext } from './frame.js';
import type { AuditFrame, EffectiveAuditContext, UserIdResolver } from './types.js';

export interface AuditContextStack {
  /** Push a validated frame; returns the frame as stored */
  push(frame: AuditFrame): AuditFrame;
  /**
   * Pop the top frame
   *
   * @throws {ContextStackError} When the stack is empty
   */
  pop(): AuditFrame;
  peek(): AuditFrame | undefined;
  readonly depth: number;
  /** Effective context of the top frame */
  current(resolveUserId?: UserIdResolver): EffectiveAuditContext;
  /** Run `fn` with the frame on top; the frame is popped on every exit path */
  scope<T>(frame: AuditFrame, fn: () => T): T;
  scopeAsync<T>(frame: AuditFrame, fn: () => Promise<T>): Promise<T>;
}

export const createContextStack = (): AuditContextStack => {
  const frames: AuditFrame[] = [];

  const push = (frame: AuditFrame): AuditFrame => {
    const stored = assertValidFrame(frame);
    frames.push(stored);
    contextLog('push (depth %d)', frames.length);
    return stored;
  };

  const pop = (): AuditFrame => {
    const frame = frames.pop();
    if (!frame) {
      throw new ContextStackError('pop() called on an empty audit context stack');
    }
    contextLog('pop (depth %d)', frames.length);
    return frame;
  };

  /**
   * Restores the depth recorded at scope entry
   *
   * @returns The corruption error when inner code left frames behind or popped the scope's frame
   */
  const unwindTo = (depth: number, pushed: AuditFrame): ContextStackError | undefined => {
    const top = frames[frames.length - 1];
    if (frames.length === depth + 1 && top === pushed) {
      frames.pop();
      return undefined;
    }

    const found = frames.length;
    frames.length = Math.min(frames.length, depth);
    return new ContextStackError(
      `Audit context scope corrupted: expected depth ${depth + 1} with the scope's frame on top, found depth ${found}`,
    );
  };

  /** A failing callback keeps its own error; corruption is only logged then */
  const unwindAfterFailure = (depth: number, pushed: AuditFrame): void => {
    const corruption = unwindTo(depth, pushed);
    if (corruption) {
      contextLog('%s (callback failed first)', corruption.message);
    }
  };

  const unwindAfterSuccess = (depth: number, pushed: AuditFrame): void => {
    const corruption = unwindTo(depth, pushed);
    if (corruption) {
      throw corruption;
    }
  };

  return {
    push,
    pop,
    peek: () => frames[frames.length - 1],
    get depth() {
      return frames.length;
    },
    current: (resolveUserId) => resolveEffectiveContext(frames[frames.length - 1], resolveUserId),
    scope: <T>(frame: AuditFrame, fn: () => T): T => {
      const depth = frames.length;
      const pushed = push(frame);
      let result: T;
      try {
        result = fn();
      } catch (error) {
        unwindAfterFailure(depth, pushed);
        throw error;
      }
      unwindAfterSuccess(depth, pushed);
      return result;
    },
    scopeAsync: async <T>(frame: AuditFrame, fn: () => Promise<T>): Promise<T> => {
      const depth = frames.length;
      const pushed = push(frame);
      let result: T;
      try {
        result = await fn();
      } catch (error) {
        unwindAfterFailure(depth, pushed);
        throw error;
      }
      unwindAfterSuccess(depth, pushed);
      return result;
    },
  };
};
