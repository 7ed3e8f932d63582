import { AsyncLocalStorage } from 'node:async_hooks';
import { ContextStackError } from '../errors.js';
import { assertValidFrame } from './frame.js';
import type { AuditContextProvider, AuditFrame } from './types.js';

const EMPTY_STACK: readonly AuditFrame[] = Object.freeze([]);

/**
 * Create an AsyncLocalStorage-based audit context provider
 *
 * Each async unit of work sees its own immutable frame stack; leaving `run` or
 * `runAsync` restores the parent stack, also when the callback throws.
 *
 * @example
 * ```typescript
 * const provider = createAsyncLocalStorageProvider();
 *
 * await provider.runAsync({ actingUserId: 'user-123' }, async () => {
 *   await provider.runAsync({ actingUserId: 'user-123', reason: 'Merge duplicates' }, async () => {
 *     provider.getFrame()?.reason; // 'Merge duplicates'
 *   });
 *   provider.getFrame()?.reason; // undefined
 * });
 * ```
 *
 * @returns An AuditContextProvider instance
 */
export const createAsyncLocalStorageProvider = (): AuditContextProvider => {
  const storage = new AsyncLocalStorage<readonly AuditFrame[]>();

  const getFrames = (): readonly AuditFrame[] => storage.getStore() ?? EMPTY_STACK;
  const getFrame = (): AuditFrame | undefined => {
    const frames = getFrames();
    return frames[frames.length - 1];
  };
  const withFrame = (frame: AuditFrame): readonly AuditFrame[] => Object.freeze([...getFrames(), assertValidFrame(frame)]);

  return {
    getFrame,

    useFrame: (): AuditFrame => {
      const frame = getFrame();
      if (!frame) {
        throw new ContextStackError(
          'No audit frame is available. ' +
            'Make sure you are running within a context scope (e.g., inside provider.runAsync()).',
        );
      }
      return frame;
    },

    getFrames,

    run: <T>(frame: AuditFrame, fn: () => T): T => storage.run(withFrame(frame), fn),

    runAsync: <T>(frame: AuditFrame, fn: () => Promise<T>): Promise<T> => storage.run(withFrame(frame), fn),
  };
};
