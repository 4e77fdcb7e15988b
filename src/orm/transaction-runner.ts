import type { Logger } from '../core/logging/logger.js';
import type { AsyncSession } from './session.js';
import type { SyncSession } from './sync-session.js';

const rollbackFailed = (logger: Logger, err: unknown): void => {
  logger.error('Rollback failed while unwinding a transaction scope; re-throwing the original error', err);
};

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';

/**
 * Executes a function within the session's transaction
 * @param session - Session whose transaction wraps the action
 * @param action - Function to execute within the transaction
 * @param logger - Receives rollback failures
 * @returns The action's result, once committed
 * @throws Re-throws the action's own error unchanged (after rolling back)
 */
export const runInTransaction = async <T>(
  session: AsyncSession,
  action: (session: AsyncSession) => Promise<T>,
  logger: Logger
): Promise<T> => {
  try {
    const result = await action(session);
    await session.commit();
    return result;
  } catch (error) {
    try {
      await session.rollback();
    } catch (rollbackError) {
      rollbackFailed(logger, rollbackError);
    }
    throw error;
  }
};

/**
 * Blocking variant of runInTransaction. The action must not return a
 * promise: nothing would await it before the commit.
 * @throws TypeError when the action returns a promise (the work is rolled back)
 */
export const runInTransactionSync = <T>(
  session: SyncSession,
  action: (session: SyncSession) => T,
  logger: Logger
): T => {
  try {
    const result = action(session);
    if (isPromiseLike(result)) {
      void result.then(undefined, (err: unknown) => {
        logger.warn('Promise returned from a sync transaction scope rejected', err);
      });
      throw new TypeError('Sync transaction scope body returned a promise; use the async scope instead');
    }
    session.commit();
    return result;
  } catch (error) {
    try {
      session.rollback();
    } catch (rollbackError) {
      rollbackFailed(logger, rollbackError);
    }
    throw error;
  }
};
