import { fail, ok, type GameResult } from '../types/result';
import { ConcurrencyConflictError, type GameStore, type UnitOfWork } from '../lambda/shared/store';

/**
 * Commits a unit of work, turning any store error into a PersistenceFailure.
 * A failed commit wrote nothing.
 */
export async function commitUnit(
  store: GameStore,
  unit: UnitOfWork,
  operation: string,
  playerId?: string,
): Promise<GameResult<void>> {
  try {
    await store.commit(unit);
    return ok(undefined);
  } catch (error) {
    const conflict = error instanceof ConcurrencyConflictError;
    console.error(
      JSON.stringify({
        event: 'commit_failed',
        operation,
        playerId: playerId ?? null,
        conflict,
        message: error instanceof Error ? error.message : String(error),
      }),
    );
    return fail(
      'PersistenceFailure',
      conflict ? 'The record changed while the request was in flight; retry the request' : 'Failed to save changes',
    );
  }
}

/**
 * Runs a service operation, mapping an unexpected throw (a failed store read,
 * usually) to PersistenceFailure so callers only ever see a GameResult.
 */
export async function guarded<T>(operation: string, run: () => Promise<GameResult<T>>): Promise<GameResult<T>> {
  try {
    return await run();
  } catch (error) {
    console.error(
      JSON.stringify({
        event: 'operation_failed',
        operation,
        message: error instanceof Error ? error.message : String(error),
      }),
    );
    return fail('PersistenceFailure', `${operation} failed`);
  }
}
