import { ByocError, CleanupFailure, errorMessage } from '../core/errors';
import { Logger, scoped } from '../core/logger';

interface CleanupAction {
  description: string;
  run: () => Promise<unknown>;
}

/**
 * Ordered compensating actions for a multi-step create. Actions registered after
 * each successful step are run newest-first when a later step fails.
 */
export class CleanupStack {
  private actions: CleanupAction[] = [];

  defer(description: string, run: () => Promise<unknown>): void {
    this.actions.push({ description, run });
  }

  get size(): number {
    return this.actions.length;
  }

  async unwind(logger: Logger): Promise<CleanupFailure[]> {
    const log = scoped(logger, 'Cleanup');
    const pending = [...this.actions].reverse();
    this.actions = [];

    const failures: CleanupFailure[] = [];
    for (const action of pending) {
      try {
        log.info(`rolling back: ${action.description}`);
        await action.run();
      } catch (error) {
        log.warn(`rollback failed (${action.description}): ${errorMessage(error)}`);
        failures.push({ description: action.description, error });
      }
    }
    return failures;
  }
}

/**
 * Runs `body`; if it throws, unwinds the registered cleanup and rethrows the
 * original error with any rollback failures attached to it.
 */
export async function withCleanup<T>(logger: Logger, body: (cleanup: CleanupStack) => Promise<T>): Promise<T> {
  const cleanup = new CleanupStack();
  try {
    return await body(cleanup);
  } catch (error) {
    const failures = await cleanup.unwind(logger);
    if (error instanceof ByocError) {
      error.cleanupFailures.push(...failures);
    }
    throw error;
  }
}
