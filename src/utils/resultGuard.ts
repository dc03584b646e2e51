import { failureReason } from '../constants/Config';
import type { AuthOutcome, AuthResultHandler } from '../types/localAuth';
import { logger } from './logger';

/** Posts work onto the UI/main queue. */
export type Dispatcher = (task: () => void) => void;

export const mainQueue: Dispatcher = (task) => {
    setTimeout(task, 0);
};

export const immediate: Dispatcher = (task) => task();

export interface ResultGuard {
    readonly resolved: boolean;
    succeed(): void;
    fail(reason: string | null | undefined): void;
}

/**
 * Wraps a result handler so that one ceremony resolves exactly once.
 * Outcomes after the first are logged and dropped.
 */
export function createResultGuard(
    onResult: AuthResultHandler,
    dispatch: Dispatcher = mainQueue,
    tag: string = '[LocalAuth]'
): ResultGuard {
    let resolved = false;

    const settle = (outcome: AuthOutcome) => {
        if (resolved) {
            logger.warn(`${tag} Ignoring ${outcome.status} after the ceremony already resolved`);
            return;
        }
        resolved = true;
        dispatch(() => onResult(outcome));
    };

    return {
        get resolved() {
            return resolved;
        },
        succeed: () => settle({ status: 'success' }),
        fail: (reason) => settle({ status: 'failure', reason: failureReason(reason) }),
    };
}
