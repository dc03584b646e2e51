/**
 * Logging utility that only logs outside production builds
 * Prevents prompt text and OS error details from reaching release logs
 */

import { getLocalAuthConfig } from '../constants/Config';

declare const __DEV__: boolean;

const isDev = typeof __DEV__ !== 'undefined' ? __DEV__ : process.env.NODE_ENV !== 'production';

function enabled(): boolean {
    return isDev && getLocalAuthConfig().logging;
}

export const logger = {
    log: (...args: unknown[]) => {
        if (enabled()) {
            console.log(...args);
        }
    },

    warn: (...args: unknown[]) => {
        if (enabled()) {
            console.warn(...args);
        }
    },

    error: (...args: unknown[]) => {
        if (enabled()) {
            console.error(...args);
        }
    },

    /**
     * Safe error logging - only prints the error message, not the full stack
     */
    safeError: (prefix: string, error: unknown) => {
        if (!getLocalAuthConfig().logging) return;
        if (isDev) {
            console.error(prefix, error);
        } else {
            console.error(`${prefix} ${errorMessage(error)}`);
        }
    },

    debug: (...args: unknown[]) => {
        if (enabled()) {
            console.log('[DEBUG]', ...args);
        }
    },
};

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}
