/**
 * Configuration — Process-wide Engine Settings
 *
 * Holds the few knobs the engine consults at run time: where task ids
 * come from, which clock stamps messages, and the optional debug
 * observer. The active configuration is a frozen object replaced
 * wholesale by {@link configure}.
 *
 * Environment:
 * - `TASKLINE_DEBUG`: any value other than `""` or `"0"` installs the
 *   default console debug observer.
 *
 * @module
 */
import { randomUUID } from 'node:crypto';
import { createDebugObserver, type DebugObserverFn } from '../observability/DebugObserver.js';

export interface TasklineConfig {
    /** Produces the opaque id of every new task. */
    readonly idGenerator: () => string;
    /** Current time in seconds since the epoch, used for `timestamp`. */
    readonly clock: () => number;
    /** Receives engine diagnostics; `undefined` disables them. */
    readonly debug: DebugObserverFn | undefined;
}

/** Whether the environment asks for the default debug observer. */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
    const value = env['TASKLINE_DEBUG'];
    return value !== undefined && value !== '' && value !== '0';
}

function defaultConfig(): TasklineConfig {
    return Object.freeze({
        idGenerator: randomUUID,
        clock: () => Date.now() / 1000,
        debug: isDebugEnabled() ? createDebugObserver() : undefined,
    });
}

let active: TasklineConfig = defaultConfig();

export function getConfig(): TasklineConfig {
    return active;
}

/**
 * Override parts of the active configuration.
 *
 * @example
 * ```typescript
 * let next = 0;
 * configure({ idGenerator: () => `task-${++next}`, clock: () => 0 });
 * ```
 */
export function configure(options: Partial<TasklineConfig>): TasklineConfig {
    active = Object.freeze({ ...active, ...options });
    return active;
}

/** Restore defaults, re-reading the environment. */
export function resetConfig(): TasklineConfig {
    active = defaultConfig();
    return active;
}
