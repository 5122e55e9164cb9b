/**
 * Shared fixtures: a recording logger and a deterministic configuration.
 */
import type { Action } from '../src/action/Action.js';
import type { Logger, MessageFields } from '../src/message/types.js';
import { configure } from '../src/config/Configuration.js';

export const T0 = 1_700_000_000;

export class RecordingLogger implements Logger {
    readonly messages: MessageFields[] = [];
    readonly actions: Array<Action | undefined> = [];

    write(message: MessageFields, action?: Action): void {
        this.messages.push(message);
        this.actions.push(action);
    }
}

/** Task ids `task-1`, `task-2`, … and a clock frozen at {@link T0}. */
export function useDeterministicConfig(): void {
    let next = 0;
    configure({
        idGenerator: () => `task-${++next}`,
        clock: () => T0,
        debug: undefined,
    });
}
