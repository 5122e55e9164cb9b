/**
 * DebugObserver — Opt-in Diagnostics for the Action Engine
 *
 * Emits structured, typed events as actions start and finish and when a
 * serializer rejects a message. These events describe what the engine
 * did; they are not the log messages themselves (those go to the
 * application's `Logger`).
 *
 * Only active when configured, or when `TASKLINE_DEBUG` is set.
 *
 * @example
 * ```typescript
 * import { configure, createDebugObserver } from '@taskline/core';
 *
 * // Default: compact console.debug output
 * configure({ debug: createDebugObserver() });
 *
 * // Custom handler (e.g. forward to a metrics client)
 * configure({
 *     debug: createDebugObserver((event) => metrics.increment(event.type)),
 * });
 * ```
 *
 * @module
 */
import type { ActionStatus } from '../action/types.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted after an action's start message was handed to its logger.
 */
export interface ActionStartEvent {
    readonly type: 'action.start';
    readonly actionType: string;
    readonly taskUuid: string;
    readonly taskLevel: string;
    /** Seconds since the epoch, from the configured clock */
    readonly timestamp: number;
}

/**
 * Emitted after an action's finish message was handed to its logger.
 * Never emitted twice for the same action.
 */
export interface ActionFinishEvent {
    readonly type: 'action.finish';
    readonly actionType: string;
    readonly taskUuid: string;
    readonly taskLevel: string;
    readonly status: Exclude<ActionStatus, 'started'>;
    /** Exception name, present when `status` is `'failed'` */
    readonly exception?: string;
    readonly timestamp: number;
}

/**
 * Emitted when a field serializer throws. The error still propagates to
 * the caller; this event only makes the rejection visible.
 */
export interface SerializerErrorEvent {
    readonly type: 'serializer.error';
    /** `action_type` or `message_type` of the rejected message, or `''` */
    readonly messageType: string;
    readonly taskUuid: string;
    readonly taskLevel: string;
    readonly actionStatus?: ActionStatus;
    readonly error: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'action.start':     // ActionStartEvent
 *         case 'action.finish':    // ActionFinishEvent
 *         case 'serializer.error': // SerializerErrorEvent
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | ActionStartEvent
    | ActionFinishEvent
    | SerializerErrorEvent;

/**
 * Observer function that receives debug events.
 * Pass it to `configure({ debug })`.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, it is returned as-is. The default
 * handler writes one line per event:
 *
 * ```
 * [taskline] start    3f2a9c10 /1/ app:load
 * [taskline] finish   3f2a9c10 /1/ app:load ✓
 * [taskline] finish   3f2a9c10 /2/ app:save ✗ RangeError
 * [taskline] REJECTED 3f2a9c10 /2/ app:save (failed) reason must be a string
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[taskline]';
        const where = `${event.taskUuid.slice(0, 8)} ${event.taskLevel}`;

        switch (event.type) {
            case 'action.start':
                console.debug(`${prefix} start    ${where} ${event.actionType}`);
                break;

            case 'action.finish': {
                const outcome = event.status === 'succeeded' ? '✓' : `✗ ${event.exception ?? ''}`;
                console.debug(`${prefix} finish   ${where} ${event.actionType} ${outcome}`);
                break;
            }

            case 'serializer.error': {
                const status = event.actionStatus ? ` (${event.actionStatus})` : '';
                console.debug(`${prefix} REJECTED ${where} ${event.messageType}${status} ${event.error}`);
                break;
            }
        }
    };
}
