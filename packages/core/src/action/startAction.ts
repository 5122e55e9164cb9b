/**
 * The supported ways to create an action.
 *
 * Both log the start message before returning. The caller then owns the
 * action: scope it with `within()`, bridge it with `finishAfter()`, or
 * call `finish()` itself.
 *
 * @module
 */
import type { Logger, MessageFields } from '../message/types.js';
import type { ActionSerializers } from './types.js';
import { Action } from './Action.js';
import { currentAction } from '../context/ExecutionContext.js';
import { getConfig } from '../config/Configuration.js';

/**
 * Start an action as a child of the current action, or as a new task
 * when no action is current.
 *
 * @example
 * ```typescript
 * startAction(logger, 'app:report:render', { reportId }).within((action) => {
 *     const pages = render(reportId);
 *     action.addSuccessFields({ pages: pages.length });
 * });
 * ```
 */
export function startAction<TSuccess extends MessageFields = MessageFields>(
    logger: Logger,
    actionType: string,
    fields: MessageFields = {},
    serializers?: ActionSerializers,
): Action<TSuccess> {
    const parent = currentAction();
    if (!parent) return startTask<TSuccess>(logger, actionType, fields, serializers);

    const action = parent.child<TSuccess>(logger, actionType, serializers);
    action._start(fields);
    return action;
}

/**
 * Start a new top-level action (a task) with a fresh task id, ignoring
 * any current action.
 */
export function startTask<TSuccess extends MessageFields = MessageFields>(
    logger: Logger,
    actionType: string,
    fields: MessageFields = {},
    serializers?: ActionSerializers,
): Action<TSuccess> {
    const action = new Action<TSuccess>(logger, getConfig().idGenerator(), [], actionType, serializers);
    action._start(fields);
    return action;
}
