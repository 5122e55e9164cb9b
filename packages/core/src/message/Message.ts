/**
 * Message — The Unit Handed to a Logger
 *
 * A message is a field mapping plus an optional serializer. Writing it
 * stamps the fields that place it in a task:
 *
 * | Field            | Source                                           |
 * |------------------|--------------------------------------------------|
 * | `timestamp`      | configured clock (seconds since the epoch)       |
 * | `task_uuid`      | the action's task id, or a fresh one             |
 * | `task_level`     | the action's level, or `/`                       |
 * | `action_counter` | the action's message counter, or `0`             |
 *
 * then runs the serializer over the result and hands it to the logger.
 *
 * @example
 * ```typescript
 * Message.log(logger, { message_type: 'app:cache:miss', key: 'user:7' });
 *
 * const base = Message.create({ component: 'scheduler' });
 * base.bind({ event: 'tick' }).write(logger);
 * ```
 *
 * @module
 */
import type { Action } from '../action/Action.js';
import type { ActionStatus } from '../action/types.js';
import { currentAction } from '../context/ExecutionContext.js';
import { getConfig } from '../config/Configuration.js';
import { safeReason } from '../action/exceptions.js';
import type { FieldSerializer, Logger, MessageFields } from './types.js';

export class Message {
    private readonly _contents: MessageFields;
    private readonly _serializer: FieldSerializer | undefined;

    private constructor(contents: MessageFields, serializer: FieldSerializer | undefined) {
        this._contents = { ...contents };
        this._serializer = serializer;
    }

    static create(fields: MessageFields, serializer?: FieldSerializer): Message {
        return new Message(fields, serializer);
    }

    /** Create and write a message in one call, within the current action. */
    static log(logger: Logger, fields: MessageFields, serializer?: FieldSerializer): void {
        Message.create(fields, serializer).write(logger);
    }

    /** A new message with `fields` layered over this one's contents. */
    bind(fields: MessageFields): Message {
        return new Message({ ...this._contents, ...fields }, this._serializer);
    }

    /** A copy of the fields given so far, before stamping. */
    contents(): MessageFields {
        return { ...this._contents };
    }

    /**
     * Stamp, serialize and deliver this message.
     *
     * @param action - Action the message belongs to; defaults to the current action
     * @throws Whatever the serializer throws
     */
    write(logger: Logger, action: Action | undefined = currentAction()): void {
        const config = getConfig();
        const fields: MessageFields = {
            ...this._contents,
            timestamp: config.clock(),
            task_uuid: action ? action.taskUuid : config.idGenerator(),
            task_level: action ? action.taskLevel : '/',
            action_counter: action ? action.incrementMessageCounter() : 0,
        };
        logger.write(this._serialize(fields), action);
    }

    private _serialize(fields: MessageFields): MessageFields {
        if (!this._serializer) return fields;
        try {
            return this._serializer(fields);
        } catch (error) {
            getConfig().debug?.({
                type: 'serializer.error',
                messageType: typeName(fields),
                taskUuid: String(fields['task_uuid']),
                taskLevel: String(fields['task_level']),
                actionStatus: statusOf(fields),
                error: safeReason(error),
                timestamp: getConfig().clock(),
            });
            throw error;
        }
    }
}

function typeName(fields: MessageFields): string {
    const name = fields['action_type'] ?? fields['message_type'];
    return typeof name === 'string' ? name : '';
}

function statusOf(fields: MessageFields): ActionStatus | undefined {
    const status = fields['action_status'];
    return status === 'started' || status === 'succeeded' || status === 'failed' ? status : undefined;
}
