/**
 * ActionType — Declared Action Kinds With Validated Fields
 *
 * Binds an `action_type` name to schemas for its start and success
 * fields. The schemas become the action's serializers, so every start
 * and finish message is checked before it reaches the logger, and the
 * returned action's `addSuccessFields()` is typed by the success schema.
 * Failure messages are checked for string `exception` and `reason`.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 *
 * const Checkout = defineActionType({
 *     actionType: 'shop:checkout',
 *     startFields: z.object({ cart: z.string() }),
 *     successFields: z.object({ total: z.number() }),
 *     description: 'Price and pay for a cart',
 * });
 *
 * await Checkout.start(logger, { cart: 'c-19' }).within(async (action) => {
 *     action.addSuccessFields({ total: await pay('c-19') });
 * });
 * ```
 *
 * @module
 */
import { z } from 'zod';
import type { Action } from '../action/Action.js';
import type { ActionSerializers } from '../action/types.js';
import type { FieldSerializer, Logger, MessageFields } from '../message/types.js';
import { startAction, startTask } from '../action/startAction.js';
import { autoValidator, fromZodSchema, toFieldSerializer, type FieldSchema } from './StandardSchema.js';

const FAILURE_FIELDS = z.object({
    exception: z.string(),
    reason: z.string(),
});

export interface ActionTypeDefinition<TStart extends MessageFields, TSuccess extends MessageFields> {
    readonly actionType: string;
    readonly startFields?: FieldSchema<TStart>;
    readonly successFields?: FieldSchema<TSuccess>;
    readonly description?: string;
}

export class ActionType<
    TStart extends MessageFields = MessageFields,
    TSuccess extends MessageFields = MessageFields,
> {
    readonly actionType: string;
    readonly description: string | undefined;
    readonly serializers: ActionSerializers;

    constructor(definition: ActionTypeDefinition<TStart, TSuccess>) {
        this.actionType = definition.actionType;
        this.description = definition.description;
        this.serializers = {
            start: serializerFor(`${definition.actionType} (start)`, definition.startFields),
            success: serializerFor(`${definition.actionType} (success)`, definition.successFields),
            failure: toFieldSerializer(`${definition.actionType} (failure)`, fromZodSchema(FAILURE_FIELDS)),
        };
    }

    /** Start an action of this type under the current action (see `startAction`). */
    start(logger: Logger, fields: TStart): Action<TSuccess> {
        return startAction<TSuccess>(logger, this.actionType, fields, this.serializers);
    }

    /** Start an action of this type as a new task (see `startTask`). */
    startTask(logger: Logger, fields: TStart): Action<TSuccess> {
        return startTask<TSuccess>(logger, this.actionType, fields, this.serializers);
    }
}

export function defineActionType<
    TStart extends MessageFields = MessageFields,
    TSuccess extends MessageFields = MessageFields,
>(definition: ActionTypeDefinition<TStart, TSuccess>): ActionType<TStart, TSuccess> {
    return new ActionType(definition);
}

function serializerFor<T extends MessageFields>(
    typeName: string,
    schema: FieldSchema<T> | undefined,
): FieldSerializer {
    if (!schema) return passThrough;
    return toFieldSerializer(typeName, autoValidator(schema));
}

function passThrough(fields: MessageFields): MessageFields {
    return fields;
}
