/**
 * MessageType — Declared Standalone Messages
 *
 * Names a kind of message (`message_type`) and validates its fields on
 * every write. Messages are written within the current action, if any.
 *
 * @example
 * ```typescript
 * const CacheMiss = defineMessageType({
 *     messageType: 'app:cache:miss',
 *     fields: z.object({ key: z.string() }),
 * });
 *
 * CacheMiss.log(logger, { key: 'user:7' });
 * ```
 *
 * @module
 */
import type { FieldSerializer, Logger, MessageFields } from '../message/types.js';
import { Message } from '../message/Message.js';
import { autoValidator, toFieldSerializer, type FieldSchema } from './StandardSchema.js';

export interface MessageTypeDefinition<TFields extends MessageFields> {
    readonly messageType: string;
    readonly fields?: FieldSchema<TFields>;
    readonly description?: string;
}

export class MessageType<TFields extends MessageFields = MessageFields> {
    readonly messageType: string;
    readonly description: string | undefined;
    readonly serializer: FieldSerializer | undefined;

    constructor(definition: MessageTypeDefinition<TFields>) {
        this.messageType = definition.messageType;
        this.description = definition.description;
        this.serializer = definition.fields
            ? toFieldSerializer(definition.messageType, autoValidator(definition.fields))
            : undefined;
    }

    create(fields: TFields): Message {
        return Message.create({ ...fields, message_type: this.messageType }, this.serializer);
    }

    log(logger: Logger, fields: TFields): void {
        this.create(fields).write(logger);
    }
}

export function defineMessageType<TFields extends MessageFields = MessageFields>(
    definition: MessageTypeDefinition<TFields>,
): MessageType<TFields> {
    return new MessageType(definition);
}
