import type { Action } from '../action/Action.js';

/** A log message body: a flat mapping from field name to value. */
export type MessageFields = Record<string, unknown>;

/**
 * Destination for finished messages.
 *
 * Receives the fully-formed field mapping and the action it was written
 * in (`undefined` for messages logged outside any action). Timestamping
 * is already done; transport and delivery are the logger's concern.
 * Writes are expected to be synchronous and must not touch the action.
 */
export interface Logger {
    write(message: MessageFields, action?: Action): void;
}

/**
 * Transforms or validates a field mapping before it reaches the logger.
 * Signals rejection by throwing.
 */
export type FieldSerializer = (fields: MessageFields) => MessageFields;
