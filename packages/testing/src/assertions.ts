/**
 * Assertions over recorded messages. They throw `node:assert`
 * `AssertionError`s, which every test runner reports as failures.
 *
 * @module
 */
import { AssertionError } from 'node:assert';
import { isDeepStrictEqual } from 'node:util';
import type { MessageFields } from '@taskline/core';
import type { MemoryLogger } from './MemoryLogger.js';
import { LoggedAction, LoggedMessage, type ActionTypeRef, type MessageTypeRef } from './LoggedAction.js';

/** True when `message` has every key of `fields` with a deeply equal value. */
export function containsFields(message: MessageFields, fields: MessageFields): boolean {
    return Object.entries(fields).every(
        ([key, value]) => Object.hasOwn(message, key) && isDeepStrictEqual(message[key], value),
    );
}

export function assertContainsFields(message: MessageFields, fields: MessageFields): void {
    if (containsFields(message, fields)) return;
    throw new AssertionError({
        message: `Message does not contain the expected fields`,
        actual: message,
        expected: fields,
        operator: 'containsFields',
    });
}

/**
 * Assert that the first logged action of `actionType` finished with the
 * given outcome and, optionally, that its start and finish messages
 * contain the given fields.
 *
 * @returns The rebuilt action, for further assertions
 */
export function assertHasAction(
    logger: MemoryLogger,
    actionType: ActionTypeRef,
    succeeded: boolean,
    startFields?: MessageFields,
    endFields?: MessageFields,
): LoggedAction {
    const name = typeof actionType === 'string' ? actionType : actionType.actionType;
    const [action] = LoggedAction.ofType(logger.messages, name);
    if (!action) {
        throw new AssertionError({ message: `No action of type "${name}" was logged` });
    }
    if (action.succeeded !== succeeded) {
        throw new AssertionError({
            message: `Action "${name}" ${describeOutcome(action.succeeded)}, expected it to ${succeeded ? 'succeed' : 'fail'}`,
            actual: action.succeeded,
            expected: succeeded,
            operator: 'strictEqual',
        });
    }
    if (startFields) assertContainsFields(action.startMessage, startFields);
    if (endFields && action.endMessage) assertContainsFields(action.endMessage, endFields);
    return action;
}

/**
 * Assert that at least one message of `messageType` was logged, the
 * first of which contains `fields`.
 */
export function assertHasMessage(
    logger: MemoryLogger,
    messageType: MessageTypeRef,
    fields?: MessageFields,
): LoggedMessage {
    const name = typeof messageType === 'string' ? messageType : messageType.messageType;
    const [logged] = LoggedMessage.ofType(logger.messages, name);
    if (!logged) {
        throw new AssertionError({ message: `No message of type "${name}" was logged` });
    }
    if (fields) assertContainsFields(logged.message, fields);
    return logged;
}

function describeOutcome(succeeded: boolean | undefined): string {
    if (succeeded === undefined) return 'never finished';
    return succeeded ? 'succeeded' : 'failed';
}
