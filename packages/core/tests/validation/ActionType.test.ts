import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import * as v from 'valibot';
import { ActionType, defineActionType } from '../../src/validation/ActionType.js';
import { MessageType, defineMessageType } from '../../src/validation/MessageType.js';
import { FieldValidationError } from '../../src/validation/FieldValidationError.js';
import { startTask } from '../../src/action/startAction.js';
import { resetConfig } from '../../src/config/Configuration.js';
import { RecordingLogger, T0, useDeterministicConfig } from '../helpers.js';

let logger: RecordingLogger;

beforeEach(() => {
    useDeterministicConfig();
    logger = new RecordingLogger();
});

afterEach(() => {
    resetConfig();
});

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

// ── ActionType ──────────────────────────────────────────

describe('ActionType', () => {
    const Checkout = defineActionType({
        actionType: 'shop:checkout',
        startFields: z.object({ cart: z.string().min(1) }),
        successFields: z.object({ total: z.number().nonnegative() }),
        description: 'Price and pay for a cart',
    });

    it('exposes its definition', () => {
        expect(Checkout).toBeInstanceOf(ActionType);
        expect(Checkout.actionType).toBe('shop:checkout');
        expect(Checkout.description).toBe('Price and pay for a cart');
    });

    it('logs validated start and success messages', () => {
        const action = Checkout.start(logger, { cart: 'c-19' });
        action.addSuccessFields({ total: 42 });
        action.finish();

        expect(logger.messages).toEqual([
            {
                cart: 'c-19', action_status: 'started', action_type: 'shop:checkout',
                task_uuid: 'task-1', task_level: '/', timestamp: T0, action_counter: 0,
            },
            {
                total: 42, action_status: 'succeeded', action_type: 'shop:checkout',
                task_uuid: 'task-1', task_level: '/', timestamp: T0, action_counter: 1,
            },
        ]);
    });

    it('rejects invalid start fields before anything is logged', () => {
        const error = captureError(() => Checkout.start(logger, { cart: '' }));

        expect(error).toBeInstanceOf(FieldValidationError);
        expect(error).toMatchObject({ typeName: 'shop:checkout (start)', issues: [{ path: ['cart'] }] });
        expect(logger.messages).toEqual([]);
    });

    it('rejects invalid success fields when finishing', () => {
        const action = Checkout.start(logger, { cart: 'c-19' });
        action.addSuccessFields({ total: -1 });

        const error = captureError(() => action.finish());

        expect(error).toMatchObject({ name: 'FieldValidationError', typeName: 'shop:checkout (success)' });
        expect(action.finished).toBe(true);
        expect(logger.messages).toHaveLength(1);
    });

    it('requires declared success fields on success', () => {
        const action = Checkout.start(logger, { cart: 'c-19' });

        expect(() => action.finish()).toThrow(FieldValidationError);
    });

    it('accepts any failure', () => {
        Checkout.start(logger, { cart: 'c-19' }).finish(new Error('card declined'));

        expect(logger.messages[1]).toMatchObject({
            action_status: 'failed',
            exception: 'Error',
            reason: 'card declined',
        });
    });

    it('nests under the current action or starts a task on demand', () => {
        const root = startTask(logger, 'shop:session');
        const [nested, detached] = root.within(() => [
            Checkout.start(logger, { cart: 'c-1' }),
            Checkout.startTask(logger, { cart: 'c-2' }),
        ]);

        expect(nested?.taskUuid).toBe('task-1');
        expect(nested?.taskLevel).toBe('/1/');
        expect(detached?.taskUuid).toBe('task-2');
        expect(detached?.taskLevel).toBe('/');
    });

    it('passes fields through when no schema is declared', () => {
        const Ping = defineActionType({ actionType: 'app:ping' });
        const action = Ping.start(logger, { host: 'db-1', anything: [1, 2] });
        action.addSuccessFields({ rtt: 3 });
        action.finish();

        expect(logger.messages[0]).toMatchObject({ host: 'db-1', anything: [1, 2] });
        expect(logger.messages[1]).toMatchObject({ rtt: 3 });
    });

    it('works with valibot schemas', () => {
        const Fetch = new ActionType({
            actionType: 'app:fetch',
            startFields: v.object({ url: v.string() }),
        });

        Fetch.start(logger, { url: 'https://example.test/' }).finish();

        expect(logger.messages[0]).toMatchObject({ url: 'https://example.test/', action_type: 'app:fetch' });
    });
});

// ── MessageType ─────────────────────────────────────────

describe('MessageType', () => {
    const CacheMiss = defineMessageType({
        messageType: 'app:cache:miss',
        fields: z.object({ key: z.string().min(3) }),
        description: 'Lookup fell through to the database',
    });

    it('exposes its definition', () => {
        expect(CacheMiss).toBeInstanceOf(MessageType);
        expect(CacheMiss.messageType).toBe('app:cache:miss');
        expect(CacheMiss.description).toBe('Lookup fell through to the database');
    });

    it('logs the message type with validated fields', () => {
        CacheMiss.log(logger, { key: 'user:7' });

        expect(logger.messages).toEqual([{
            key: 'user:7',
            message_type: 'app:cache:miss',
            timestamp: T0,
            task_uuid: 'task-1',
            task_level: '/',
            action_counter: 0,
        }]);
    });

    it('rejects invalid fields', () => {
        const error = captureError(() => CacheMiss.log(logger, { key: 'ab' }));

        expect(error).toMatchObject({ typeName: 'app:cache:miss', issues: [{ path: ['key'] }] });
        expect(logger.messages).toEqual([]);
    });

    it('writes within the current action', () => {
        const action = startTask(logger, 'app:lookup');
        action.context(() => CacheMiss.log(logger, { key: 'user:7' }));

        expect(logger.messages[1]).toMatchObject({ message_type: 'app:cache:miss', task_uuid: 'task-1', action_counter: 1 });
    });

    it('creates messages without a serializer when no schema is declared', () => {
        const Tick = defineMessageType({ messageType: 'app:tick' });

        expect(Tick.serializer).toBeUndefined();
        expect(Tick.create({ n: 1 }).contents()).toEqual({ n: 1, message_type: 'app:tick' });
    });
});
