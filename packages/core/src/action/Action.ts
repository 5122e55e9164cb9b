/**
 * Action — One Unit of Work in a Task Tree
 *
 * An action logs a start message when it is created and exactly one
 * finish message when it ends, successfully or not. Actions nest: a
 * child shares its parent's `task_uuid` and gets the parent's level
 * extended by its 1-based child index, so consumers can rebuild the
 * tree from the messages alone.
 *
 * ```
 *   task_level  action_type        action_status
 *   /           app:import         started
 *   /1/         app:import:fetch   started
 *   /1/         app:import:fetch   succeeded
 *   /2/         app:import:parse   started
 *   /2/         app:import:parse   failed
 *   /           app:import         failed
 * ```
 *
 * Create actions through `startAction()` / `startTask()`. An action is
 * meant to be used from the logical thread that created it; counters are
 * mutated without locking.
 *
 * @example
 * ```typescript
 * // Scoped: finishes when the callback returns, throws or settles
 * const total = await startAction(logger, 'app:checkout', { cart: id })
 *     .within(async (action) => {
 *         const sum = await price(id);
 *         action.addSuccessFields({ sum });
 *         return sum;
 *     });
 *
 * // Deferred: finishes when the promise settles
 * const action = startAction(logger, 'app:upload');
 * await action.finishAfter(action.run(() => upload(file)));
 * ```
 *
 * @module
 */
import type { Logger, FieldSerializer, MessageFields } from '../message/types.js';
import type { ActionIdentification, ActionSerializers } from './types.js';
import { Message } from '../message/Message.js';
import { executionContext } from '../context/ExecutionContext.js';
import { getConfig } from '../config/Configuration.js';
import { UsageError } from '../errors/UsageError.js';
import { describeException } from './exceptions.js';
import { formatTaskLevel } from './taskLevel.js';

/** How an action ended. Kept separate from `finish()`'s argument so a thrown `undefined` is still a failure. */
type Outcome =
    | { readonly ok: true }
    | { readonly ok: false; readonly error: unknown };

const SUCCEEDED: Outcome = { ok: true };

/**
 * @typeParam TSuccess - Fields accepted by {@link Action.addSuccessFields}
 */
export class Action<TSuccess extends MessageFields = MessageFields> {
    readonly taskUuid: string;
    /** 1-based child indexes from the task root; `[]` for the root itself. */
    readonly level: readonly number[];
    readonly actionType: string;
    readonly serializers: ActionSerializers | undefined;

    private readonly _logger: Logger;
    private _numberOfChildren = 0;
    private _numberOfMessages = 0;
    private readonly _successFields: MessageFields = {};
    private _finished = false;
    private _finishAfterCalled = false;

    /**
     * @internal Use `startAction()` or `startTask()`; they assign the task
     * id and level and log the start message.
     */
    constructor(
        logger: Logger,
        taskUuid: string,
        level: readonly number[],
        actionType: string,
        serializers?: ActionSerializers,
    ) {
        this._logger = logger;
        this.taskUuid = taskUuid;
        this.level = Object.freeze([...level]);
        this.actionType = actionType;
        this.serializers = serializers;
    }

    /** The level rendered as a path, e.g. `/2/1/`. */
    get taskLevel(): string {
        return formatTaskLevel(this.level);
    }

    get finished(): boolean {
        return this._finished;
    }

    identification(): ActionIdentification {
        return {
            task_uuid: this.taskUuid,
            task_level: this.taskLevel,
            action_type: this.actionType,
        };
    }

    /**
     * Claim the next message number within this action (0, 1, 2, …).
     * Called by `Message.write()` for every message written in the action.
     */
    incrementMessageCounter(): number {
        return this._numberOfMessages++;
    }

    // ── Lifecycle ────────────────────────────────────────

    /**
     * Log the start message. Called once by the factory functions.
     * @internal
     */
    _start(fields: MessageFields): void {
        this._write({ ...fields, action_status: 'started', ...this.identification() }, this.serializers?.start);
        getConfig().debug?.({
            type: 'action.start',
            actionType: this.actionType,
            taskUuid: this.taskUuid,
            taskLevel: this.taskLevel,
            timestamp: getConfig().clock(),
        });
    }

    /**
     * Log the finish message. Only the first call has any effect.
     *
     * @param exception - `undefined` for success, in which case the fields
     *   added with {@link addSuccessFields} are logged; anything else is
     *   logged as the failure's `exception` and `reason`.
     * @throws Whatever the success or failure serializer throws
     */
    finish(exception?: unknown): void {
        this._complete(exception === undefined ? SUCCEEDED : { ok: false, error: exception });
    }

    /**
     * Fields to include in the finish message if the action succeeds.
     * Later values win. Ignored once the action has finished.
     */
    addSuccessFields(fields: Partial<TSuccess>): void {
        if (this._finished) return;
        Object.assign(this._successFields, fields);
    }

    /**
     * Create a child action one level below this one.
     * The child is not started; `startAction()` does that.
     */
    child<TChild extends MessageFields = MessageFields>(
        logger: Logger,
        actionType: string,
        serializers?: ActionSerializers,
    ): Action<TChild> {
        this._numberOfChildren += 1;
        return new Action<TChild>(
            logger,
            this.taskUuid,
            [...this.level, this._numberOfChildren],
            actionType,
            serializers,
        );
    }

    // ── Execution context ────────────────────────────────

    /** Push this action onto the current logical thread's stack. Pair with {@link exit}. */
    enter(): this {
        executionContext.push(this);
        return this;
    }

    /**
     * Pop the stack and finish with `exception` (`undefined` for success).
     * A scope that threw `undefined` cannot be told apart from one that
     * returned; close it with {@link exitWithError} instead.
     */
    exit(exception?: unknown): void {
        executionContext.pop();
        this.finish(exception);
    }

    /** Pop the stack and finish as failed with `error`, whatever its value. */
    exitWithError(error: unknown): void {
        executionContext.pop();
        this._complete({ ok: false, error });
    }

    /**
     * Run `fn` as this action's scope and finish the action when the scope
     * ends: on return, on throw, or when a returned promise settles. The
     * result or error passes through unchanged.
     */
    within<R>(fn: (action: this) => PromiseLike<R>): Promise<R>;
    within<R>(fn: (action: this) => R): R;
    within<R>(fn: (action: this) => R | PromiseLike<R>): R | Promise<R> {
        return executionContext.run(this, () => {
            let result: R | PromiseLike<R>;
            try {
                result = fn(this);
            } catch (error) {
                this._complete({ ok: false, error });
                throw error;
            }
            if (isPromiseLike(result)) return this._finishWhenSettled(result);
            this._complete(SUCCEEDED);
            return result;
        });
    }

    /** Run `fn` under this action without finishing it. */
    context<R>(fn: () => R): R {
        return executionContext.run(this, fn);
    }

    /** Call `fn(...args)` with this action as the current action. */
    run<A extends unknown[], R>(fn: (...args: A) => R, ...args: A): R {
        return executionContext.run(this, () => fn(...args));
    }

    /**
     * Wrap `fn` so every call runs with this action as the current action.
     *
     * ```typescript
     * fetchUser(id).then(action.bind(renderProfile));
     * ```
     */
    bind<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
        return (...args: A): R => this.run(fn, ...args);
    }

    // ── Deferred completion ──────────────────────────────

    /**
     * Finish this action when `future` settles: success on fulfilment,
     * failure with the rejection reason otherwise.
     *
     * The returned promise settles with the same value or reason, so it
     * can be awaited in place of `future`. It may also be ignored: a
     * rejection is never reported as unhandled through it. Other handlers
     * on `future` are unaffected.
     *
     * @throws {UsageError} `DUPLICATE_FINISH_AFTER` on a second call
     */
    finishAfter<T>(future: PromiseLike<T>): Promise<T> {
        if (this._finishAfterCalled) {
            throw new UsageError(
                'DUPLICATE_FINISH_AFTER',
                `finishAfter() called twice for ${this.actionType} at ${this.taskLevel}`,
            );
        }
        this._finishAfterCalled = true;
        const bridged = this._finishWhenSettled(future);
        // The failure is already logged; awaiting `bridged` still rejects.
        void bridged.catch(() => undefined);
        return bridged;
    }

    // ── Internals ────────────────────────────────────────

    private _finishWhenSettled<T>(future: PromiseLike<T>): Promise<T> {
        return Promise.resolve(future).then(
            (value) => {
                this._complete(SUCCEEDED);
                return value;
            },
            (error: unknown) => {
                this._complete({ ok: false, error });
                throw error;
            },
        );
    }

    private _complete(outcome: Outcome): void {
        if (this._finished) return;
        this._finished = true;

        let fields: MessageFields;
        let serializer: FieldSerializer | undefined;
        let exception: string | undefined;
        if (outcome.ok) {
            fields = { ...this._successFields, action_status: 'succeeded' };
            serializer = this.serializers?.success;
        } else {
            const described = describeException(outcome.error);
            exception = described.exception;
            fields = { exception, reason: described.reason, action_status: 'failed' };
            serializer = this.serializers?.failure;
        }

        this._write({ ...fields, ...this.identification() }, serializer);
        getConfig().debug?.({
            type: 'action.finish',
            actionType: this.actionType,
            taskUuid: this.taskUuid,
            taskLevel: this.taskLevel,
            status: outcome.ok ? 'succeeded' : 'failed',
            ...(exception !== undefined ? { exception } : {}),
            timestamp: getConfig().clock(),
        });
    }

    private _write(fields: MessageFields, serializer: FieldSerializer | undefined): void {
        Message.create(fields, serializer).write(this._logger, this);
    }
}

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
    return typeof value === 'object'
        && value !== null
        && 'then' in value
        && typeof value.then === 'function';
}
