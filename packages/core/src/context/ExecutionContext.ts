/**
 * ExecutionContext — Which Action Is Running Right Now
 *
 * A stack of open actions per logical thread of control. On Node.js a
 * logical thread is an async execution context: {@link ExecutionContext.run}
 * forks one through `AsyncLocalStorage`, so every continuation created
 * inside the callback (awaits, timers, promise callbacks) keeps seeing
 * the same stack, while concurrent work started elsewhere does not.
 *
 * Code that never entered `run()` shares one lazily created root stack.
 *
 * The engine performs no locking: a stack belongs to the logical thread
 * that owns it, and `push`/`pop` must be strictly nested within it.
 *
 * ```
 *   root stack:    [ ]
 *   run(task)   →  [ task ]
 *     push(a)   →  [ task, a ]        current() === a
 *     pop()     →  [ task ]
 *   (run ends)  →  root stack untouched: [ ]
 * ```
 *
 * @module
 */
import { AsyncLocalStorage } from 'node:async_hooks';
import type { Action } from '../action/Action.js';
import { UsageError } from '../errors/UsageError.js';

export class ExecutionContext {
    private readonly _storage = new AsyncLocalStorage<Action[]>();
    private _rootStack: Action[] | undefined;

    /** Make `action` the current action of this logical thread. */
    push(action: Action): void {
        this._stack().push(action);
    }

    /**
     * Remove the current action.
     *
     * @throws {UsageError} `EMPTY_CONTEXT_STACK` when no action is open
     */
    pop(): void {
        const stack = this._stack();
        if (stack.length === 0) {
            throw new UsageError('EMPTY_CONTEXT_STACK', 'pop() called with no action on the execution context');
        }
        stack.pop();
    }

    /** The top-most open action, or `undefined`. */
    current(): Action | undefined {
        const stack = this._stack();
        return stack[stack.length - 1];
    }

    /** Number of actions open in this logical thread. */
    get depth(): number {
        return this._stack().length;
    }

    /**
     * Run `fn` in a new logical thread whose stack is the current one with
     * `action` on top. The caller's stack is left as it was.
     */
    run<R>(action: Action, fn: () => R): R {
        return this._storage.run([...this._stack(), action], fn);
    }

    private _stack(): Action[] {
        const forked = this._storage.getStore();
        if (forked) return forked;
        this._rootStack ??= [];
        return this._rootStack;
    }
}

/** The process-wide context consulted by `startAction()` and `Message.write()`. */
export const executionContext = new ExecutionContext();

export function currentAction(): Action | undefined {
    return executionContext.current();
}
