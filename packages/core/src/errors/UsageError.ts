/**
 * UsageError — Programming Errors Against the Action API
 *
 * Thrown when the caller breaks a contract the engine cannot recover
 * from: popping an empty execution-context stack, or bridging the same
 * action to a second deferred completion. Always thrown synchronously.
 *
 * @module
 */

/** Machine-readable reason for a {@link UsageError}. */
export type UsageErrorCode =
    | 'EMPTY_CONTEXT_STACK'
    | 'DUPLICATE_FINISH_AFTER';

export class UsageError extends Error {
    readonly code: UsageErrorCode;

    constructor(code: UsageErrorCode, message: string) {
        super(`[taskline] ${message}`);
        this.name = 'UsageError';
        this.code = code;
    }
}
