/**
 * Taskline — Root Barrel Export
 *
 * Public API entry point.
 *
 * Architecture:
 *   src/
 *   ├── context/       ← Per-logical-thread stack of open actions
 *   ├── action/        ← Action lifecycle, factories, task levels, exception fields
 *   ├── message/       ← Message stamping, Logger and serializer contracts
 *   ├── validation/    ← Standard Schema adapters, ActionType, MessageType
 *   ├── config/        ← Process-wide configuration
 *   ├── observability/ ← Debug observer
 *   └── errors/        ← Usage errors
 */

// ── Execution Context ────────────────────────────────────
/** @category Context */
export { ExecutionContext, executionContext, currentAction } from './context/ExecutionContext.js';

// ── Actions ──────────────────────────────────────────────
/** @category Actions */
export { Action } from './action/Action.js';
/** @category Actions */
export { startAction, startTask } from './action/startAction.js';
/** @category Actions */
export { formatTaskLevel, parseTaskLevel, isDirectChildLevel } from './action/taskLevel.js';
/** @category Actions */
export {
    describeException, exceptionName, safeReason, UNPRINTABLE_REASON,
    type ExceptionFields,
} from './action/exceptions.js';
/** @category Actions */
export type { ActionStatus, ActionSerializers, ActionIdentification } from './action/types.js';

// ── Messages ─────────────────────────────────────────────
/** @category Messages */
export { Message } from './message/Message.js';
/** @category Messages */
export type { MessageFields, Logger, FieldSerializer } from './message/types.js';

// ── Validation ───────────────────────────────────────────
/** @category Validation */
export {
    toStandardValidator, fromZodSchema, isStandardSchema, autoValidator, toFieldSerializer,
} from './validation/StandardSchema.js';
/** @category Validation */
export type {
    StandardSchemaV1, StandardSchemaIssue, StandardSchemaResult, StandardPathSegment,
    InferStandardOutput, ZodSchemaLike, FieldSchema,
    FieldValidator, ValidationResult, ValidationIssue,
} from './validation/StandardSchema.js';
/** @category Validation */
export { FieldValidationError } from './validation/FieldValidationError.js';
/** @category Validation */
export { ActionType, defineActionType, type ActionTypeDefinition } from './validation/ActionType.js';
/** @category Validation */
export { MessageType, defineMessageType, type MessageTypeDefinition } from './validation/MessageType.js';

// ── Configuration ────────────────────────────────────────
/** @category Configuration */
export { configure, getConfig, resetConfig, isDebugEnabled, type TasklineConfig } from './config/Configuration.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver } from './observability/DebugObserver.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn,
    ActionStartEvent, ActionFinishEvent, SerializerErrorEvent,
} from './observability/DebugObserver.js';

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export { UsageError, type UsageErrorCode } from './errors/UsageError.js';
