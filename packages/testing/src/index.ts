/**
 * @taskline/testing — Barrel Export
 *
 * In-memory logger and task-tree assertions for tests of code that logs
 * through `@taskline/core`.
 *
 * @module
 */

export { MemoryLogger, type LoggedEntry } from './MemoryLogger.js';
export { LoggedAction, LoggedMessage, type ActionTypeRef, type MessageTypeRef } from './LoggedAction.js';
export { containsFields, assertContainsFields, assertHasAction, assertHasMessage } from './assertions.js';
