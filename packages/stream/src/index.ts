/**
 * @taskline/stream — Barrel Export
 *
 * @module
 */

export {
    createStreamLogger, formatMessage, formatMessageJson, resolveStreamOptions, toJsonValue,
    type FormatOptions, type StreamFormat, type StreamLoggerOptions, type WritableLike,
} from './StreamLogger.js';
