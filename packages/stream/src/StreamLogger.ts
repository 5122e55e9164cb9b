/**
 * StreamLogger — Line-Oriented Output for Messages
 *
 * A `Logger` that writes one line per message to a writable stream
 * (stderr by default). Lines are human-readable and timestamped, which
 * suits CI logs, journald and local development:
 *
 * ```
 * 2026-01-01T00:00:00.000Z [START] [3f2a9c1d] /1/ app:import source=s3
 * 2026-01-01T00:00:00.250Z [ FAIL] [3f2a9c1d] /1/ app:import exception=Error reason="disk full"
 * ```
 *
 * Features:
 *   - **Task correlator**: the first 8 characters of `task_uuid`, for
 *     isolating one task across interleaved output.
 *   - **JSON mode**: set `TASKLINE_LOG_FORMAT=json` for NDJSON that log
 *     collectors ingest natively.
 *   - **NO_COLOR**: honoured; colour is also off when the stream is not a TTY.
 *
 * @module
 */
import type { Logger, MessageFields } from '@taskline/core';

// ============================================================================
// ANSI (minimal, respects NO_COLOR)
// ============================================================================

interface Palette {
    readonly reset: string;
    readonly dim: string;
    readonly bold: string;
    readonly cyan: string;
    readonly green: string;
    readonly red: string;
    readonly blue: string;
}

function palette(color: boolean): Palette {
    return {
        reset: color ? '\x1b[0m' : '',
        dim: color ? '\x1b[2m' : '',
        bold: color ? '\x1b[1m' : '',
        cyan: color ? '\x1b[36m' : '',
        green: color ? '\x1b[32m' : '',
        red: color ? '\x1b[31m' : '',
        blue: color ? '\x1b[34m' : '',
    };
}

/** Keys rendered in the line prefix rather than as `key=value` pairs. */
const PREFIX_KEYS = new Set([
    'timestamp', 'task_uuid', 'task_level', 'action_type', 'message_type',
    'action_status', 'action_counter',
]);

function time(message: MessageFields): string {
    const timestamp = message['timestamp'];
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) return '-';
    return new Date(timestamp * 1000).toISOString();
}

function statusTag(status: unknown, c: Palette): string {
    switch (status) {
        case 'started': return `${c.cyan}[START]${c.reset}`;
        case 'succeeded': return `${c.green}[ DONE]${c.reset}`;
        case 'failed': return `${c.red}[ FAIL]${c.reset}`;
        default: return `${c.blue}[  MSG]${c.reset}`;
    }
}

function formatValue(value: unknown): string {
    if (typeof value === 'string') {
        return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
    }
    return JSON.stringify(toJsonValue(value)) ?? String(value);
}

// ============================================================================
// Text Formatter
// ============================================================================

export interface FormatOptions {
    /** Emit ANSI colour codes (default: `false`) */
    color?: boolean;
}

/** Format one message as a single human-readable line (no trailing newline). */
export function formatMessage(message: MessageFields, options: FormatOptions = {}): string {
    const c = palette(options.color ?? false);
    const uuid = String(message['task_uuid'] ?? '-').slice(0, 8);
    const level = String(message['task_level'] ?? '-');
    const name = String(message['action_type'] ?? message['message_type'] ?? '-');

    const fields = Object.entries(message)
        .filter(([key]) => !PREFIX_KEYS.has(key))
        .map(([key, value]) => ` ${key}=${formatValue(value)}`)
        .join('');

    return `${c.dim}${time(message)}${c.reset} ${statusTag(message['action_status'], c)} ${c.dim}[${uuid}]${c.reset} ${level} ${c.bold}${name}${c.reset}${fields}`;
}

// ============================================================================
// JSON Formatter (for TASKLINE_LOG_FORMAT=json)
// ============================================================================

/**
 * Convert a field value into something `JSON.stringify` renders without
 * throwing: bigints become strings, errors `{ name, message }`, dates ISO
 * strings and a reference back to an enclosing object `"[Circular]"`.
 */
export function toJsonValue(value: unknown, ancestors: readonly object[] = []): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (typeof value !== 'object' || value === null) return value;
    if (ancestors.includes(value)) return '[Circular]';

    if (value instanceof Error) return { name: value.name, message: value.message };
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }

    const path = [...ancestors, value];
    if (Array.isArray(value)) return value.map((item: unknown) => toJsonValue(item, path));

    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
        result[key] = toJsonValue(item, path);
    }
    return result;
}

/**
 * Format a message as a single NDJSON line. Adds `time` (ISO) and `level`
 * (`error` for failed actions, `info` otherwise) for log ingestion.
 */
export function formatMessageJson(message: MessageFields): string {
    const base: Record<string, unknown> = {
        time: time(message),
        level: message['action_status'] === 'failed' ? 'error' : 'info',
    };
    for (const [key, value] of Object.entries(message)) {
        base[key] = toJsonValue(value);
    }
    return JSON.stringify(base);
}

// ============================================================================
// Stream Logger
// ============================================================================

export type StreamFormat = 'text' | 'json';

/** Anything with a string `write`, such as `process.stderr`. */
export interface WritableLike {
    write(chunk: string): unknown;
    readonly isTTY?: boolean;
}

export interface StreamLoggerOptions {
    /** Destination (default: `process.stderr`) */
    stream?: WritableLike;
    /** Default: from `TASKLINE_LOG_FORMAT` */
    format?: StreamFormat;
    /** Default: on for a TTY unless `NO_COLOR` is set */
    color?: boolean;
}

/**
 * Read the output format and colour setting from the environment.
 * `TASKLINE_LOG_FORMAT=json` selects NDJSON; colour needs a TTY and no
 * `NO_COLOR`.
 */
export function resolveStreamOptions(
    env: NodeJS.ProcessEnv = process.env,
    isTTY = false,
): { format: StreamFormat; color: boolean } {
    return {
        format: env['TASKLINE_LOG_FORMAT'] === 'json' ? 'json' : 'text',
        color: !env['NO_COLOR'] && isTTY,
    };
}

/**
 * Create a `Logger` that writes each message as one line.
 *
 * @example
 * ```typescript
 * const logger = createStreamLogger();
 * startAction(logger, 'app:import', { source: 's3' }).within(() => importAll());
 * ```
 */
export function createStreamLogger(options: StreamLoggerOptions = {}): Logger {
    const stream: WritableLike = options.stream ?? process.stderr;
    const resolved = resolveStreamOptions(process.env, stream.isTTY === true);
    const format = options.format ?? resolved.format;
    const color = options.color ?? resolved.color;

    return {
        write(message: MessageFields): void {
            const line = format === 'json'
                ? formatMessageJson(message)
                : formatMessage(message, { color });
            stream.write(line + '\n');
        },
    };
}
