/**
 * Conversion of a failure value into the `exception` / `reason` fields of
 * a failed finish message.
 *
 * - `exception`: for an `Error`, the name of its constructor (falling back
 *   to `error.name`); `"null"` for null; the constructor name of any other
 *   object (`"object"` when it has none); `typeof` for everything else.
 * - `reason`: `error.message` for an `Error`, `String(value)` otherwise,
 *   and {@link UNPRINTABLE_REASON} when that conversion throws.
 *
 * @module
 */

export const UNPRINTABLE_REASON = '<unprintable reason>';

export interface ExceptionFields {
    readonly exception: string;
    readonly reason: string;
}

export function describeException(error: unknown): ExceptionFields {
    return { exception: exceptionName(error), reason: safeReason(error) };
}

export function exceptionName(error: unknown): string {
    if (error === null) return 'null';
    if (typeof error !== 'object') return typeof error;

    try {
        const name = constructorName(error);
        if (error instanceof Error) return name ?? (error.name || 'Error');
        return name ?? 'object';
    } catch {
        // Proxies and hostile prototypes can throw from any property read.
        return 'object';
    }
}

export function safeReason(error: unknown): string {
    try {
        return error instanceof Error ? String(error.message) : String(error);
    } catch {
        return UNPRINTABLE_REASON;
    }
}

function constructorName(value: object): string | undefined {
    const proto: unknown = Object.getPrototypeOf(value);
    if (typeof proto !== 'object' || proto === null || !('constructor' in proto)) return undefined;
    const ctor = proto.constructor;
    if (typeof ctor !== 'function' || ctor.name === '') return undefined;
    return ctor.name;
}
