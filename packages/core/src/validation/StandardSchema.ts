/**
 * StandardSchema — Schema Adapters for Field Serializers
 *
 * Lets action and message types declare their fields with any validator
 * that implements the Standard Schema interface
 * (`@standard-schema/spec`), such as Zod, Valibot or ArkType, or with an older
 * Zod release through its `safeParse()` method.
 *
 * A schema becomes a {@link FieldValidator} (never throws), and a
 * validator becomes a `FieldSerializer` through {@link toFieldSerializer}
 * (throws {@link FieldValidationError} on rejection).
 *
 * Serializers run synchronously inside `start()` / `finish()`, so a
 * schema that validates asynchronously is rejected at validation time.
 *
 * @see https://github.com/standard-schema/standard-schema
 *
 * @example
 * ```typescript
 * import * as v from 'valibot';
 *
 * const validator = toStandardValidator(v.object({ key: v.string() }));
 *
 * validator.validate({ key: 'user:7' });
 * // { success: true, data: { key: 'user:7' } }
 *
 * validator.validate({ key: 7 });
 * // { success: false, issues: [{ message: 'Invalid type: ...', path: ['key'] }] }
 * ```
 *
 * @module
 */
import type { FieldSerializer, MessageFields } from '../message/types.js';
import { FieldValidationError } from './FieldValidationError.js';

// ── Standard Schema Types ────────────────────────────────

/** Path segment object form used by some Standard Schema vendors. */
export interface StandardPathSegment {
    readonly key: PropertyKey;
}

/** Issue reported by a Standard Schema validator. */
export interface StandardSchemaIssue {
    readonly message: string;
    readonly path?: ReadonlyArray<PropertyKey | StandardPathSegment> | undefined;
}

export type StandardSchemaResult<Output> =
    | { readonly value: Output; readonly issues?: undefined }
    | { readonly issues: ReadonlyArray<StandardSchemaIssue> };

/**
 * Standard Schema v1: the validator contract shared across vendors.
 */
export interface StandardSchemaV1<Input = unknown, Output = Input> {
    readonly '~standard': {
        readonly version: 1;
        readonly vendor: string;
        readonly validate: (value: unknown) =>
            | StandardSchemaResult<Output>
            | Promise<StandardSchemaResult<Output>>;
        readonly types?: { readonly input: Input; readonly output: Output } | undefined;
    };
}

/** Infer the output type from a Standard Schema. */
export type InferStandardOutput<T> = T extends StandardSchemaV1<unknown, infer O> ? O : never;

/** Duck-typed Zod schema (any release with `safeParse`). */
export interface ZodSchemaLike<T = unknown> {
    safeParse(value: unknown):
        | { success: true; data: T }
        | { success: false; error: { issues: ReadonlyArray<{ message: string; path?: ReadonlyArray<string | number> }> } };
}

/** Any schema accepted where fields are declared. */
export type FieldSchema<T> = StandardSchemaV1<unknown, T> | ZodSchemaLike<T>;

// ── Field Validator ──────────────────────────────────────

/** Issue with the path flattened to property keys. */
export interface ValidationIssue {
    readonly message: string;
    readonly path?: readonly PropertyKey[];
}

export type ValidationResult<T> =
    | { readonly success: true; readonly data: T }
    | { readonly success: false; readonly issues: readonly ValidationIssue[] };

/**
 * Uniform wrapper over whichever schema library declared the fields.
 */
export interface FieldValidator<T = unknown> {
    /** Run validation and return a result (never throws for invalid input) */
    validate(value: unknown): ValidationResult<T>;
    /** Vendor identifier (e.g. 'zod', 'valibot', 'arktype') */
    readonly vendor: string;
    /** Original schema reference (for introspection) */
    readonly schema: unknown;
}

// ── Adapters ─────────────────────────────────────────────

/**
 * Create a FieldValidator from a Standard Schema v1 compatible schema.
 *
 * @throws {Error} From `validate()` when the schema answers with a promise
 */
export function toStandardValidator<T>(
    schema: StandardSchemaV1<unknown, T>,
): FieldValidator<T> {
    const spec = schema['~standard'];

    return {
        validate(value: unknown): ValidationResult<T> {
            const result = spec.validate(value);

            if (isThenable(result)) {
                throw new Error(
                    `[taskline] Schema from "${spec.vendor}" validated asynchronously; field serializers must be synchronous.`,
                );
            }

            if (result.issues !== undefined) {
                return { success: false, issues: result.issues.map(normalizeIssue) };
            }

            return { success: true, data: result.value };
        },
        vendor: spec.vendor,
        schema,
    };
}

/**
 * Create a FieldValidator from a Zod schema through `.safeParse()`.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 *
 * const validator = fromZodSchema(z.object({ attempts: z.number().int() }));
 * validator.validate({ attempts: 3 });
 * // { success: true, data: { attempts: 3 } }
 * ```
 */
export function fromZodSchema<T>(schema: ZodSchemaLike<T>): FieldValidator<T> {
    return {
        validate(value: unknown): ValidationResult<T> {
            const result = schema.safeParse(value);

            if (result.success) {
                return { success: true, data: result.data };
            }

            const issues = result.error.issues.map((issue): ValidationIssue =>
                issue.path ? { message: issue.message, path: issue.path } : { message: issue.message },
            );

            return { success: false, issues };
        },
        vendor: 'zod',
        schema,
    };
}

/**
 * Check if a value implements the Standard Schema v1 spec.
 */
export function isStandardSchema(value: unknown): value is StandardSchemaV1 {
    if (!isObjectLike(value) || !('~standard' in value)) return false;
    const spec: unknown = value['~standard'];
    return typeof spec === 'object'
        && spec !== null
        && 'version' in spec
        && spec.version === 1
        && 'validate' in spec
        && typeof spec.validate === 'function';
}

/**
 * Auto-detect and create a FieldValidator from any supported schema.
 *
 * Detection order:
 * 1. Standard Schema v1 (Zod ≥ 3.24, Valibot, ArkType, …)
 * 2. Zod-like (has `.safeParse()`)
 * 3. Throws if unrecognized
 */
export function autoValidator<T>(schema: FieldSchema<T>): FieldValidator<T> {
    if (isStandardSchema(schema)) {
        return toStandardValidator(schema);
    }

    if (isZodLike(schema)) {
        return fromZodSchema(schema);
    }

    throw new Error(
        '[taskline] Unsupported schema type. Expected a Standard Schema v1 (Zod, Valibot, ArkType) or a Zod-like schema with safeParse().',
    );
}

/**
 * Turn a validator into a serializer.
 *
 * The validator sees the whole message (identification fields included);
 * its output is layered over the message, so fields the schema does not
 * declare pass through and fields it transforms are replaced.
 *
 * @param typeName - Used in the {@link FieldValidationError} message
 */
export function toFieldSerializer<T extends MessageFields>(
    typeName: string,
    validator: FieldValidator<T>,
): FieldSerializer {
    return (fields: MessageFields): MessageFields => {
        const result = validator.validate(fields);
        if (!result.success) {
            throw new FieldValidationError(typeName, result.issues);
        }
        return { ...fields, ...result.data };
    };
}

// ── Internal ─────────────────────────────────────────────

function normalizeIssue(issue: StandardSchemaIssue): ValidationIssue {
    if (!issue.path) return { message: issue.message };
    return {
        message: issue.message,
        path: issue.path.map(segment => (typeof segment === 'object' ? segment.key : segment)),
    };
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
    return typeof value === 'object'
        && value !== null
        && 'then' in value
        && typeof value.then === 'function';
}

function isZodLike(value: unknown): value is ZodSchemaLike {
    return isObjectLike(value)
        && 'safeParse' in value
        && typeof value.safeParse === 'function';
}

/** Objects and functions: some vendors (ArkType) build callable schemas. */
function isObjectLike(value: unknown): value is object {
    return (typeof value === 'object' && value !== null) || typeof value === 'function';
}
