/**
 * FieldValidationError — Schema Rejections With the Type Name Attached
 *
 * Thrown by schema-backed serializers. Names WHICH action or message type
 * was rejected and WHAT fields were wrong:
 *
 * ```
 * [app:checkout (start)] Validation failed:
 *   • 'cart': Expected string, received number
 * ```
 *
 * @example
 * ```typescript
 * try {
 *     Checkout.start(logger, { cart: 42 });
 * } catch (e) {
 *     if (e instanceof FieldValidationError) {
 *         console.log(e.typeName); // "app:checkout (start)"
 *         console.log(e.issues);   // [{ message: '...', path: ['cart'] }]
 *     }
 * }
 * ```
 *
 * @module
 */
import type { ValidationIssue } from './StandardSchema.js';

export class FieldValidationError extends Error {
    /** Action or message type (and phase) whose fields were rejected */
    readonly typeName: string;
    readonly issues: readonly ValidationIssue[];

    constructor(typeName: string, issues: readonly ValidationIssue[]) {
        const fieldErrors = issues
            .map(issue => {
                const path = issue.path && issue.path.length > 0
                    ? `'${issue.path.map(String).join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`[${typeName}] Validation failed:\n${fieldErrors}`);
        this.name = 'FieldValidationError';
        this.typeName = typeName;
        this.issues = issues;
    }
}
