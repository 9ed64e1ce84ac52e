/**
 * @file Resolver Errors
 *
 * Error taxonomy for declaration parsing and plan resolution. Every
 * error is fatal to the resolve call; there is no partial plan.
 *
 * @module bake
 */

// ─── Base ────────────────────────────────────────────────────────

export class BakeError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'BakeError';
    }
}

/**
 * The declaration document is not valid YAML/JSON or does not match
 * the declaration schema.
 */
export class DeclarationError extends BakeError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'DeclarationError';
    }
}

// ─── Resolve Errors ──────────────────────────────────────────────

export const RESOLVE_ERROR_CODES = [
    'DuplicateVariable',
    'UndeclaredVariable',
    'UnresolvedReference',
    'DuplicateFunction',
    'DuplicateParameter',
    'RecursiveFunction',
    'ArityMismatch',
    'CyclicInheritance',
    'UnknownBaseTarget',
    'CyclicGroup',
    'UnknownTarget',
    'UnknownGroup',
    'DuplicateTarget',
    'DuplicateGroup',
    'CyclicVariable',
    'ExpressionSyntax',
    'ShapeMismatch',
] as const;

export type ResolveErrorCode = (typeof RESOLVE_ERROR_CODES)[number];

/**
 * A semantic failure while building the stores, validating the graph
 * or flattening targets.
 *
 * @property code - Taxonomy entry
 * @property subject - Offending variable, function, target or group name
 */
export class ResolveError extends BakeError {
    public readonly code: ResolveErrorCode;
    public readonly subject: string;

    constructor(code: ResolveErrorCode, subject: string, message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'ResolveError';
        this.code = code;
        this.subject = subject;
    }
}

/**
 * Type guard for ResolveError, optionally narrowed to one code.
 */
export function resolveError_is(error: unknown, code?: ResolveErrorCode): error is ResolveError {
    if (!(error instanceof ResolveError)) return false;
    return code === undefined || error.code === code;
}

/**
 * Render an error as the single line reported to the user.
 *
 * @example
 * error_format(new ResolveError('UndeclaredVariable', 'TAG', "variable 'TAG' is not declared"))
 * // => "UndeclaredVariable (TAG): variable 'TAG' is not declared"
 */
export function error_format(error: unknown): string {
    if (error instanceof ResolveError) {
        return `${error.code} (${error.subject}): ${error.message}`;
    }
    if (error instanceof DeclarationError) {
        return `InvalidDeclaration: ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
