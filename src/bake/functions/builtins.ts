/**
 * @file Built-in Functions
 *
 * Small standard library available to every declaration. User
 * functions cannot reuse these names.
 *
 * @module bake/functions
 */

import { ResolveError } from '../errors.js';
import type { Value } from '../types.js';

export interface BuiltinFunction {
    name: string;
    /** Exact argument count, or 'variadic' for any count. */
    arity: number | 'variadic';
    apply(args: readonly Value[]): Value;
}

function string_require(fn: string, position: number, value: Value): string {
    if (typeof value !== 'string') {
        throw new ResolveError(
            'ShapeMismatch',
            fn,
            `argument ${position + 1} of '${fn}' must be a string, got a list of ${value.length}`,
        );
    }
    return value;
}

function list_coerce(value: Value): readonly string[] {
    return typeof value === 'string' ? [value] : value;
}

export const BUILTIN_FUNCTIONS: readonly BuiltinFunction[] = [
    {
        name: 'upper',
        arity: 1,
        apply: (args: readonly Value[]): Value => string_require('upper', 0, args[0]).toUpperCase(),
    },
    {
        name: 'lower',
        arity: 1,
        apply: (args: readonly Value[]): Value => string_require('lower', 0, args[0]).toLowerCase(),
    },
    {
        name: 'join',
        arity: 2,
        apply: (args: readonly Value[]): Value => list_coerce(args[1]).join(string_require('join', 0, args[0])),
    },
    {
        name: 'concat',
        arity: 'variadic',
        apply: (args: readonly Value[]): Value => args.flatMap((arg: Value): string[] => [...list_coerce(arg)]),
    },
];
