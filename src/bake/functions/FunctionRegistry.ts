/**
 * @file Function Registry
 *
 * User-defined functions with positional parameters and one templated
 * result, next to the built-ins. Recursion is rejected when a function
 * is defined: every definition walks its own call graph through the
 * functions defined so far, so the last-defined member of any cycle
 * fails and no evaluation can recurse.
 *
 * @module bake/functions
 */

import { BakeError, ResolveError } from '../errors.js';
import { template_parse, templateCalls_collect } from '../expression/template.js';
import type { FunctionDefinition, FunctionResult, Value } from '../types.js';
import { BUILTIN_FUNCTIONS, type BuiltinFunction } from './builtins.js';

/**
 * Evaluation surface the registry needs to expand a user function.
 * Implemented by ExpressionEvaluator; kept as an interface so the two
 * modules do not import each other.
 */
export interface TemplateEvaluator {
    template_evaluate(source: string, bindings: ReadonlyMap<string, Value>): string;
    template_evaluateValue(source: string, bindings: ReadonlyMap<string, Value>): Value;
}

type RegisteredFunction =
    | { kind: 'user'; definition: FunctionDefinition; calls: ReadonlySet<string> }
    | { kind: 'builtin'; builtin: BuiltinFunction };

export class FunctionRegistry {
    private readonly entries: Map<string, RegisteredFunction> = new Map();
    private sealed: boolean = false;

    constructor(builtins: readonly BuiltinFunction[] = BUILTIN_FUNCTIONS) {
        for (const builtin of builtins) {
            this.entries.set(builtin.name, { kind: 'builtin', builtin });
        }
    }

    /**
     * Build a registry from declarations, in order, and seal it.
     *
     * @throws ResolveError `DuplicateFunction`, `DuplicateParameter`,
     *   `RecursiveFunction`, `ExpressionSyntax`
     */
    public static definitions_load(definitions: readonly FunctionDefinition[]): FunctionRegistry {
        const registry = new FunctionRegistry();
        for (const definition of definitions) {
            registry.define(definition.name, definition.params, definition.result);
        }
        return registry.seal();
    }

    public define(name: string, params: readonly string[], result: FunctionResult): void {
        if (this.sealed) {
            throw new BakeError('function registry is sealed');
        }
        if (this.entries.has(name)) {
            const existing: RegisteredFunction | undefined = this.entries.get(name);
            const what: string = existing?.kind === 'builtin' ? 'a built-in function' : 'already defined';
            throw new ResolveError('DuplicateFunction', name, `function '${name}' is ${what}`);
        }
        if (new Set(params).size !== params.length) {
            throw new ResolveError(
                'DuplicateParameter',
                name,
                `function '${name}' declares a parameter twice: ${params.join(', ')}`,
            );
        }

        const templates: readonly string[] = result.shape === 'scalar' ? [result.template] : result.templates;
        const calls = new Set<string>();
        for (const source of templates) {
            for (const callee of templateCalls_collect(template_parse(source))) {
                calls.add(callee);
            }
        }

        const cycle: string[] | null = this.recursion_find(name, calls);
        if (cycle) {
            throw new ResolveError(
                'RecursiveFunction',
                name,
                `function '${name}' calls itself: ${cycle.join(' -> ')}`,
            );
        }

        this.entries.set(name, {
            kind: 'user',
            definition: { name, params: [...params], result },
            calls,
        });
    }

    public has(name: string): boolean {
        return this.entries.has(name);
    }

    public names(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Bind `args` to the parameters and evaluate the result.
     *
     * @throws ResolveError `UnresolvedReference` for an unknown function,
     *   `ArityMismatch` when the argument count differs
     */
    public invoke(name: string, args: readonly Value[], evaluator: TemplateEvaluator): Value {
        const entry: RegisteredFunction | undefined = this.entries.get(name);
        if (!entry) {
            throw new ResolveError('UnresolvedReference', name, `function '${name}' is not defined`);
        }

        if (entry.kind === 'builtin') {
            const { arity } = entry.builtin;
            if (arity !== 'variadic' && arity !== args.length) {
                throw arity_error(name, arity, args.length);
            }
            return entry.builtin.apply(args);
        }

        const { params, result } = entry.definition;
        if (params.length !== args.length) {
            throw arity_error(name, params.length, args.length);
        }

        const bindings = new Map<string, Value>();
        params.forEach((param: string, i: number): void => {
            bindings.set(param, args[i]);
        });

        if (result.shape === 'scalar') {
            return evaluator.template_evaluate(result.template, bindings);
        }
        return result.templates.flatMap((source: string): string[] => {
            const value: Value = evaluator.template_evaluateValue(source, bindings);
            return typeof value === 'string' ? [value] : [...value];
        });
    }

    public seal(): this {
        this.sealed = true;
        return this;
    }

    /**
     * Find a call path from `name`'s direct callees back to `name`
     * through the user functions defined so far.
     */
    private recursion_find(name: string, calls: ReadonlySet<string>): string[] | null {
        const visited = new Set<string>();

        const walk = (current: string, path: string[]): string[] | null => {
            if (current === name) return path;
            if (visited.has(current)) return null;
            visited.add(current);

            const entry: RegisteredFunction | undefined = this.entries.get(current);
            if (!entry || entry.kind !== 'user') return null;

            for (const next of entry.calls) {
                const found: string[] | null = walk(next, [...path, next]);
                if (found) return found;
            }
            return null;
        };

        for (const callee of calls) {
            const found: string[] | null = walk(callee, [name, callee]);
            if (found) return found;
        }
        return null;
    }
}

function arity_error(name: string, expected: number, actual: number): ResolveError {
    return new ResolveError(
        'ArityMismatch',
        name,
        `function '${name}' expects ${expected} argument(s), got ${actual}`,
    );
}
