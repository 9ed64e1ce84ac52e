import { describe, it, expect } from 'vitest';
import { BakeError, ResolveError } from '../errors.js';
import { FunctionRegistry } from '../functions/FunctionRegistry.js';
import type { FunctionDefinition, VariableDefinition } from '../types.js';
import { VariableStore } from '../variables/VariableStore.js';
import { ExpressionEvaluator } from './evaluator.js';

const FUNCTIONS: FunctionDefinition[] = [
    { name: 'tag', params: ['name'], result: { shape: 'scalar', template: 'ghcr.io/example/${name}:${GIT_REV}' } },
    { name: 'tags', params: ['name'], result: { shape: 'sequence', templates: ['${name}:a', '${name}:b'] } },
    { name: 'echo', params: ['GIT_REV'], result: { shape: 'scalar', template: '${GIT_REV}' } },
];

function evaluator_make(
    variables: VariableDefinition[],
    overrides: Record<string, string> = {},
): ExpressionEvaluator {
    const store: VariableStore = VariableStore.definitions_load(variables);
    for (const [name, value] of Object.entries(overrides)) {
        store.override(name, value);
    }
    store.seal();
    return new ExpressionEvaluator(store, FunctionRegistry.definitions_load(FUNCTIONS));
}

function resolveError_capture(fn: () => unknown): ResolveError {
    try {
        fn();
    } catch (err: unknown) {
        if (err instanceof ResolveError) return err;
        throw err;
    }
    throw new Error('expected a ResolveError');
}

describe('ExpressionEvaluator', (): void => {
    it('requires a sealed variable store', (): void => {
        expect((): ExpressionEvaluator => new ExpressionEvaluator(new VariableStore(), new FunctionRegistry()))
            .toThrow(BakeError);
    });

    it('substitutes overrides, defaults and unset variables', (): void => {
        const evaluator = evaluator_make(
            [
                { name: 'GIT_REV', defaultValue: 'latest' },
                { name: 'REGISTRY', defaultValue: 'ghcr.io' },
                { name: 'SUFFIX', defaultValue: null },
            ],
            { GIT_REV: 'abc123' },
        );
        expect(evaluator.template_evaluate('${REGISTRY}/app:${GIT_REV}${SUFFIX}')).toBe('ghcr.io/app:abc123');
    });

    it('calls user functions and built-ins', (): void => {
        const evaluator = evaluator_make([{ name: 'GIT_REV', defaultValue: 'abc123' }]);
        expect(evaluator.template_evaluate('${tag("validator")}')).toBe('ghcr.io/example/validator:abc123');
        expect(evaluator.template_evaluate('${upper(tag("faucet"))}')).toBe('GHCR.IO/EXAMPLE/FAUCET:ABC123');
        expect(evaluator.template_evaluate('${join(",", tags("x"))}')).toBe('x:a,x:b');
    });

    it('lets parameters shadow variables of the same name', (): void => {
        const evaluator = evaluator_make([{ name: 'GIT_REV', defaultValue: 'from-variable' }]);
        expect(evaluator.template_evaluate('${echo("from-argument")}')).toBe('from-argument');
        expect(evaluator.template_evaluate('${GIT_REV}')).toBe('from-variable');
    });

    it('evaluates defaults as templates and overrides as literals', (): void => {
        const variables: VariableDefinition[] = [
            { name: 'BASE', defaultValue: 'base' },
            { name: 'IMAGE', defaultValue: '${BASE}-image' },
            { name: 'RAW', defaultValue: null },
        ];
        const evaluator = evaluator_make(variables, { RAW: '${BASE}' });
        expect(evaluator.template_evaluate('${IMAGE}')).toBe('base-image');
        expect(evaluator.template_evaluate('${RAW}')).toBe('${BASE}');
    });

    it('keeps text written as $${ literal', (): void => {
        const evaluator = evaluator_make([{ name: 'HOME', defaultValue: '/root' }]);
        expect(evaluator.template_evaluate('$${HOME} is ${HOME}')).toBe('${HOME} is /root');
    });

    it('reports variables whose defaults refer back to themselves', (): void => {
        const evaluator = evaluator_make([
            { name: 'A', defaultValue: '${B}' },
            { name: 'B', defaultValue: 'x-${A}' },
        ]);
        const err: ResolveError = resolveError_capture((): string => evaluator.template_evaluate('${A}'));
        expect(err.code).toBe('CyclicVariable');
        expect(err.message).toBe("variable 'A' refers back to itself: A -> B -> A");
    });

    it('reports unresolved references', (): void => {
        const evaluator = evaluator_make([]);
        const err: ResolveError = resolveError_capture((): string => evaluator.template_evaluate('${NOPE}'));
        expect(err.code).toBe('UnresolvedReference');
        expect(err.subject).toBe('NOPE');
        expect(err.message).toBe("'NOPE' is neither a parameter in scope nor a declared variable");
    });

    it('keeps the shape of a lone placeholder', (): void => {
        const evaluator = evaluator_make([]);
        expect(evaluator.template_evaluateValue('${tags("x")}')).toEqual(['x:a', 'x:b']);
        expect(evaluator.template_evaluateValue('plain')).toBe('plain');
    });

    it('rejects a list where a string is required', (): void => {
        const evaluator = evaluator_make([]);

        const embedded: ResolveError = resolveError_capture((): string => evaluator.template_evaluate('v-${tags("x")}'));
        expect(embedded.code).toBe('ShapeMismatch');
        expect(embedded.message).toBe("'tags' yields a list of 2 where a single string is required");

        const argument: ResolveError = resolveError_capture((): string => evaluator.template_evaluate('${upper(tags("x"))}'));
        expect(argument.message).toBe("argument 1 of 'upper' must be a string, got a list of 2");
    });
});
