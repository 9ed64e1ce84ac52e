/**
 * @file Expression Evaluator
 *
 * Evaluates templates against a sealed VariableStore and a
 * FunctionRegistry. Placeholders are resolved left to right; call
 * arguments are evaluated before the call. Parameter bindings shadow
 * variables of the same name.
 *
 * Variable defaults are themselves templates and are evaluated on
 * first reference (with no parameter bindings in scope). Override
 * values are literal.
 *
 * @module bake/expression
 */

import { BakeError, ResolveError } from '../errors.js';
import type { FunctionRegistry, TemplateEvaluator } from '../functions/FunctionRegistry.js';
import type { Value } from '../types.js';
import type { ResolvedVariable, VariableStore } from '../variables/VariableStore.js';
import { template_parse, template_soleExpr, type Expr, type Template, type TemplatePart } from './template.js';

const NO_BINDINGS: ReadonlyMap<string, Value> = new Map();

export class ExpressionEvaluator implements TemplateEvaluator {
    private readonly templates: Map<string, Template> = new Map();
    private readonly variableValues: Map<string, string> = new Map();
    /** Variables whose defaults are being evaluated, outermost first. */
    private readonly variableTrail: string[] = [];

    constructor(
        private readonly variables: VariableStore,
        private readonly functions: FunctionRegistry,
    ) {
        if (!variables.isSealed()) {
            throw new BakeError('expression evaluator requires a sealed variable store');
        }
    }

    /**
     * Evaluate a template where a single string is required.
     *
     * @throws ResolveError `ShapeMismatch` if a placeholder yields a list
     */
    public template_evaluate(source: string, bindings: ReadonlyMap<string, Value> = NO_BINDINGS): string {
        return this.parts_evaluate(this.template_get(source).parts, bindings);
    }

    /**
     * Evaluate a template, keeping the shape of a lone placeholder: a
     * template that is exactly `${expr}` yields whatever `expr` yields.
     */
    public template_evaluateValue(source: string, bindings: ReadonlyMap<string, Value> = NO_BINDINGS): Value {
        const template: Template = this.template_get(source);
        const sole: Expr | null = template_soleExpr(template);
        if (sole) return this.expr_evaluate(sole, bindings);
        return this.parts_evaluate(template.parts, bindings);
    }

    private parts_evaluate(parts: readonly TemplatePart[], bindings: ReadonlyMap<string, Value>): string {
        let out: string = '';
        for (const part of parts) {
            if (part.kind === 'text') {
                out += part.text;
            } else {
                out += value_toString(this.expr_evaluate(part.expr, bindings), part.expr);
            }
        }
        return out;
    }

    private expr_evaluate(expr: Expr, bindings: ReadonlyMap<string, Value>): Value {
        switch (expr.kind) {
            case 'literal':
                return this.parts_evaluate(expr.parts, bindings);
            case 'call': {
                const args: Value[] = expr.args.map((arg: Expr): Value => this.expr_evaluate(arg, bindings));
                return this.functions.invoke(expr.name, args, this);
            }
            case 'ref': {
                const bound: Value | undefined = bindings.get(expr.name);
                if (bound !== undefined) return bound;
                if (this.variables.has(expr.name)) return this.variable_evaluate(expr.name);
                throw new ResolveError(
                    'UnresolvedReference',
                    expr.name,
                    `'${expr.name}' is neither a parameter in scope nor a declared variable`,
                );
            }
        }
    }

    private variable_evaluate(name: string): string {
        const cached: string | undefined = this.variableValues.get(name);
        if (cached !== undefined) return cached;

        if (this.variableTrail.includes(name)) {
            const cycle: string[] = [...this.variableTrail.slice(this.variableTrail.indexOf(name)), name];
            throw new ResolveError(
                'CyclicVariable',
                name,
                `variable '${name}' refers back to itself: ${cycle.join(' -> ')}`,
            );
        }

        const resolved: ResolvedVariable = this.variables.variable_resolve(name);
        if (resolved.source !== 'default') {
            this.variableValues.set(name, resolved.value);
            return resolved.value;
        }

        this.variableTrail.push(name);
        try {
            const value: string = this.template_evaluate(resolved.value);
            this.variableValues.set(name, value);
            return value;
        } finally {
            this.variableTrail.pop();
        }
    }

    private template_get(source: string): Template {
        let template: Template | undefined = this.templates.get(source);
        if (!template) {
            template = template_parse(source);
            this.templates.set(source, template);
        }
        return template;
    }
}

function value_toString(value: Value, expr: Expr): string {
    if (typeof value === 'string') return value;
    const label: string = expr.kind === 'literal' ? 'string literal' : `'${expr.name}'`;
    throw new ResolveError(
        'ShapeMismatch',
        expr.kind === 'literal' ? '' : expr.name,
        `${label} yields a list of ${value.length} where a single string is required`,
    );
}
