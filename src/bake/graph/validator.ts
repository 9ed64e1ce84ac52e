/**
 * @file Declaration Graph Validator
 *
 * Validates the target and group graphs for structural correctness
 * before anything is flattened: unknown bases, unknown group members,
 * inheritance cycles and group cycles. Also checks that no function
 * reaches itself through the defaults of the variables it references.
 *
 * Uses depth-first search with a visiting/done colouring so every
 * cycle is reported with its path and the walk always terminates.
 *
 * @module bake/graph
 */

import { ResolveError } from '../errors.js';
import { template_parse, templateCalls_collect, templateRefs_collect } from '../expression/template.js';
import type { DeclarationSet, FunctionDefinition, ValidationResult } from '../types.js';

type Colour = 'visiting' | 'done';

/** Node of the function/variable dependency graph. */
interface DependencyNode {
    kind: 'function' | 'variable';
    name: string;
}

/**
 * Validate a DeclarationSet.
 *
 * Targets are checked in declaration order, then groups. Errors are
 * collected in discovery order; the resolver surfaces the first one.
 */
export function declaration_validate(declaration: DeclarationSet): ValidationResult<ResolveError> {
    const errors: ResolveError[] = [
        ...inheritance_check(declaration),
        ...groups_check(declaration),
        ...recursion_check(declaration),
    ];
    return { valid: errors.length === 0, errors };
}

/**
 * Unknown bases and inheritance cycles.
 */
function inheritance_check(declaration: DeclarationSet): ResolveError[] {
    const errors: ResolveError[] = [];
    const colour = new Map<string, Colour>();

    const visit = (name: string, path: string[]): void => {
        const state: Colour | undefined = colour.get(name);
        if (state === 'done') return;
        if (state === 'visiting') {
            const cycle: string[] = [...path.slice(path.indexOf(name)), name];
            errors.push(new ResolveError(
                'CyclicInheritance',
                name,
                `target '${name}' inherits from itself: ${cycle.join(' -> ')}`,
            ));
            return;
        }

        colour.set(name, 'visiting');
        const definition = declaration.targets.get(name);
        for (const base of definition?.inherits ?? []) {
            if (!declaration.targets.has(base)) {
                errors.push(new ResolveError(
                    'UnknownBaseTarget',
                    base,
                    `target '${name}' inherits from unknown target '${base}'`,
                ));
                continue;
            }
            visit(base, [...path, name]);
        }
        colour.set(name, 'done');
    };

    for (const name of declaration.targets.keys()) {
        visit(name, []);
    }
    return errors;
}

/**
 * Unknown members and group cycles. A member name resolves to a target
 * first and to a group second.
 */
function groups_check(declaration: DeclarationSet): ResolveError[] {
    const errors: ResolveError[] = [];
    const colour = new Map<string, Colour>();

    const visit = (name: string, path: string[]): void => {
        const state: Colour | undefined = colour.get(name);
        if (state === 'done') return;
        if (state === 'visiting') {
            const cycle: string[] = [...path.slice(path.indexOf(name)), name];
            errors.push(new ResolveError(
                'CyclicGroup',
                name,
                `group '${name}' contains itself: ${cycle.join(' -> ')}`,
            ));
            return;
        }

        colour.set(name, 'visiting');
        const group = declaration.groups.get(name);
        for (const member of group?.targets ?? []) {
            if (declaration.targets.has(member)) continue;
            if (!declaration.groups.has(member)) {
                errors.push(new ResolveError(
                    'UnknownTarget',
                    member,
                    `group '${name}' references unknown target '${member}'`,
                ));
                continue;
            }
            visit(member, [...path, name]);
        }
        colour.set(name, 'done');
    };

    for (const name of declaration.groups.keys()) {
        visit(name, []);
    }
    return errors;
}

/**
 * Function recursion through variable defaults. Edges run from a
 * function to the functions it calls and the variables it references
 * (parameters excluded), and from a variable to whatever its default
 * calls or references. A function that reaches itself is recursive.
 * Direct function-to-function cycles are already rejected by the
 * registry; this walk also covers them when run on its own.
 */
function recursion_check(declaration: DeclarationSet): ResolveError[] {
    const errors: ResolveError[] = [];
    const functions = new Map<string, FunctionDefinition>(
        declaration.functions.map((f: FunctionDefinition): [string, FunctionDefinition] => [f.name, f]),
    );
    const variables = new Map<string, string | null>(
        declaration.variables.map((v): [string, string | null] => [v.name, v.defaultValue]),
    );

    const edges = new Map<string, DependencyNode[]>();
    const key_of = (node: DependencyNode): string => `${node.kind}:${node.name}`;

    const templates_scan = (sources: readonly string[], params: readonly string[]): DependencyNode[] => {
        const out: DependencyNode[] = [];
        for (const source of sources) {
            let calls: Set<string>;
            let refs: Set<string>;
            try {
                const template = template_parse(source);
                calls = templateCalls_collect(template);
                refs = templateRefs_collect(template);
            } catch (err: unknown) {
                if (err instanceof ResolveError) {
                    errors.push(err);
                    continue;
                }
                throw err;
            }
            for (const callee of calls) {
                if (functions.has(callee)) out.push({ kind: 'function', name: callee });
            }
            for (const ref of refs) {
                if (!params.includes(ref) && variables.has(ref)) out.push({ kind: 'variable', name: ref });
            }
        }
        return out;
    };

    for (const definition of declaration.functions) {
        const sources: readonly string[] = definition.result.shape === 'scalar'
            ? [definition.result.template]
            : definition.result.templates;
        edges.set(key_of({ kind: 'function', name: definition.name }), templates_scan(sources, definition.params));
    }
    for (const [name, defaultValue] of variables) {
        edges.set(
            key_of({ kind: 'variable', name }),
            defaultValue === null ? [] : templates_scan([defaultValue], []),
        );
    }

    const reported = new Set<string>();
    for (const definition of declaration.functions) {
        if (reported.has(definition.name)) continue;
        const start: DependencyNode = { kind: 'function', name: definition.name };
        const visited = new Set<string>();

        const walk = (node: DependencyNode, path: DependencyNode[]): DependencyNode[] | null => {
            for (const next of edges.get(key_of(node)) ?? []) {
                if (key_of(next) === key_of(start)) return [...path, next];
                if (visited.has(key_of(next))) continue;
                visited.add(key_of(next));
                const found: DependencyNode[] | null = walk(next, [...path, next]);
                if (found) return found;
            }
            return null;
        };

        const cycle: DependencyNode[] | null = walk(start, [start]);
        if (!cycle) continue;
        for (const node of cycle) {
            if (node.kind === 'function') reported.add(node.name);
        }
        errors.push(new ResolveError(
            'RecursiveFunction',
            definition.name,
            `function '${definition.name}' calls itself: ${cycle.map((n: DependencyNode): string => n.name).join(' -> ')}`,
        ));
    }
    return errors;
}
