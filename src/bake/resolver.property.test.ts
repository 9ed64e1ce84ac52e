/**
 * @file Resolver Property Tests
 *
 * Property-based invariant tests for the resolve pipeline.
 *
 * Invariants under test:
 *   1. An explicit override is the value seen by every reference,
 *      whatever the environment holds.
 *   2. Mappings merge key by key with the more specific layer winning.
 *   3. A declared sequence replaces the inherited one; an undeclared
 *      sequence is inherited unchanged.
 *   4. Re-declaring an effective target without inheritance and
 *      resolving it again yields the same effective target.
 *   5. Any inheritance graph either fails validation with a cycle or
 *      flattens every target.
 *   6. Group expansion lists each reachable target exactly once.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { resolveError_is } from './errors.js';
import { template_escape } from './expression/template.js';
import { groups_expand } from './groups/expand.js';
import { target_fromEffective } from './inheritance/flatten.js';
import { BakeResolver } from './resolver.js';
import type {
    DeclarationSet,
    EffectiveTarget,
    GroupDefinition,
    TargetAttributes,
    TargetDefinition,
    VariableDefinition,
} from './types.js';

// ─── Fixture Builders ────────────────────────────────────────────────────────

function declaration_make(
    targets: TargetDefinition[],
    groups: GroupDefinition[] = [],
    variables: VariableDefinition[] = [],
): DeclarationSet {
    return {
        variables,
        functions: [],
        targets: new Map(targets.map((t: TargetDefinition): [string, TargetDefinition] => [t.name, t])),
        groups: new Map(groups.map((g: GroupDefinition): [string, GroupDefinition] => [g.name, g])),
    };
}

function target_make(name: string, inherits: string[], attributes: TargetAttributes = {}): TargetDefinition {
    return { name, inherits, attributes };
}

function flatten_one(declaration: DeclarationSet, name: string): EffectiveTarget {
    return new BakeResolver(declaration).resolve([name]).targets[0];
}

/** Escape every value so that evaluation yields the raw text back. */
function record_escape(record: Record<string, string>): Record<string, string> {
    return Object.fromEntries(Object.entries(record).map(([k, v]): [string, string] => [k, template_escape(v)]));
}

// ─── Arbitraries ──────────────────────────────────────────────────────────────

const text = fc.string({ maxLength: 12 });

const mapping = fc.dictionary(fc.constantFrom('A', 'B', 'C', 'D'), text, { maxKeys: 4 });

const sequence = fc.array(text, { maxLength: 4 });

/** Inheritance lists for targets t0..t(n-1), edges chosen freely. */
const inheritanceGraph = fc.integer({ min: 1, max: 6 }).chain((n: number) =>
    fc.array(
        fc.uniqueArray(fc.integer({ min: 0, max: n - 1 }), { maxLength: 3 }),
        { minLength: n, maxLength: n },
    ),
);

/** Groups g0..g3; group gi may contain targets and groups gj with j < i. */
const TARGET_NAMES: string[] = ['t0', 't1', 't2', 't3', 't4'];
const groupMembers = fc.tuple(
    fc.array(fc.constantFrom(...TARGET_NAMES), { maxLength: 5 }),
    fc.array(fc.constantFrom(...TARGET_NAMES, 'g0'), { maxLength: 5 }),
    fc.array(fc.constantFrom(...TARGET_NAMES, 'g0', 'g1'), { maxLength: 5 }),
    fc.array(fc.constantFrom(...TARGET_NAMES, 'g0', 'g1', 'g2'), { maxLength: 5 }),
);

// ─── Properties ──────────────────────────────────────────────────────────────

describe('BakeResolver — property invariants', (): void => {
    it('an explicit override beats the environment and the default', (): void => {
        const declaration: DeclarationSet = declaration_make(
            [target_make('app', [], { labels: { rev: '${GIT_REV}' }, tags: ['app:${GIT_REV}'] })],
            [],
            [{ name: 'GIT_REV', defaultValue: 'latest' }],
        );
        fc.assert(fc.property(text, text, (explicit: string, fromEnv: string): boolean => {
            const resolver = new BakeResolver(declaration, { environment: { GIT_REV: fromEnv } });
            const overridden: EffectiveTarget = resolver.resolve(['app'], { GIT_REV: explicit }).targets[0];
            const environmental: EffectiveTarget = resolver.resolve(['app']).targets[0];
            return overridden.labels.rev === explicit
                && overridden.tags[0] === `app:${explicit}`
                && environmental.labels.rev === fromEnv;
        }));
    });

    it('mappings merge key by key, the child winning', (): void => {
        fc.assert(fc.property(mapping, mapping, (base: Record<string, string>, child: Record<string, string>): boolean => {
            const effective: EffectiveTarget = flatten_one(declaration_make([
                target_make('base', [], { args: record_escape(base) }),
                target_make('child', ['base'], { args: record_escape(child) }),
            ]), 'child');
            const expected: Record<string, string> = { ...base, ...child };
            return Object.keys(expected).length === Object.keys(effective.args).length
                && Object.entries(expected).every(([k, v]): boolean => effective.args[k] === v);
        }));
    });

    it('a declared sequence replaces the inherited one', (): void => {
        fc.assert(fc.property(sequence, fc.option(sequence, { nil: undefined }), (base: string[], child: string[] | undefined): boolean => {
            const childAttributes: TargetAttributes = child === undefined ? {} : { tags: child.map(template_escape) };
            const effective: EffectiveTarget = flatten_one(declaration_make([
                target_make('base', [], { tags: base.map(template_escape) }),
                target_make('child', ['base'], childAttributes),
            ]), 'child');
            const expected: string[] = child ?? base;
            return effective.tags.length === expected.length
                && effective.tags.every((tag: string, i: number): boolean => tag === expected[i]);
        }));
    });

    it('re-declaring an effective target is idempotent', (): void => {
        fc.assert(fc.property(mapping, sequence, text, (labels: Record<string, string>, tags: string[], context: string): boolean => {
            const once: EffectiveTarget = flatten_one(declaration_make([
                target_make('base', [], { labels: record_escape(labels), context: template_escape(context) }),
                target_make('app', ['base'], { tags: tags.map(template_escape), target: 'stage' }),
            ]), 'app');
            const twice: EffectiveTarget = flatten_one(declaration_make([target_fromEffective(once)]), 'app');
            return JSON.stringify(twice) === JSON.stringify(once);
        }));
    });

    it('every inheritance graph is rejected as cyclic or fully flattened', (): void => {
        fc.assert(fc.property(inheritanceGraph, (edges: number[][]): boolean => {
            const names: string[] = edges.map((_: number[], i: number): string => `t${i}`);
            const declaration: DeclarationSet = declaration_make(
                edges.map((bases: number[], i: number): TargetDefinition =>
                    target_make(names[i], bases.map((b: number): string => `t${b}`), { args: { [`K${i}`]: `${i}` } })),
            );

            let resolver: BakeResolver;
            try {
                resolver = new BakeResolver(declaration);
            } catch (err: unknown) {
                return resolveError_is(err, 'CyclicInheritance');
            }
            return resolver.resolve(names).targets.length === names.length;
        }));
    });

    it('group expansion lists each reachable target exactly once', (): void => {
        fc.assert(fc.property(groupMembers, (members: [string[], string[], string[], string[]]): boolean => {
            const groups: GroupDefinition[] = members.map((targets: string[], i: number): GroupDefinition => ({ name: `g${i}`, targets }));
            const declaration: DeclarationSet = declaration_make(
                TARGET_NAMES.map((name: string): TargetDefinition => target_make(name, [])),
                groups,
            );

            const reachable = new Set<string>();
            const walk = (name: string): void => {
                const group: GroupDefinition | undefined = declaration.groups.get(name);
                if (!group) {
                    reachable.add(name);
                    return;
                }
                group.targets.forEach(walk);
            };
            walk('g3');

            const expanded: string[] = groups_expand(['g3'], declaration);
            return expanded.length === reachable.size
                && new Set(expanded).size === expanded.length
                && expanded.every((name: string): boolean => reachable.has(name));
        }));
    });
});
