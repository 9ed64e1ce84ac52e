/**
 * @file Inheritance Resolver
 *
 * Flattens a target's `inherits` chain into one effective attribute
 * set, then evaluates every string through the expression evaluator.
 *
 * Bases are applied in declared order, each one flattened first, and
 * the target's own attributes last. Raw flattening is memoized per
 * target; evaluation happens once per requested target.
 *
 * @module bake/inheritance
 */

import { ResolveError } from '../errors.js';
import type { ExpressionEvaluator } from '../expression/evaluator.js';
import { template_escape } from '../expression/template.js';
import type { EffectiveTarget, TargetAttributes, TargetDefinition, Value } from '../types.js';
import { attributes_merge } from './policy.js';

export const DEFAULT_DOCKERFILE: string = 'Dockerfile';
export const DEFAULT_CONTEXT: string = '.';

export class InheritanceResolver {
    private readonly merged: Map<string, TargetAttributes> = new Map();

    constructor(
        private readonly targets: ReadonlyMap<string, TargetDefinition>,
        private readonly evaluator: ExpressionEvaluator,
    ) {}

    /**
     * Resolve a target into its frozen EffectiveTarget.
     *
     * @throws ResolveError `UnknownTarget`, `UnknownBaseTarget`,
     *   `CyclicInheritance`, or any evaluation error (with the target
     *   and attribute named in the message)
     */
    public flatten(name: string): EffectiveTarget {
        if (!this.targets.has(name)) {
            throw new ResolveError('UnknownTarget', name, `target '${name}' is not declared`);
        }
        const attributes: TargetAttributes = this.attributes_flatten(name, []);
        return effectiveTarget_freeze(this.attributes_evaluate(name, attributes));
    }

    /**
     * Merge the raw (unevaluated) attributes of a target's whole chain.
     */
    public attributes_flatten(name: string, trail: readonly string[]): TargetAttributes {
        const cached: TargetAttributes | undefined = this.merged.get(name);
        if (cached) return cached;

        if (trail.includes(name)) {
            const cycle: string[] = [...trail.slice(trail.indexOf(name)), name];
            throw new ResolveError(
                'CyclicInheritance',
                name,
                `target '${name}' inherits from itself: ${cycle.join(' -> ')}`,
            );
        }

        const definition: TargetDefinition | undefined = this.targets.get(name);
        if (!definition) {
            const child: string = trail.length > 0 ? trail[trail.length - 1] : name;
            throw new ResolveError('UnknownBaseTarget', name, `target '${child}' inherits from unknown target '${name}'`);
        }

        let attributes: TargetAttributes = {};
        for (const base of definition.inherits) {
            attributes = attributes_merge(attributes, this.attributes_flatten(base, [...trail, name]));
        }
        attributes = attributes_merge(attributes, definition.attributes);

        this.merged.set(name, attributes);
        return attributes;
    }

    private attributes_evaluate(name: string, attributes: TargetAttributes): EffectiveTarget {
        const scalar = (attribute: string, source: string): string =>
            this.attribute_guard(name, attribute, (): string => this.evaluator.template_evaluate(source));

        const mapping = (attribute: string, source: Readonly<Record<string, string>> | undefined): Record<string, string> =>
            Object.fromEntries(
                Object.entries(source ?? {}).map(([key, value]): [string, string] => [key, scalar(`${attribute}.${key}`, value)]),
            );

        const sequence = (attribute: string, source: readonly string[] | undefined): string[] =>
            (source ?? []).flatMap((element: string, i: number): string[] => {
                const value: Value = this.attribute_guard(
                    name,
                    `${attribute}[${i}]`,
                    (): Value => this.evaluator.template_evaluateValue(element),
                );
                return typeof value === 'string' ? [value] : [...value];
            });

        return {
            name,
            dockerfile: scalar('dockerfile', attributes.dockerfile ?? DEFAULT_DOCKERFILE),
            context: scalar('context', attributes.context ?? DEFAULT_CONTEXT),
            target: attributes.target === undefined ? null : scalar('target', attributes.target),
            labels: mapping('labels', attributes.labels),
            args: mapping('args', attributes.args),
            tags: sequence('tags', attributes.tags),
            platforms: sequence('platforms', attributes.platforms),
        };
    }

    /**
     * Run one attribute evaluation, re-raising resolve errors with the
     * target and attribute in the message. Code and subject are kept.
     */
    private attribute_guard<T>(target: string, attribute: string, evaluate: () => T): T {
        try {
            return evaluate();
        } catch (err: unknown) {
            if (err instanceof ResolveError) {
                throw new ResolveError(err.code, err.subject, `target '${target}' ${attribute}: ${err.message}`, err);
            }
            throw err;
        }
    }
}

/**
 * Deep-freeze an effective target for hand-off to a backend.
 */
export function effectiveTarget_freeze(target: EffectiveTarget): EffectiveTarget {
    return Object.freeze({
        ...target,
        labels: Object.freeze({ ...target.labels }),
        args: Object.freeze({ ...target.args }),
        tags: Object.freeze([...target.tags]),
        platforms: Object.freeze([...target.platforms]),
    });
}

/**
 * Turn an effective target back into a zero-inheritance definition.
 * Literal `${` is escaped, so flattening the result yields an equal
 * EffectiveTarget.
 */
export function target_fromEffective(effective: EffectiveTarget): TargetDefinition {
    const escapeAll = (record: Readonly<Record<string, string>>): Record<string, string> =>
        Object.fromEntries(Object.entries(record).map(([k, v]): [string, string] => [k, template_escape(v)]));

    const attributes: TargetAttributes = {
        dockerfile: template_escape(effective.dockerfile),
        context: template_escape(effective.context),
        labels: escapeAll(effective.labels),
        args: escapeAll(effective.args),
        tags: effective.tags.map(template_escape),
        platforms: effective.platforms.map(template_escape),
    };
    if (effective.target !== null) {
        attributes.target = template_escape(effective.target);
    }

    return { name: effective.name, inherits: [], attributes };
}
