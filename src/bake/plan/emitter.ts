/**
 * @file Plan Emitter
 *
 * Turns requested names into the ordered, immutable build plan: group
 * expansion first, then one flattened EffectiveTarget per target.
 *
 * @module bake/plan
 */

import { groups_expand } from '../groups/expand.js';
import type { InheritanceResolver } from '../inheritance/flatten.js';
import type { BuildPlan, DeclarationSet, EffectiveTarget } from '../types.js';

export class PlanEmitter {
    constructor(
        private readonly declaration: Pick<DeclarationSet, 'targets' | 'groups'>,
        private readonly inheritance: InheritanceResolver,
    ) {}

    /**
     * Resolve requested target/group names into a plan. Nothing is
     * returned unless every target flattens.
     */
    public plan_resolve(requested: readonly string[]): BuildPlan {
        const names: string[] = groups_expand(requested, this.declaration);
        const targets: EffectiveTarget[] = names.map((name: string): EffectiveTarget => this.inheritance.flatten(name));
        return Object.freeze({
            requested: Object.freeze([...requested]),
            targets: Object.freeze(targets),
        });
    }
}
