/**
 * @file Plan Renderer
 *
 * Serializes a build plan into the document a build backend reads:
 * one group listing the targets in order, and one entry per target
 * with its build-file, context, stage, args, labels, tags and platforms.
 * Empty collections and an absent stage are omitted.
 *
 * @module bake/plan
 */

import type { BuildPlan, EffectiveTarget } from '../types.js';

export interface RenderedTarget {
    context: string;
    dockerfile: string;
    target?: string;
    args?: Record<string, string>;
    labels?: Record<string, string>;
    tags?: string[];
    platforms?: string[];
}

export interface RenderedPlan {
    group: Record<string, { targets: string[] }>;
    target: Record<string, RenderedTarget>;
}

export function target_render(effective: EffectiveTarget): RenderedTarget {
    const rendered: RenderedTarget = {
        context: effective.context,
        dockerfile: effective.dockerfile,
    };
    if (effective.target !== null) rendered.target = effective.target;
    if (Object.keys(effective.args).length > 0) rendered.args = { ...effective.args };
    if (Object.keys(effective.labels).length > 0) rendered.labels = { ...effective.labels };
    if (effective.tags.length > 0) rendered.tags = [...effective.tags];
    if (effective.platforms.length > 0) rendered.platforms = [...effective.platforms];
    return rendered;
}

/**
 * @param groupName - Name of the group listing every planned target
 */
export function plan_render(plan: BuildPlan, groupName: string = 'default'): RenderedPlan {
    const target: Record<string, RenderedTarget> = Object.fromEntries(
        plan.targets.map((effective: EffectiveTarget): [string, RenderedTarget] => [effective.name, target_render(effective)]),
    );
    return {
        group: { [groupName]: { targets: plan.targets.map((t: EffectiveTarget): string => t.name) } },
        target,
    };
}

/** Pretty-printed JSON form of `plan_render`. */
export function plan_print(plan: BuildPlan, groupName: string = 'default'): string {
    return JSON.stringify(plan_render(plan, groupName), null, 2);
}
