/**
 * @file Group Expansion
 *
 * Expands requested names into an ordered, duplicate-free list of
 * target names. A name resolves to a target first and to a group
 * second; the `group:` prefix requests a group explicitly. Groups may
 * contain groups.
 *
 * @module bake/groups
 */

import { ResolveError } from '../errors.js';
import type { DeclarationSet } from '../types.js';

export const GROUP_PREFIX: string = 'group:';

/**
 * Expand requested target/group names, preserving first-seen order.
 *
 * @throws ResolveError `UnknownTarget`, `UnknownGroup`, `CyclicGroup`
 */
export function groups_expand(
    requested: readonly string[],
    declaration: Pick<DeclarationSet, 'targets' | 'groups'>,
): string[] {
    const ordered: string[] = [];
    const seen = new Set<string>();

    const target_add = (name: string): void => {
        if (seen.has(name)) return;
        seen.add(name);
        ordered.push(name);
    };

    const group_expand = (name: string, trail: readonly string[]): void => {
        if (trail.includes(name)) {
            const cycle: string[] = [...trail.slice(trail.indexOf(name)), name];
            throw new ResolveError('CyclicGroup', name, `group '${name}' contains itself: ${cycle.join(' -> ')}`);
        }
        const group = declaration.groups.get(name);
        if (!group) {
            throw new ResolveError('UnknownGroup', name, `group '${name}' is not declared`);
        }
        for (const member of group.targets) {
            if (declaration.targets.has(member)) {
                target_add(member);
            } else if (declaration.groups.has(member)) {
                group_expand(member, [...trail, name]);
            } else {
                throw new ResolveError('UnknownTarget', member, `group '${name}' references unknown target '${member}'`);
            }
        }
    };

    for (const name of requested) {
        if (name.startsWith(GROUP_PREFIX)) {
            group_expand(name.slice(GROUP_PREFIX.length), []);
        } else if (declaration.targets.has(name)) {
            target_add(name);
        } else if (declaration.groups.has(name)) {
            group_expand(name, []);
        } else {
            throw new ResolveError('UnknownTarget', name, `'${name}' is neither a declared target nor a group`);
        }
    }

    return ordered;
}
