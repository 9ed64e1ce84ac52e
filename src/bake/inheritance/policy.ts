/**
 * @file Merge Policy Table
 *
 * Per-kind merge rules consulted by the single flattening routine.
 * Attribute names map to a kind; kinds map to a policy. No attribute
 * is special-cased by name.
 *
 * @module bake/inheritance
 */

import type {
    AttributeKind,
    AttributeName,
    MappingAttribute,
    ScalarAttribute,
    SequenceAttribute,
    TargetAttributes,
} from '../types.js';

/**
 * Combine an earlier layer's value with a later layer's value.
 * `undefined` means the layer does not declare the attribute.
 */
export interface MergePolicy<T> {
    merge(earlier: T | undefined, later: T | undefined): T | undefined;
}

type Mapping = Readonly<Record<string, string>>;

export const MERGE_POLICIES: {
    scalar: MergePolicy<string>;
    mapping: MergePolicy<Mapping>;
    sequence: MergePolicy<readonly string[]>;
} = {
    scalar: {
        merge: (earlier: string | undefined, later: string | undefined): string | undefined => later ?? earlier,
    },
    mapping: {
        merge: (earlier: Mapping | undefined, later: Mapping | undefined): Mapping | undefined => {
            if (earlier === undefined) return later;
            if (later === undefined) return earlier;
            return { ...earlier, ...later };
        },
    },
    sequence: {
        merge: (earlier: readonly string[] | undefined, later: readonly string[] | undefined): readonly string[] | undefined =>
            later ?? earlier,
    },
};

export const ATTRIBUTE_KINDS = {
    dockerfile: 'scalar',
    context: 'scalar',
    target: 'scalar',
    labels: 'mapping',
    args: 'mapping',
    tags: 'sequence',
    platforms: 'sequence',
} as const satisfies Record<AttributeName, AttributeKind>;

const SCALAR_ATTRIBUTES: readonly ScalarAttribute[] = ['dockerfile', 'context', 'target'];
const MAPPING_ATTRIBUTES: readonly MappingAttribute[] = ['labels', 'args'];
const SEQUENCE_ATTRIBUTES: readonly SequenceAttribute[] = ['tags', 'platforms'];

/**
 * Apply `later` on top of `earlier` attribute by attribute, using the
 * policy of each attribute's kind. Attributes declared by neither layer
 * stay absent.
 */
export function attributes_merge(earlier: TargetAttributes, later: TargetAttributes): TargetAttributes {
    const merged: TargetAttributes = {};

    for (const name of SCALAR_ATTRIBUTES) {
        const value: string | undefined = MERGE_POLICIES[ATTRIBUTE_KINDS[name]].merge(earlier[name], later[name]);
        if (value !== undefined) merged[name] = value;
    }
    for (const name of MAPPING_ATTRIBUTES) {
        const value: Mapping | undefined = MERGE_POLICIES[ATTRIBUTE_KINDS[name]].merge(earlier[name], later[name]);
        if (value !== undefined) merged[name] = value;
    }
    for (const name of SEQUENCE_ATTRIBUTES) {
        const value: readonly string[] | undefined = MERGE_POLICIES[ATTRIBUTE_KINDS[name]].merge(earlier[name], later[name]);
        if (value !== undefined) merged[name] = value;
    }

    return merged;
}
