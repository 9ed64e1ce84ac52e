/**
 * @file Bake Graph Type Definitions
 *
 * Core types for the build target graph: variables, functions, groups,
 * targets with their inheritance lists, and the flattened effective
 * targets handed to a build backend.
 *
 * Design principle: declarations are plain records keyed by name.
 * `inherits` and group membership are lists of name handles resolved
 * lazily, so cycle detection is an ordinary visited-set traversal.
 *
 * @module bake
 */

// ─── Values ──────────────────────────────────────────────────────

/**
 * Result of evaluating an expression. Functions may synthesize several
 * values in one call (e.g. a tag list), so a value is either a single
 * string or a sequence of strings.
 */
export type Value = string | readonly string[];

// ─── Attributes ──────────────────────────────────────────────────

/**
 * Merge behaviour class of a target attribute.
 *
 * - scalar: last writer wins
 * - mapping: merged key by key
 * - sequence: replaced wholesale by the most specific layer
 */
export type AttributeKind = 'scalar' | 'mapping' | 'sequence';

export type ScalarAttribute = 'dockerfile' | 'context' | 'target';
export type MappingAttribute = 'labels' | 'args';
export type SequenceAttribute = 'tags' | 'platforms';
export type AttributeName = ScalarAttribute | MappingAttribute | SequenceAttribute;

/**
 * Raw (unevaluated) attribute set of a target. Absent means "not
 * declared by this layer"; an empty list or map is a declaration.
 *
 * @property dockerfile - Build file path, relative to the context
 * @property context - Build context path
 * @property target - Stage selector inside a multi-stage build file
 * @property labels - Image labels
 * @property args - Build arguments
 * @property tags - Image references to tag the result with
 * @property platforms - Target platforms (e.g. linux/amd64)
 */
export interface TargetAttributes {
    dockerfile?: string;
    context?: string;
    target?: string;
    labels?: Readonly<Record<string, string>>;
    args?: Readonly<Record<string, string>>;
    tags?: readonly string[];
    platforms?: readonly string[];
}

// ─── Declarations ────────────────────────────────────────────────

/**
 * A declared variable. `defaultValue` is null when the declaration
 * carries no default; such a variable resolves to the empty string
 * unless overridden.
 */
export interface VariableDefinition {
    name: string;
    defaultValue: string | null;
}

/**
 * Declared result of a user function. The shape is fixed by the
 * declaration: a single template yields a string, a list of templates
 * yields a sequence.
 */
export type FunctionResult =
    | { shape: 'scalar'; template: string }
    | { shape: 'sequence'; templates: readonly string[] };

export interface FunctionDefinition {
    name: string;
    params: readonly string[];
    result: FunctionResult;
}

/**
 * A declared build target.
 *
 * @property name - Unique target name
 * @property inherits - Base target names, base-first
 * @property attributes - Attributes declared directly on this target
 */
export interface TargetDefinition {
    name: string;
    inherits: readonly string[];
    attributes: TargetAttributes;
}

/**
 * A named collection of targets (or other groups).
 */
export interface GroupDefinition {
    name: string;
    targets: readonly string[];
}

/**
 * The parsed representation of a declaration document.
 *
 * Variables and functions stay as ordered lists; their stores reject
 * duplicates when they are built. Targets and groups are keyed by name
 * in declaration order.
 */
export interface DeclarationSet {
    variables: readonly VariableDefinition[];
    functions: readonly FunctionDefinition[];
    groups: ReadonlyMap<string, GroupDefinition>;
    targets: ReadonlyMap<string, TargetDefinition>;
}

// ─── Resolution Output ───────────────────────────────────────────

/**
 * A target after inheritance flattening and expression evaluation.
 * Every field holds literal values only. Instances handed out by the
 * resolver are deeply frozen.
 */
export interface EffectiveTarget {
    readonly name: string;
    readonly dockerfile: string;
    readonly context: string;
    readonly target: string | null;
    readonly labels: Readonly<Record<string, string>>;
    readonly args: Readonly<Record<string, string>>;
    readonly tags: readonly string[];
    readonly platforms: readonly string[];
}

/**
 * Ordered, immutable build plan: one entry per resolved target.
 *
 * @property requested - Names the plan was resolved for
 * @property targets - Effective targets in first-seen order
 */
export interface BuildPlan {
    readonly requested: readonly string[];
    readonly targets: readonly EffectiveTarget[];
}

// ─── Validation Result ───────────────────────────────────────────

/**
 * Result of structural validation (unknown references, cycles).
 * Errors appear in discovery order; the resolver surfaces the first.
 */
export interface ValidationResult<E> {
    valid: boolean;
    errors: E[];
}
