/**
 * @file Declaration Parser
 *
 * Parses a declaration document (YAML or JSON) into the DeclarationSet
 * consumed by the stores, the validator and the plan emitter.
 *
 * The document is validated against `DeclarationSchema` (Zod) at the
 * boundary before any field access. Duplicate target and group names
 * are rejected here; duplicate variables and functions are rejected by
 * their stores.
 *
 * @module bake/parser
 */

import { readFileSync } from 'fs';
import { DeclarationError, ResolveError } from '../errors.js';
import type {
    DeclarationSet,
    FunctionDefinition,
    GroupDefinition,
    TargetAttributes,
    TargetDefinition,
    VariableDefinition,
} from '../types.js';
import { list_normalize, yaml_parse } from './common.js';
import { DeclarationSchema, type RawFunction, type RawTarget, type RawVariable } from './schemas.js';

/**
 * Parse a declaration document into a DeclarationSet.
 *
 * @param source - Raw YAML or JSON text
 * @throws DeclarationError on malformed text or schema violations
 * @throws ResolveError `DuplicateTarget` / `DuplicateGroup`
 */
export function declaration_parse(source: string): DeclarationSet {
    const raw: unknown = yaml_parse(source) ?? {};

    // ── Boundary: validate the full document before touching any fields ──────
    const result = DeclarationSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new DeclarationError(`Invalid declaration: ${issues}`, result.error);
    }

    const doc = result.data;

    const targets = new Map<string, TargetDefinition>();
    for (const rawTarget of doc.targets) {
        const target: TargetDefinition = target_build(rawTarget);
        if (targets.has(target.name)) {
            throw new ResolveError('DuplicateTarget', target.name, `target '${target.name}' is declared more than once`);
        }
        targets.set(target.name, target);
    }

    const groups = new Map<string, GroupDefinition>();
    for (const rawGroup of doc.groups) {
        if (groups.has(rawGroup.name)) {
            throw new ResolveError('DuplicateGroup', rawGroup.name, `group '${rawGroup.name}' is declared more than once`);
        }
        groups.set(rawGroup.name, { name: rawGroup.name, targets: [...rawGroup.targets] });
    }

    return {
        variables: doc.variables.map(variable_build),
        functions: doc.functions.map(function_build),
        groups,
        targets,
    };
}

/**
 * Read and parse a declaration file.
 *
 * @throws DeclarationError when the file cannot be read
 */
export function declarationFile_load(filePath: string): DeclarationSet {
    let source: string;
    try {
        source = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
        const reason: string = err instanceof Error ? err.message : String(err);
        throw new DeclarationError(`Cannot read declaration file '${filePath}': ${reason}`, err);
    }
    return declaration_parse(source);
}

function variable_build(raw: RawVariable): VariableDefinition {
    return { name: raw.name, defaultValue: raw.default ?? null };
}

function function_build(raw: RawFunction): FunctionDefinition {
    return {
        name: raw.name,
        params: raw.params,
        result: typeof raw.result === 'string'
            ? { shape: 'scalar', template: raw.result }
            : { shape: 'sequence', templates: raw.result },
    };
}

/**
 * Build a TargetDefinition from a schema-validated record. Only the
 * attributes present in the document are set.
 */
function target_build(raw: RawTarget): TargetDefinition {
    const attributes: TargetAttributes = {};
    if (raw.dockerfile !== undefined) attributes.dockerfile = raw.dockerfile;
    if (raw.context !== undefined)    attributes.context = raw.context;
    if (raw.target !== undefined)     attributes.target = raw.target;
    if (raw.labels !== undefined)     attributes.labels = { ...raw.labels };
    if (raw.args !== undefined)       attributes.args = { ...raw.args };

    const tags: string[] | undefined = list_normalize(raw.tags);
    if (tags !== undefined) attributes.tags = tags;
    const platforms: string[] | undefined = list_normalize(raw.platforms);
    if (platforms !== undefined) attributes.platforms = platforms;

    return {
        name: raw.name,
        inherits: list_normalize(raw.inherits) ?? [],
        attributes,
    };
}
